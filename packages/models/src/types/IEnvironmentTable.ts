/**
 * Key/value store the loader merges parsed variables into.
 *
 * The default implementation wraps `process.env`; tests inject an in-memory
 * table so that nothing leaks between cases.
 * @public
 */
export interface IEnvironmentTable {
  /**
   * Whether a variable with the given name is currently defined.
   * @param key - Variable name
   */
  has(key: string): boolean;

  /**
   * Reads a variable.
   * @param key - Variable name
   * @returns The value, or undefined when the variable is not defined
   */
  get(key: string): string | undefined;

  /**
   * Defines or replaces a variable.
   * @param key - Variable name
   * @param value - New value
   */
  set(key: string, value: string): void;

  /**
   * Removes every variable. Never called by the loader itself.
   */
  clear(): void;
}
