import type { IEnvironmentTable } from '@envline/models';

/**
 * In-memory environment table. Used by tests and by callers that want to
 * collect variables without touching the process environment.
 * @public
 */
export class MemoryEnvironment implements IEnvironmentTable {
  private readonly values: Map<string, string>;

  public constructor(initial: Record<string, string> = {}) {
    this.values = new Map(Object.entries(initial));
  }

  public has(key: string): boolean {
    return this.values.has(key);
  }

  public get(key: string): string | undefined {
    return this.values.get(key);
  }

  public set(key: string, value: string): void {
    this.values.set(key, value);
  }

  public clear(): void {
    this.values.clear();
  }

  /**
   * Returns a snapshot of every variable currently defined.
   */
  public toRecord(): Record<string, string> {
    return Object.fromEntries(this.values);
  }
}
