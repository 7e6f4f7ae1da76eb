/**
 * Environment table backed by the process environment.
 *
 * Any record shaped like `process.env` can be passed in instead, which keeps
 * the loader usable against a child-process environment being assembled.
 */

import type { IEnvironmentTable } from '@envline/models';

export class ProcessEnvironment implements IEnvironmentTable {
  public constructor(
    private readonly env: Record<string, string | undefined> = process.env,
  ) {}

  public has(key: string): boolean {
    return (
      Object.prototype.hasOwnProperty.call(this.env, key) &&
      this.env[key] !== undefined
    );
  }

  public get(key: string): string | undefined {
    return this.has(key) ? this.env[key] : undefined;
  }

  public set(key: string, value: string): void {
    this.env[key] = value;
  }

  public clear(): void {
    for (const key of Object.keys(this.env)) {
      delete this.env[key];
    }
  }
}
