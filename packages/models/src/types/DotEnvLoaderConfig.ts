/**
 * Configuration fixed for the lifetime of a loader instance.
 */
export interface DotEnvLoaderConfig {
  /** Directory relative paths are resolved against (defaults to process.cwd()) */
  baseDir?: string;
  /** File loaded when no path is given (defaults to '.env') */
  defaultPath?: string;
}
