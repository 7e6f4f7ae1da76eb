import { readFileSync } from 'fs';
import { resolve, isAbsolute } from 'path';
import type { DotEnvEncoding } from '@envline/models';
import { DotEnvFileError } from './errors.js';

/**
 * Resolves the absolute path to a .env file.
 *
 * Absolute paths are returned unchanged; relative ones are resolved against
 * `baseDir`, or process.cwd() when no base directory is configured.
 * @internal
 */
export function resolveDotEnvPath(path: string, baseDir?: string): string {
  if (isAbsolute(path)) {
    return path;
  }

  return resolve(baseDir || process.cwd(), path);
}

/**
 * Checks if an error indicates a missing file (ENOENT).
 * @internal
 */
export function isMissingFileError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

/**
 * Reads a .env file from disk synchronously.
 * @param filePath - Absolute path to the .env file
 * @param encoding - Character encoding used to decode the file
 * @throws {DotEnvFileError} `FILE_NOT_FOUND` when the file does not exist,
 *   `FILE_READ_ERROR` for any other failure
 * @internal
 */
export function readDotEnvFile(
  filePath: string,
  encoding: DotEnvEncoding,
): string {
  try {
    return readFileSync(filePath, encoding);
  } catch (error) {
    if (isMissingFileError(error)) {
      throw DotEnvFileError.notFound(filePath, error);
    }
    throw DotEnvFileError.readFailed(filePath, error);
  }
}
