import { writeFileSync, mkdirSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { Readable } from 'stream';

/**
 * Creates a temporary test directory with a unique name.
 *
 * @returns Absolute path to the created temporary directory
 */
export function createTestDirectory(): string {
  const testDir = join(
    tmpdir(),
    `envline-test-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`,
  );
  mkdirSync(testDir, { recursive: true });
  return testDir;
}

/**
 * Creates a test environment file in the specified directory.
 *
 * @returns Absolute path to the created file
 */
export function createTestEnvFile(
  dir: string,
  filename: string,
  content: string,
): string {
  const filePath = join(dir, filename);
  writeFileSync(filePath, content, 'utf-8');
  return filePath;
}

/**
 * Removes a test directory and all its contents.
 */
export function cleanupTestDirectory(dir: string): void {
  try {
    rmSync(dir, { recursive: true, force: true });
  } catch {
    // Ignore cleanup errors
  }
}

/**
 * Wraps text in a readable stream, split into a few chunks.
 */
export function createTextStream(text: string): Readable {
  const middle = Math.floor(text.length / 2);
  return Readable.from([text.slice(0, middle), text.slice(middle)]);
}

/**
 * Builds the variable map a parse is expected to return.
 */
export function variables(
  record: Record<string, string>,
): Map<string, string> {
  return new Map(Object.entries(record));
}
