/**
 * Encodings accepted when decoding a .env file or stream.
 */
export type DotEnvEncoding =
  | 'utf-8'
  | 'utf8'
  | 'utf16le'
  | 'latin1'
  | 'ascii';

/**
 * Options for a single load operation.
 */
export interface LoadOptions {
  /** Replace variables that already exist in the environment table (default false) */
  overrideKeys?: boolean;
  /** Encoding used to decode files and streams (default 'utf-8') */
  encoding?: DotEnvEncoding;
}
