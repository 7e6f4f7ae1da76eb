/**
 * A single `KEY=value` assignment read from one line.
 */
export interface DotEnvPair {
  /** Never empty; contains none of `#`, `"`, `'`, `=` or whitespace */
  key: string;
  /** May be empty */
  value: string;
}
