import type { DotEnvPair } from '@envline/models';
import { DotEnvSyntaxError } from './errors.js';

/**
 * Outcome of parsing a candidate line.
 *
 * - `parsed`: a valid assignment
 * - `skipped`: the line has no `KEY=` shape and is ignored
 * - `invalid`: the line is an assignment but breaks a key or value rule
 * @public
 */
export type KeyValueParseResult =
  | { status: 'parsed'; pair: DotEnvPair }
  | { status: 'skipped' }
  | { status: 'invalid'; error: DotEnvSyntaxError };

const FORBIDDEN_KEY_CHARACTERS = new Set(['#', '"', "'"]);

function isWhitespace(char: string): boolean {
  return /\p{White_Space}/u.test(char);
}

function isQuote(char: string | undefined): char is '"' | "'" {
  return char === '"' || char === "'";
}

/**
 * Returns the first character of `text[0..end)` that cannot appear in a key.
 * @internal
 */
function findInvalidKeyCharacter(text: string, end: number): string | null {
  for (let i = 0; i < end; i++) {
    const char = text[i];
    if (FORBIDDEN_KEY_CHARACTERS.has(char) || isWhitespace(char)) {
      return char;
    }
  }
  return null;
}

/**
 * Reads a quoted value starting at `start`.
 *
 * The opening quote pairs with the last character of the line, so quotes of
 * either kind in between are kept verbatim (`'va'lue'` reads as `va'lue`).
 * Without a matching last character the value runs to the end of the line.
 * @internal
 */
function readQuotedValue(text: string, start: number): string {
  const quote = text[start];
  const last = text.length - 1;

  if (last > start && text[last] === quote) {
    return text.slice(start + 1, last);
  }
  return text.slice(start + 1);
}

/**
 * Reads an unquoted value starting at `start`, rejecting any whitespace.
 * @internal
 */
function readUnquotedValue(
  text: string,
  start: number,
): string | DotEnvSyntaxError {
  if (start < text.length && isWhitespace(text[start])) {
    return DotEnvSyntaxError.leadingWhitespace(text[start]);
  }

  for (let i = start; i < text.length; i++) {
    if (isWhitespace(text[i])) {
      return DotEnvSyntaxError.unquotedWhitespace(text[i]);
    }
  }

  return text.slice(start);
}

/**
 * Splits a candidate line at its first `=` and validates both sides.
 *
 * Only the first `=` separates key from value, so values such as
 * `postgres://host/db?max_pool_size=10` are read whole. A line with no `=`
 * or with nothing before it is not an assignment and is skipped.
 * @param candidate - A line already trimmed by {@link classifyLine}
 * @public
 */
export function parseKeyValue(candidate: string): KeyValueParseResult {
  const separator = candidate.indexOf('=');
  if (separator <= 0) {
    return { status: 'skipped' };
  }

  const invalidChar = findInvalidKeyCharacter(candidate, separator);
  if (invalidChar !== null) {
    return {
      status: 'invalid',
      error: DotEnvSyntaxError.invalidKeyCharacter(invalidChar),
    };
  }

  const key = candidate.slice(0, separator);
  const valueStart = separator + 1;

  if (isQuote(candidate[valueStart])) {
    return {
      status: 'parsed',
      pair: { key, value: readQuotedValue(candidate, valueStart) },
    };
  }

  const value = readUnquotedValue(candidate, valueStart);
  if (value instanceof DotEnvSyntaxError) {
    return { status: 'invalid', error: value };
  }

  return { status: 'parsed', pair: { key, value } };
}
