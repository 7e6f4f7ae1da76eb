import type { DotEnvVariables } from '@envline/models';
import { classifyLine } from './line-classifier.js';
import { parseKeyValue } from './key-value-parser.js';
import { DotEnvParseError } from './errors.js';

/**
 * Result of a non-throwing parse.
 * @public
 */
export type DotEnvParseResult =
  | { success: true; data: DotEnvVariables }
  | { success: false; error: DotEnvParseError };

const LINE_TERMINATOR = /\r\n|\r|\n/;
const BYTE_ORDER_MARK = '\uFEFF';

/**
 * Parses .env content without throwing.
 *
 * Blank lines, `#` comments and lines without a `KEY=` shape are ignored.
 * The first assignment that breaks a key or value rule fails the whole
 * document; nothing read before it is returned. A leading byte order mark is
 * dropped.
 * @param content - Raw .env document
 * @public
 */
export function safeParseDotEnvContent(content: string): DotEnvParseResult {
  const entries = new Map<string, string>();
  const text = content.startsWith(BYTE_ORDER_MARK)
    ? content.slice(BYTE_ORDER_MARK.length)
    : content;
  const lines = text.split(LINE_TERMINATOR);

  for (let index = 0; index < lines.length; index++) {
    const line = lines[index];
    const classified = classifyLine(line);
    if (classified.kind !== 'candidate') {
      continue;
    }

    const parsed = parseKeyValue(classified.text);
    if (parsed.status === 'invalid') {
      return {
        success: false,
        error: new DotEnvParseError(line, index + 1, parsed.error),
      };
    }

    if (parsed.status === 'parsed') {
      entries.set(parsed.pair.key, parsed.pair.value);
    }
  }

  return { success: true, data: entries };
}

/**
 * Parses .env content into an ordered key/value mapping.
 *
 * A repeated key keeps its first position and its last value.
 * @param content - Raw .env document
 * @throws {DotEnvParseError} On the first invalid assignment
 * @public
 */
export function parseDotEnvContent(content: string): DotEnvVariables {
  const result = safeParseDotEnvContent(content);
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}
