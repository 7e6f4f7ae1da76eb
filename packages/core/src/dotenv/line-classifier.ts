/**
 * Outcome of classifying one physical line of a .env document.
 * @public
 */
export type ClassifiedLine =
  | { kind: 'blank' }
  | { kind: 'comment' }
  | { kind: 'candidate'; text: string };

const ASCII_WHITESPACE = /^[\t\n\v\f\r ]+|[\t\n\v\f\r ]+$/g;

/**
 * Strips ASCII whitespace from both ends of a line.
 * @internal
 */
export function trimLine(line: string): string {
  return line.replace(ASCII_WHITESPACE, '');
}

/**
 * Classifies a line as blank, a `#` comment, or a candidate assignment.
 *
 * Candidates are trimmed at the line boundaries only; whitespace inside the
 * value is left for the key/value parser to judge.
 * @param line - A single line, without its terminator
 * @public
 */
export function classifyLine(line: string): ClassifiedLine {
  const text = trimLine(line);

  if (!text) {
    return { kind: 'blank' };
  }

  if (text.startsWith('#')) {
    return { kind: 'comment' };
  }

  return { kind: 'candidate', text };
}
