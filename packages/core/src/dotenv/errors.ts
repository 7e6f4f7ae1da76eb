export type DotEnvErrorCode =
  | 'PARSE_ERROR'
  | 'SYNTAX_ERROR'
  | 'FILE_NOT_FOUND'
  | 'FILE_READ_ERROR';

/**
 * Base class for every error raised while reading .env content.
 * @public
 */
export class DotEnvError extends Error {
  public readonly code: DotEnvErrorCode;

  public constructor(code: DotEnvErrorCode, message: string) {
    super(message);
    this.name = 'DotEnvError';
    this.code = code;
    Object.setPrototypeOf(this, DotEnvError.prototype);
  }
}

export type DotEnvSyntaxReason =
  | 'INVALID_KEY_CHARACTER'
  | 'LEADING_WHITESPACE'
  | 'UNQUOTED_WHITESPACE';

const NAMED_ESCAPES: Record<string, string> = {
  '\t': '\\t',
  '\n': '\\n',
  '\v': '\\v',
  '\f': '\\f',
  '\r': '\\r',
  "'": "\\'",
  '\\': '\\\\',
};

/**
 * Renders a character as a quoted literal, e.g. `' '`, `'\t'` or `'\''`.
 * @internal
 */
export function describeCharacter(char: string): string {
  const named = NAMED_ESCAPES[char];
  if (named !== undefined) {
    return `'${named}'`;
  }

  const codePoint = char.codePointAt(0) ?? 0;
  if (char !== ' ' && /\p{White_Space}/u.test(char)) {
    return `'\\u${codePoint.toString(16).toUpperCase().padStart(4, '0')}'`;
  }

  return `'${char}'`;
}

/**
 * The rule a single line broke. Always attached as the `cause` of a
 * {@link DotEnvParseError}.
 * @public
 */
export class DotEnvSyntaxError extends DotEnvError {
  public constructor(
    message: string,
    public readonly reason: DotEnvSyntaxReason,
    public readonly character: string,
  ) {
    super('SYNTAX_ERROR', message);
    this.name = 'DotEnvSyntaxError';
    Object.setPrototypeOf(this, DotEnvSyntaxError.prototype);
  }

  public static invalidKeyCharacter(char: string): DotEnvSyntaxError {
    return new DotEnvSyntaxError(
      `A variable key cannot contain ${describeCharacter(char)}`,
      'INVALID_KEY_CHARACTER',
      char,
    );
  }

  public static leadingWhitespace(char: string): DotEnvSyntaxError {
    return new DotEnvSyntaxError(
      `A value cannot start with a whitespace: ${describeCharacter(char)}`,
      'LEADING_WHITESPACE',
      char,
    );
  }

  public static unquotedWhitespace(char: string): DotEnvSyntaxError {
    return new DotEnvSyntaxError(
      `An unquoted value cannot contain a whitespace: ${describeCharacter(char)}`,
      'UNQUOTED_WHITESPACE',
      char,
    );
  }
}

/**
 * Raised when a `key=value` line breaks a key or value rule. The whole
 * document is rejected.
 * @public
 */
export class DotEnvParseError extends DotEnvError {
  public readonly cause: DotEnvSyntaxError;

  /**
   * @param line - The offending line exactly as it appeared in the source
   * @param lineNumber - 1-based position of the line in the document
   * @param cause - The rule that was broken
   */
  public constructor(
    public readonly line: string,
    public readonly lineNumber: number,
    cause: DotEnvSyntaxError,
  ) {
    super('PARSE_ERROR', `Parse error on line: \`${line}\``);
    this.name = 'DotEnvParseError';
    this.cause = cause;
    Object.setPrototypeOf(this, DotEnvParseError.prototype);
  }
}

/**
 * Raised when a .env file cannot be read. A missing file uses the
 * `FILE_NOT_FOUND` code, every other failure `FILE_READ_ERROR`.
 * @public
 */
export class DotEnvFileError extends DotEnvError {
  public readonly cause: unknown;

  public constructor(
    code: 'FILE_NOT_FOUND' | 'FILE_READ_ERROR',
    public readonly path: string,
    cause: unknown,
  ) {
    super(
      code,
      code === 'FILE_NOT_FOUND'
        ? `.env file not found: ${path}`
        : `Failed to read .env file ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
    );
    this.name = 'DotEnvFileError';
    this.cause = cause;
    Object.setPrototypeOf(this, DotEnvFileError.prototype);
  }

  public static notFound(path: string, cause: unknown): DotEnvFileError {
    return new DotEnvFileError('FILE_NOT_FOUND', path, cause);
  }

  public static readFailed(path: string, cause: unknown): DotEnvFileError {
    return new DotEnvFileError('FILE_READ_ERROR', path, cause);
  }
}
