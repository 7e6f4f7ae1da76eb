import { describe, it, expect } from 'vitest';
import { parseKeyValue } from '../key-value-parser.js';
import { DotEnvSyntaxError } from '../errors.js';

function expectValue(candidate: string, key: string, value: string): void {
  expect(parseKeyValue(candidate)).toEqual({
    status: 'parsed',
    pair: { key, value },
  });
}

function expectInvalid(candidate: string, message: string): DotEnvSyntaxError {
  const result = parseKeyValue(candidate);
  if (result.status !== 'invalid') {
    throw new Error(`expected ${candidate} to be invalid, got ${result.status}`);
  }
  expect(result.error.message).toBe(message);
  return result.error;
}

describe('parseKeyValue', () => {
  describe('unquoted values', () => {
    it('should read a simple assignment', () => {
      expectValue('VAR=Hello', 'VAR', 'Hello');
    });

    it('should split at the first equals sign only', () => {
      expectValue(
        'VAR=postgres://foo@localhost:5432/bar?max_pool_size=10',
        'VAR',
        'postgres://foo@localhost:5432/bar?max_pool_size=10',
      );
    });

    it('should allow an empty value', () => {
      expectValue('EMPTY=', 'EMPTY', '');
    });

    it('should reject a whitespace inside the value', () => {
      const error = expectInvalid(
        'VAR=v al',
        "An unquoted value cannot contain a whitespace: ' '",
      );
      expect(error.reason).toBe('UNQUOTED_WHITESPACE');
      expect(error.character).toBe(' ');
    });

    it('should reject a tab inside the value', () => {
      expectInvalid(
        'VAR=v\tal',
        "An unquoted value cannot contain a whitespace: '\\t'",
      );
    });

    it('should reject a whitespace before the value', () => {
      const error = expectInvalid(
        'VAR= val',
        "A value cannot start with a whitespace: ' '",
      );
      expect(error.reason).toBe('LEADING_WHITESPACE');
    });
  });

  describe('single-quoted values', () => {
    it('should keep surrounding whitespace', () => {
      expectValue("VAR=' value '", 'VAR', ' value ');
    });

    it('should keep double quotes verbatim', () => {
      expectValue(`VAR='"value"'`, 'VAR', '"value"');
    });

    it('should pair the opening quote with the last character', () => {
      expectValue("VAR='va'lue'", 'VAR', "va'lue");
    });

    it('should read an empty quoted value', () => {
      expectValue("VAR=''", 'VAR', '');
    });
  });

  describe('double-quoted values', () => {
    it('should keep surrounding whitespace', () => {
      expectValue('VAR=" value "', 'VAR', ' value ');
    });

    it('should keep single quotes verbatim', () => {
      expectValue(`VAR="'value'"`, 'VAR', "'value'");
    });

    it('should pair the opening quote with the last character', () => {
      expectValue('VAR="va"l"ue"', 'VAR', 'va"l"ue');
    });

    it('should not process escape sequences', () => {
      expectValue('VAR="a\\nb"', 'VAR', 'a\\nb');
    });

    it('should read an unterminated quote to the end of the line', () => {
      expectValue('VAR="open value', 'VAR', 'open value');
    });

    it('should read a lone quote as an empty value', () => {
      expectValue('VAR="', 'VAR', '');
    });
  });

  describe('keys', () => {
    it.each([
      ['#', "'#'"],
      ['"', `'"'`],
      ["'", "'\\''"],
    ])('should reject %s inside a key', (char, rendered) => {
      const error = expectInvalid(
        `V${char}AR=val`,
        `A variable key cannot contain ${rendered}`,
      );
      expect(error.reason).toBe('INVALID_KEY_CHARACTER');
      expect(error.character).toBe(char);
    });

    it('should reject whitespace between key and separator', () => {
      expectInvalid('VAR =val', "A variable key cannot contain ' '");
    });

    it('should report the first offending key character', () => {
      expectInvalid(`A"B#C=val`, `A variable key cannot contain '"'`);
    });

    it('should check the key before the value', () => {
      expectInvalid('V#AR=v al', "A variable key cannot contain '#'");
    });
  });

  describe('lines that are not assignments', () => {
    it.each(['HELLO:asd', 'just some words', '=value'])(
      'should skip %j',
      (candidate) => {
        expect(parseKeyValue(candidate)).toEqual({ status: 'skipped' });
      },
    );
  });
});
