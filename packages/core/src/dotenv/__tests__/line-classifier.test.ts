import { describe, it, expect } from 'vitest';
import { classifyLine } from '../line-classifier.js';

describe('classifyLine', () => {
  it.each(['', '   ', '\t \r'])('should classify %j as blank', (line) => {
    expect(classifyLine(line)).toEqual({ kind: 'blank' });
  });

  it('should classify a hash-led line as a comment', () => {
    expect(classifyLine('# This is a comment')).toEqual({ kind: 'comment' });
  });

  it('should classify an indented hash-led line as a comment', () => {
    expect(classifyLine('   #VAR=value')).toEqual({ kind: 'comment' });
  });

  it('should trim whitespace at the line boundaries only', () => {
    expect(classifyLine('  VAR=Hello \t\r ')).toEqual({
      kind: 'candidate',
      text: 'VAR=Hello',
    });
  });

  it('should keep whitespace inside the line', () => {
    expect(classifyLine(" VAR=' a b ' ")).toEqual({
      kind: 'candidate',
      text: "VAR=' a b '",
    });
  });

  it('should pass lines without a separator through as candidates', () => {
    expect(classifyLine('HELLO:asd')).toEqual({
      kind: 'candidate',
      text: 'HELLO:asd',
    });
  });
});
