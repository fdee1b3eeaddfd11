import { describe, it, expect } from 'vitest';
import { InputReader, isEcmaWhiteSpace } from '../../src/parser/input-reader.js';

describe('InputReader', () => {
  it('reads a numeral and stops at the first non-digit', () => {
    const reader = new InputReader('2020-01');

    expect(reader.readUnsignedNumeral()).toBe(2020);
    expect(reader.current).toBe('-'.charCodeAt(0));
  });

  it('caps numerals at nine significant digits but consumes the rest', () => {
    const reader = new InputReader('12345678901x');

    expect(reader.readUnsignedNumeral()).toBe(123456789);
    expect(reader.current).toBe('x'.charCodeAt(0));
  });

  it('reads a lower-case prefix and the full word length', () => {
    const reader = new InputReader('JANUARY 5');

    expect(reader.readWord(3)).toEqual({ prefix: 'jan', length: 7 });
    expect(reader.current).toBe(' '.charCodeAt(0));
  });

  it('returns a short prefix for words shorter than the prefix length', () => {
    const reader = new InputReader('Z');

    expect(reader.readWord(3)).toEqual({ prefix: 'z', length: 1 });
    expect(reader.isEnd()).toBe(true);
  });

  it('skips nested parentheses', () => {
    const reader = new InputReader('(a (b) c)d');

    expect(reader.skipParentheses()).toBe(true);
    expect(reader.current).toBe('d'.charCodeAt(0));
  });

  it('stops an unbalanced comment at end of input', () => {
    const reader = new InputReader('(never closed');

    expect(reader.skipParentheses()).toBe(true);
    expect(reader.isEnd()).toBe(true);
  });

  it('leaves the cursor alone when a conditional skip does not apply', () => {
    const reader = new InputReader('x');

    expect(reader.skip(':'.charCodeAt(0))).toBe(false);
    expect(reader.skipWhiteSpace()).toBe(false);
    expect(reader.skipParentheses()).toBe(false);
    expect(reader.position).toBe(1);
  });

  it('uses the supplied whitespace predicate', () => {
    const reader = new InputReader('#1', (c) => c === '#'.charCodeAt(0));

    expect(reader.skipWhiteSpace()).toBe(true);
    expect(reader.readUnsignedNumeral()).toBe(1);
  });

  it('accepts an array of code units', () => {
    const reader = new InputReader([0x31, 0x32, 0x20]);

    expect(reader.readUnsignedNumeral()).toBe(12);
    expect(reader.skipWhiteSpace()).toBe(true);
    expect(reader.isEnd()).toBe(true);
  });

  it('treats tabs, line breaks and no-break spaces as whitespace by default', () => {
    expect(isEcmaWhiteSpace(0x09)).toBe(true);
    expect(isEcmaWhiteSpace(0x0a)).toBe(true);
    expect(isEcmaWhiteSpace(0xa0)).toBe(true);
    expect(isEcmaWhiteSpace('a'.charCodeAt(0))).toBe(false);
    expect(isEcmaWhiteSpace(0)).toBe(false);
  });
});
