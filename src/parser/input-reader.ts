import type { DateInput, WhiteSpacePredicate } from '../types/date-record.js';

/** Digits beyond this many still belong to the numeral but no longer change its value. */
export const MAX_SIGNIFICANT_DIGITS = 9;

const CHAR_0 = 0x30;
const CHAR_9 = 0x39;
const CHAR_A = 0x41;
const CHAR_Z = 0x5a;
const CHAR_OPEN_PAREN: number = 0x28;
const CHAR_CLOSE_PAREN = 0x29;

// \s covers ECMAScript WhiteSpace and LineTerminator.
const WHITE_SPACE_PATTERN = /^\s$/;

export const isEcmaWhiteSpace: WhiteSpacePredicate = (codeUnit) =>
  WHITE_SPACE_PATTERN.test(String.fromCharCode(codeUnit));

export interface Word {
  /** Lower-case prefix of the word, at most `prefixLength` characters. */
  prefix: string;
  /** Full length of the word in the input. */
  length: number;
}

/**
 * Cursor over the input code units. `current` is 0 past the end of input,
 * which is why an embedded NUL also ends the scan.
 */
export class InputReader {
  private index = 0;
  private ch = 0;
  private readonly codeUnitAt: (i: number) => number;
  private readonly length: number;

  constructor(
    input: DateInput,
    private readonly whiteSpace: WhiteSpacePredicate = isEcmaWhiteSpace,
  ) {
    if (typeof input === 'string') {
      const text = input;
      this.codeUnitAt = (i) => text.charCodeAt(i);
    } else {
      const units = input;
      this.codeUnitAt = (i) => units[i];
    }
    this.length = input.length;
    this.next();
  }

  /** Number of code units consumed so far, counting the current one. */
  get position(): number {
    return this.index;
  }

  get current(): number {
    return this.ch;
  }

  next(): void {
    this.ch = this.index < this.length ? this.codeUnitAt(this.index) : 0;
    this.index++;
  }

  readUnsignedNumeral(): number {
    let n = 0;
    let i = 0;
    while (this.isAsciiDigit()) {
      if (i < MAX_SIGNIFICANT_DIGITS) n = n * 10 + (this.ch - CHAR_0);
      i++;
      this.next();
    }
    return n;
  }

  readWord(prefixLength: number): Word {
    let prefix = '';
    let length = 0;
    for (; this.isAsciiAlphaOrAbove(); this.next(), length++) {
      if (length < prefixLength) prefix += String.fromCharCode(asciiAlphaToLower(this.ch));
    }
    return { prefix, length };
  }

  skip(codeUnit: number): boolean {
    if (this.ch === codeUnit) {
      this.next();
      return true;
    }
    return false;
  }

  skipWhiteSpace(): boolean {
    if (this.whiteSpace(this.ch)) {
      this.next();
      return true;
    }
    return false;
  }

  /** Skips a parenthesized group, nested groups included, or up to end of input. */
  skipParentheses(): boolean {
    if (this.ch !== CHAR_OPEN_PAREN) return false;
    let balance = 0;
    do {
      if (this.ch === CHAR_CLOSE_PAREN) balance--;
      else if (this.ch === CHAR_OPEN_PAREN) balance++;
      this.next();
    } while (balance > 0 && this.ch !== 0);
    return true;
  }

  isEnd(): boolean {
    return this.ch === 0;
  }

  isAsciiDigit(): boolean {
    return this.ch >= CHAR_0 && this.ch <= CHAR_9;
  }

  isAsciiAlphaOrAbove(): boolean {
    return this.ch >= CHAR_A;
  }
}

function asciiAlphaToLower(codeUnit: number): number {
  return codeUnit >= CHAR_A && codeUnit <= CHAR_Z ? codeUnit + 0x20 : codeUnit;
}
