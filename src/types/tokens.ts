export type KeywordType = 'MonthName' | 'TimeZoneName' | 'TimeSeparator' | 'AmPm';

export type DateToken =
  | { kind: 'Number'; value: number; length: number }
  | { kind: 'Symbol'; symbol: string; length: 1 }
  | { kind: 'Keyword'; keywordType: KeywordType; value: number; length: number }
  | { kind: 'Whitespace'; length: number }
  | { kind: 'EndOfInput'; length: 0 }
  | { kind: 'Unknown'; length: number }
  | { kind: 'Invalid'; length: 0 };

export type NumberToken = Extract<DateToken, { kind: 'Number' }>;

export const END_OF_INPUT: DateToken = Object.freeze({ kind: 'EndOfInput', length: 0 });
export const INVALID: DateToken = Object.freeze({ kind: 'Invalid', length: 0 });

export function numberToken(value: number, length: number): DateToken {
  return { kind: 'Number', value, length };
}

export function symbolToken(symbol: string): DateToken {
  return { kind: 'Symbol', symbol, length: 1 };
}

export function keywordToken(keywordType: KeywordType, value: number, length: number): DateToken {
  return { kind: 'Keyword', keywordType, value, length };
}

export function isSymbol(token: DateToken, symbol: string): boolean {
  return token.kind === 'Symbol' && token.symbol === symbol;
}

export function isFixedLengthNumber<L extends number>(token: DateToken, length: L): token is NumberToken & { length: L } {
  return token.kind === 'Number' && token.length === length;
}

export function isAsciiSign(token: DateToken): boolean {
  return isSymbol(token, '+') || isSymbol(token, '-');
}

/** +1 for '+', -1 for '-', 0 for anything else. */
export function asciiSign(token: DateToken): number {
  if (isSymbol(token, '+')) return 1;
  if (isSymbol(token, '-')) return -1;
  return 0;
}

/** The one-letter UTC designator "Z". */
export function isKeywordZ(token: DateToken): boolean {
  return token.kind === 'Keyword'
    && token.keywordType === 'TimeZoneName'
    && token.length === 1
    && token.value === 0;
}
