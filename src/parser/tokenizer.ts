import {
  END_OF_INPUT,
  isSymbol,
  keywordToken,
  numberToken,
  symbolToken,
  type DateToken,
} from '../types/tokens.js';
import type { InputReader } from './input-reader.js';
import { KEYWORD_PREFIX_LENGTH, keywordType, keywordValue, lookupKeyword } from './keyword-table.js';

/**
 * Turns the reader's characters into DateTokens with one token of
 * lookahead. Parenthesized comments never surface as tokens.
 */
export class DateStringTokenizer {
  private lookahead: DateToken;

  constructor(private readonly reader: InputReader) {
    this.lookahead = this.scan();
  }

  next(): DateToken {
    const result = this.lookahead;
    this.lookahead = this.scan();
    return result;
  }

  peek(): DateToken {
    return this.lookahead;
  }

  skipSymbol(symbol: string): boolean {
    if (isSymbol(this.lookahead, symbol)) {
      this.lookahead = this.scan();
      return true;
    }
    return false;
  }

  private scan(): DateToken {
    const reader = this.reader;
    for (;;) {
      const start = reader.position;
      if (reader.isEnd()) return END_OF_INPUT;

      if (reader.isAsciiDigit()) {
        const n = reader.readUnsignedNumeral();
        return numberToken(n, reader.position - start);
      }

      if (reader.isAsciiAlphaOrAbove()) {
        const word = reader.readWord(KEYWORD_PREFIX_LENGTH);
        const index = lookupKeyword(word.prefix, word.length);
        if (index === undefined) return { kind: 'Unknown', length: word.length };
        return keywordToken(keywordType(index), keywordValue(index), word.length);
      }

      if (reader.skipWhiteSpace()) {
        while (reader.skipWhiteSpace()) continue;
        return { kind: 'Whitespace', length: reader.position - start };
      }

      if (reader.skipParentheses()) continue;

      const symbol = String.fromCharCode(reader.current);
      reader.next();
      return symbolToken(symbol);
    }
  }
}
