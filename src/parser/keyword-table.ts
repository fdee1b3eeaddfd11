import type { KeywordType } from '../types/tokens.js';

export const KEYWORD_PREFIX_LENGTH = 3;

export interface KeywordEntry {
  prefix: string;
  type: KeywordType;
  /**
   * MonthName: 0-based month. TimeZoneName: offset in minutes.
   * AmPm: hours added to a 12-hour clock reading. TimeSeparator: unused.
   */
  value: number;
}

/**
 * Month names, AM/PM markers, the ISO time separator and the North American
 * zone abbreviations. Prefixes must stay distinct at KEYWORD_PREFIX_LENGTH.
 */
const KEYWORD_ROWS: KeywordEntry[] = [
  { prefix: 'jan', type: 'MonthName', value: 0 },
  { prefix: 'feb', type: 'MonthName', value: 1 },
  { prefix: 'mar', type: 'MonthName', value: 2 },
  { prefix: 'apr', type: 'MonthName', value: 3 },
  { prefix: 'may', type: 'MonthName', value: 4 },
  { prefix: 'jun', type: 'MonthName', value: 5 },
  { prefix: 'jul', type: 'MonthName', value: 6 },
  { prefix: 'aug', type: 'MonthName', value: 7 },
  { prefix: 'sep', type: 'MonthName', value: 8 },
  { prefix: 'oct', type: 'MonthName', value: 9 },
  { prefix: 'nov', type: 'MonthName', value: 10 },
  { prefix: 'dec', type: 'MonthName', value: 11 },
  { prefix: 'am', type: 'AmPm', value: 0 },
  { prefix: 'pm', type: 'AmPm', value: 12 },
  { prefix: 'ut', type: 'TimeZoneName', value: 0 },
  { prefix: 'utc', type: 'TimeZoneName', value: 0 },
  { prefix: 'z', type: 'TimeZoneName', value: 0 },
  { prefix: 'gmt', type: 'TimeZoneName', value: 0 },
  { prefix: 'cdt', type: 'TimeZoneName', value: -5 * 60 },
  { prefix: 'cst', type: 'TimeZoneName', value: -6 * 60 },
  { prefix: 'edt', type: 'TimeZoneName', value: -4 * 60 },
  { prefix: 'est', type: 'TimeZoneName', value: -5 * 60 },
  { prefix: 'mdt', type: 'TimeZoneName', value: -6 * 60 },
  { prefix: 'mst', type: 'TimeZoneName', value: -7 * 60 },
  { prefix: 'pdt', type: 'TimeZoneName', value: -7 * 60 },
  { prefix: 'pst', type: 'TimeZoneName', value: -8 * 60 },
  { prefix: 't', type: 'TimeSeparator', value: 0 },
];

const KEYWORDS: readonly KeywordEntry[] = Object.freeze(KEYWORD_ROWS);

const INDEX_BY_PREFIX: ReadonlyMap<string, number> = new Map(
  KEYWORDS.map((entry, index): [string, number] => [entry.prefix, index]),
);

/**
 * Look up a scanned word by its lower-case prefix and full length. A word
 * longer than the prefix only matches a month name ("January", "Sept").
 */
export function lookupKeyword(prefix: string, length: number): number | undefined {
  const index = INDEX_BY_PREFIX.get(prefix);
  if (index === undefined) return undefined;
  if (length > KEYWORD_PREFIX_LENGTH && KEYWORDS[index].type !== 'MonthName') return undefined;
  return index;
}

export function keywordType(index: number): KeywordType {
  return KEYWORDS[index].type;
}

export function keywordValue(index: number): number {
  return KEYWORDS[index].value;
}

export function listKeywordEntries(): readonly KeywordEntry[] {
  return KEYWORDS;
}
