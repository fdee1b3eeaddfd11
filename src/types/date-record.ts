/**
 * Slot layout of the parser output. The output is a flat array of eight
 * integers; only the UTC offset may be `null` (no timezone in the input).
 */
export const YEAR = 0;
export const MONTH = 1; // 0 = January
export const DAY = 2;
export const HOUR = 3;
export const MINUTE = 4;
export const SECOND = 5;
export const MILLISECOND = 6;
export const UTC_OFFSET = 7; // seconds east of UTC
export const OUTPUT_SIZE = 8;

export type DateOutput = Array<number | null>;

export interface DateRecord {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
  utc_offset_seconds: number | null;
}

/** Source text: a string or any indexable run of UTF-16 code units. */
export type DateInput = string | ArrayLike<number>;

export type WhiteSpacePredicate = (codeUnit: number) => boolean;

export interface ParseOptions {
  isWhiteSpace?: WhiteSpacePredicate;
  /**
   * Give strict date-only strings ("2020-01-05") a UTC offset of 0 instead of
   * leaving it absent.
   */
  dateOnlyAsUtc?: boolean;
}
