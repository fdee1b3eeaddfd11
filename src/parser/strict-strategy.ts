import {
  END_OF_INPUT,
  INVALID,
  asciiSign,
  isAsciiSign,
  isFixedLengthNumber,
  isKeywordZ,
  type DateToken,
} from '../types/tokens.js';
import { isDay, isMonth, type DayComposer } from './day-composer.js';
import { isHour, isMinute, isSecond, readMilliseconds, type TimeComposer } from './time-composer.js';
import type { TimeZoneComposer } from './time-zone-composer.js';
import type { DateStringTokenizer } from './tokenizer.js';

export interface Composers {
  day: DayComposer;
  time: TimeComposer;
  tz: TimeZoneComposer;
}

export interface StrictResult {
  /**
   * EndOfInput when the whole string was read, Invalid when it can't be a
   * date at all, otherwise the first token the lenient strategy has to handle.
   */
  next: DateToken;
  /** False when the string does not start with a year and nothing was consumed. */
  applicable: boolean;
  /** The string was a complete date without a time of day. */
  dateOnly: boolean;
}

const notApplicable = (next: DateToken): StrictResult => ({ next, applicable: false, dateOnly: false });
const carryOver = (next: DateToken): StrictResult => ({ next, applicable: true, dateOnly: false });

/**
 * Reads `[+-]yyyyyy|yyyy '-' MM '-' DD ['T' HH ':' mm [':' ss ['.' f+]] [Z | +-hh:mm | +-hhmm]]`.
 *
 * Whatever year, month or day was read before the input stops following the
 * format stays in the composers for the lenient strategy. Once the time
 * separator has been seen the rest must follow the format exactly.
 */
export function parseStrictDateTime(scanner: DateStringTokenizer, composers: Composers): StrictResult {
  const { day, time, tz } = composers;

  const first = scanner.peek();
  if (isAsciiSign(first)) {
    const signToken = scanner.next();
    const yearToken = scanner.peek();
    if (!isFixedLengthNumber(yearToken, 6)) return notApplicable(signToken);
    const sign = asciiSign(signToken);
    // Year zero is written +000000.
    if (sign < 0 && yearToken.value === 0) return carryOver(INVALID);
    scanner.next();
    day.add(sign * yearToken.value, yearToken.length);
  } else if (isFixedLengthNumber(first, 4)) {
    scanner.next();
    day.add(first.value, first.length);
  } else {
    return notApplicable(scanner.next());
  }

  if (scanner.skipSymbol('-')) {
    day.setIsoDate();
    const month = scanner.peek();
    if (!isFixedLengthNumber(month, 2) || !isMonth(month.value)) return carryOver(scanner.next());
    scanner.next();
    day.add(month.value, month.length);

    if (scanner.skipSymbol('-')) {
      const dayOfMonth = scanner.peek();
      if (!isFixedLengthNumber(dayOfMonth, 2) || !isDay(dayOfMonth.value)) return carryOver(scanner.next());
      scanner.next();
      day.add(dayOfMonth.value, dayOfMonth.length);
    }
  }

  const separator = scanner.peek();
  if (separator.kind !== 'Keyword' || separator.keywordType !== 'TimeSeparator') {
    if (separator.kind !== 'EndOfInput') return carryOver(scanner.next());
    return { next: END_OF_INPUT, applicable: true, dateOnly: true };
  }
  scanner.next();

  const hour = scanner.peek();
  if (!isFixedLengthNumber(hour, 2) || !isHour(hour.value)) return carryOver(INVALID);
  scanner.next();
  time.add(hour.value);

  if (!scanner.skipSymbol(':')) return carryOver(INVALID);
  const minute = scanner.peek();
  if (!isFixedLengthNumber(minute, 2) || !isMinute(minute.value)) return carryOver(INVALID);
  scanner.next();
  time.add(minute.value);

  if (scanner.skipSymbol(':')) {
    const second = scanner.peek();
    if (!isFixedLengthNumber(second, 2) || !isSecond(second.value)) return carryOver(INVALID);
    scanner.next();
    time.add(second.value);

    if (scanner.skipSymbol('.')) {
      const fraction = scanner.peek();
      if (fraction.kind !== 'Number') return carryOver(INVALID);
      scanner.next();
      time.add(readMilliseconds(fraction.value, fraction.length));
    }
  }

  const zone = scanner.peek();
  if (isKeywordZ(zone)) {
    scanner.next();
    tz.set(0);
  } else if (isAsciiSign(zone)) {
    tz.setSign(asciiSign(scanner.next()));
    const offset = scanner.peek();
    if (isFixedLengthNumber(offset, 4)) {
      const hours = Math.floor(offset.value / 100);
      const minutes = offset.value % 100;
      if (!isHour(hours) || !isMinute(minutes)) return carryOver(INVALID);
      scanner.next();
      tz.setAbsoluteHour(hours);
      tz.setAbsoluteMinute(minutes);
    } else {
      if (!isFixedLengthNumber(offset, 2) || !isHour(offset.value)) return carryOver(INVALID);
      scanner.next();
      tz.setAbsoluteHour(offset.value);
      if (!scanner.skipSymbol(':')) return carryOver(INVALID);
      const offsetMinute = scanner.peek();
      if (!isFixedLengthNumber(offsetMinute, 2) || !isMinute(offsetMinute.value)) return carryOver(INVALID);
      scanner.next();
      tz.setAbsoluteMinute(offsetMinute.value);
    }
  }

  if (scanner.peek().kind !== 'EndOfInput') return carryOver(INVALID);
  return { next: END_OF_INPUT, applicable: true, dateOnly: false };
}
