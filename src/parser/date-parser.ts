import {
  DAY,
  HOUR,
  MILLISECOND,
  MINUTE,
  MONTH,
  OUTPUT_SIZE,
  SECOND,
  UTC_OFFSET,
  YEAR,
  type DateInput,
  type DateOutput,
  type DateRecord,
  type ParseOptions,
} from '../types/date-record.js';
import { DayComposer } from './day-composer.js';
import { InputReader } from './input-reader.js';
import { parseLenient } from './lenient-strategy.js';
import { parseStrictDateTime, type Composers } from './strict-strategy.js';
import { TimeComposer } from './time-composer.js';
import { TimeZoneComposer } from './time-zone-composer.js';
import { DateStringTokenizer } from './tokenizer.js';

export function createDateOutput(): DateOutput {
  return new Array<number | null>(OUTPUT_SIZE).fill(null);
}

function createComposers(): Composers {
  return { day: new DayComposer(), time: new TimeComposer(), tz: new TimeZoneComposer() };
}

/**
 * Parse a date string into `output` (see the slot constants in
 * types/date-record). Returns false when the string is not a date; the
 * contents of `output` are then unspecified.
 *
 * Accepted input is either the ISO form
 *   [+-yy]yyyy-MM-DD[THH:mm[:ss[.sss]][Z|+-hh:mm|+-hhmm]]
 * or anything the lenient reading makes sense of:
 *   "Jan 5 2020", "5 January 2020 3:15 PM", "03/04/2020 12:00 EST",
 *   "Tue, 01 Mar 2011 12:00:00 GMT+0100 (CET)".
 */
export function parseDateInto(input: DateInput, output: DateOutput, options: ParseOptions = {}): boolean {
  const reader = new InputReader(input, options.isWhiteSpace);
  const scanner = new DateStringTokenizer(reader);
  let composers = createComposers();

  const strict = parseStrictDateTime(scanner, composers);
  if (!strict.applicable) composers = createComposers();
  if (strict.next.kind === 'Invalid') return false;

  if (!parseLenient(scanner, composers, strict.next)) return false;

  const { day, time, tz } = composers;
  if (strict.dateOnly && options.dateOnlyAsUtc && tz.isEmpty()) tz.set(0);

  return day.write(output) && time.write(output) && tz.write(output);
}

export function parseDate(input: DateInput, options: ParseOptions = {}): DateRecord | null {
  const output = createDateOutput();
  if (!parseDateInto(input, output, options)) return null;
  return recordFromOutput(output);
}

export function recordFromOutput(output: DateOutput): DateRecord {
  const field = (slot: number): number => {
    const value = output[slot];
    if (value === null || value === undefined) {
      throw new Error(`Date output slot ${slot} is not set`);
    }
    return value;
  };

  return {
    year: field(YEAR),
    month: field(MONTH),
    day: field(DAY),
    hour: field(HOUR),
    minute: field(MINUTE),
    second: field(SECOND),
    millisecond: field(MILLISECOND),
    utc_offset_seconds: output[UTC_OFFSET] ?? null,
  };
}
