import {
  asciiSign,
  isAsciiSign,
  isSymbol,
  type DateToken,
} from '../types/tokens.js';
import type { Composers } from './strict-strategy.js';
import { readMilliseconds } from './time-composer.js';
import type { DateStringTokenizer } from './tokenizer.js';

const MINUTES_PER_HOUR = 60;

/**
 * Consumes tokens up to the end of input, starting with `first`, and routes
 * each one to the composer that can use it:
 *
 * - `n:` and `n::` are time fields (the second form also fills in a zero),
 *   `n.f` is seconds plus a fraction;
 * - a number completing a timezone offset or a running time goes there;
 * - any other number is part of the date, and a `-` right after it is a
 *   separator;
 * - month names, AM/PM after a time and zone names after a number are
 *   taken as such;
 * - a sign after a time or a UTC zone name starts an offset.
 *
 * Everything else is ignored. Returns false on a structural dead end.
 */
export function parseLenient(scanner: DateStringTokenizer, composers: Composers, first: DateToken): boolean {
  const { day, time, tz } = composers;
  let hasReadNumber = !day.isEmpty();

  for (let token = first; token.kind !== 'EndOfInput'; token = scanner.next()) {
    switch (token.kind) {
      case 'Invalid':
        return false;

      case 'Number': {
        hasReadNumber = true;
        const n = token.value;
        if (scanner.skipSymbol(':')) {
          if (scanner.skipSymbol(':')) {
            if (!time.isEmpty()) return false;
            time.add(n);
            time.add(0);
          } else {
            if (!time.add(n)) return false;
            if (isSymbol(scanner.peek(), '.')) scanner.next();
          }
        } else if (isSymbol(scanner.peek(), '.') && time.isExpecting(n)) {
          scanner.next();
          time.add(n);
          const fraction = scanner.peek();
          if (fraction.kind !== 'Number') return false;
          scanner.next();
          time.addFinal(readMilliseconds(fraction.value, fraction.length));
        } else if (tz.isExpecting(n)) {
          tz.setAbsoluteMinute(n);
        } else if (time.isExpecting(n)) {
          time.addFinal(n);
        } else {
          if (!day.add(n, token.length)) return false;
          scanner.skipSymbol('-');
        }
        break;
      }

      case 'Keyword':
        if (token.keywordType === 'AmPm' && !time.isEmpty()) {
          time.setHourOffset(token.value);
        } else if (token.keywordType === 'MonthName') {
          day.setNamedMonth(token.value);
          scanner.skipSymbol('-');
        } else if (token.keywordType === 'TimeZoneName' && hasReadNumber) {
          tz.set(token.value / MINUTES_PER_HOUR);
        }
        break;

      case 'Symbol':
        if (isAsciiSign(token) && (tz.isUTC() || !time.isEmpty())) {
          tz.setSign(asciiSign(token));
          hasReadNumber = true;
          if (!readOffset(scanner, composers)) return false;
        }
        break;

      default:
        break;
    }
  }
  return true;
}

/** The number after an offset sign: `h`, `hh`, `hmm`, `hhmm`, or `hh` followed by `:mm`. */
function readOffset(scanner: DateStringTokenizer, { tz }: Composers): boolean {
  const next = scanner.peek();
  if (next.kind !== 'Number') {
    tz.setAbsoluteHour(0);
    tz.setAbsoluteMinute(0);
    return true;
  }
  scanner.next();

  const n = next.value;
  if (isSymbol(scanner.peek(), ':')) {
    tz.setAbsoluteHour(n);
    tz.setAbsoluteMinute(undefined);
  } else if (next.length <= 2) {
    tz.setAbsoluteHour(n);
    tz.setAbsoluteMinute(0);
  } else if (next.length <= 4) {
    tz.setAbsoluteHour(Math.floor(n / 100));
    tz.setAbsoluteMinute(n % 100);
  } else {
    return false;
  }
  return true;
}
