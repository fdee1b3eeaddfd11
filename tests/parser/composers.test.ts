import { describe, it, expect } from 'vitest';
import { DayComposer } from '../../src/parser/day-composer.js';
import { TimeComposer, readMilliseconds } from '../../src/parser/time-composer.js';
import { TimeZoneComposer } from '../../src/parser/time-zone-composer.js';
import { DAY, HOUR, MILLISECOND, MINUTE, MONTH, SECOND, UTC_OFFSET, YEAR } from '../../src/types/date-record.js';
import { createDateOutput } from '../../src/parser/date-parser.js';

function writeDay(slots: Array<[number, number]>, options: { namedMonth?: number; iso?: boolean } = {}) {
  const day = new DayComposer();
  for (const [value, digits] of slots) day.add(value, digits);
  if (options.namedMonth !== undefined) day.setNamedMonth(options.namedMonth);
  if (options.iso) day.setIsoDate();
  const output = createDateOutput();
  const ok = day.write(output);
  return ok ? [output[YEAR], output[MONTH], output[DAY]] : null;
}

describe('TimeComposer', () => {
  it('expects minute, second and millisecond ranges in turn', () => {
    const time = new TimeComposer();
    expect(time.isExpecting(30)).toBe(false);

    time.add(15);
    expect(time.isExpecting(59)).toBe(true);
    expect(time.isExpecting(60)).toBe(false);

    time.add(30);
    time.add(45);
    expect(time.isExpecting(999)).toBe(true);
    expect(time.isExpecting(1000)).toBe(false);
  });

  it('zero-fills the remaining slots after addFinal', () => {
    const time = new TimeComposer();
    time.add(15);
    time.addFinal(30);
    const output = createDateOutput();

    expect(time.write(output)).toBe(true);
    expect([output[HOUR], output[MINUTE], output[SECOND], output[MILLISECOND]]).toEqual([15, 30, 0, 0]);
    expect(time.add(1)).toBe(false);
  });

  it('rejects a fifth field', () => {
    const time = new TimeComposer();
    expect([1, 2, 3, 4].every((n) => time.add(n))).toBe(true);
    expect(time.add(5)).toBe(false);
  });

  it('applies the AM/PM offset to a 12-hour reading', () => {
    const cases: Array<[number, number, number | null]> = [
      [3, 12, 15],
      [12, 0, 0],
      [12, 12, 12],
      [11, 0, 11],
      [13, 12, null],
    ];
    for (const [hour, offset, expected] of cases) {
      const time = new TimeComposer();
      time.addFinal(hour);
      time.setHourOffset(offset);
      const output = createDateOutput();
      const ok = time.write(output);
      expect(ok ? output[HOUR] : null).toBe(expected);
    }
  });

  it('rejects hour 24', () => {
    const time = new TimeComposer();
    time.addFinal(24);

    expect(time.write(createDateOutput())).toBe(false);
  });

  it('scales fractions to milliseconds', () => {
    expect(readMilliseconds(5, 1)).toBe(500);
    expect(readMilliseconds(5, 2)).toBe(50);
    expect(readMilliseconds(123, 3)).toBe(123);
    expect(readMilliseconds(1234, 4)).toBe(123);
    expect(readMilliseconds(123456789, 12)).toBe(123);
  });
});

describe('DayComposer', () => {
  it('reads ISO slots positionally', () => {
    expect(writeDay([[2020, 4], [1, 2], [5, 2]], { iso: true })).toEqual([2020, 0, 5]);
  });

  it('puts the month first when both orders are valid', () => {
    expect(writeDay([[3, 2], [4, 2], [2020, 4]])).toEqual([2020, 2, 4]);
  });

  it('falls back to day-month order when the first number is no month', () => {
    expect(writeDay([[13, 2], [4, 2], [2020, 4]])).toEqual([2020, 3, 13]);
  });

  it('takes a leading four-digit number as the year', () => {
    expect(writeDay([[2020, 4], [3, 1], [4, 1]])).toEqual([2020, 2, 4]);
  });

  it('takes the first number that cannot be a day as the year', () => {
    expect(writeDay([[1, 1], [2, 1], [49, 2]])).toEqual([2049, 0, 2]);
    expect(writeDay([[12, 2], [25, 2], [99, 2]])).toEqual([1999, 11, 25]);
  });

  it('fails when neither order gives a valid month and day', () => {
    expect(writeDay([[13, 2], [14, 2], [2020, 4]])).toBeNull();
  });

  it('places a named month around the year and day', () => {
    expect(writeDay([[5, 1], [2020, 4]], { namedMonth: 0 })).toEqual([2020, 0, 5]);
    expect(writeDay([[2020, 4], [5, 1]], { namedMonth: 0 })).toEqual([2020, 0, 5]);
    expect(writeDay([[5, 1], [20, 2]], { namedMonth: 0 })).toEqual([2020, 0, 5]);
  });

  it('requires three numbers, or two with a named month', () => {
    expect(writeDay([[5, 1]], { namedMonth: 0 })).toBeNull();
    expect(writeDay([[3, 1], [2020, 4]])).toBeNull();
    expect(writeDay([])).toBeNull();
  });

  it('rejects a fourth number', () => {
    const day = new DayComposer();

    expect([1, 2, 3].every((n) => day.add(n))).toBe(true);
    expect(day.add(4)).toBe(false);
  });

  it('does not expand short years of an ISO date', () => {
    expect(writeDay([[20, 2], [1, 2], [5, 2]], { iso: true })).toEqual([20, 0, 5]);
  });
});

describe('TimeZoneComposer', () => {
  it('writes null when no zone was given', () => {
    const output = createDateOutput();

    expect(new TimeZoneComposer().write(output)).toBe(true);
    expect(output[UTC_OFFSET]).toBeNull();
  });

  it('converts whole-hour offsets', () => {
    const tz = new TimeZoneComposer();
    tz.set(-5);
    const output = createDateOutput();

    expect(tz.write(output)).toBe(true);
    expect(output[UTC_OFFSET]).toBe(-18000);
  });

  it('assembles sign, hour and minute', () => {
    const tz = new TimeZoneComposer();
    tz.setSign(-1);
    tz.setAbsoluteHour(5);
    expect(tz.isExpecting(30)).toBe(true);
    expect(tz.isExpecting(60)).toBe(false);

    tz.setAbsoluteMinute(30);
    expect(tz.isExpecting(30)).toBe(false);

    const output = createDateOutput();
    expect(tz.write(output)).toBe(true);
    expect(output[UTC_OFFSET]).toBe(-19800);
  });

  it('recognizes UTC', () => {
    const tz = new TimeZoneComposer();
    expect(tz.isEmpty()).toBe(true);

    tz.set(0);
    expect(tz.isUTC()).toBe(true);
    expect(tz.isEmpty()).toBe(false);
  });

  it('rejects minutes out of range', () => {
    const tz = new TimeZoneComposer();
    tz.setSign(1);
    tz.setAbsoluteHour(1);
    tz.setAbsoluteMinute(75);

    expect(tz.write(createDateOutput())).toBe(false);
  });
});
