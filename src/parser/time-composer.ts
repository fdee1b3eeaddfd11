import { HOUR, MILLISECOND, MINUTE, SECOND, type DateOutput } from '../types/date-record.js';
import { MAX_SIGNIFICANT_DIGITS } from './input-reader.js';
import { between } from './ranges.js';

const SLOT_COUNT = 4;

export const isHour = (x: number): boolean => between(x, 0, 23);
export const isMinute = (x: number): boolean => between(x, 0, 59);
export const isSecond = (x: number): boolean => between(x, 0, 59);
export const isMillisecond = (x: number): boolean => between(x, 0, 999);
const isHour12 = (x: number): boolean => between(x, 0, 12);

/**
 * Milliseconds from a fraction numeral: its first three significant digits,
 * with the digit count telling how many leading zeros it had.
 */
export function readMilliseconds(value: number, length: number): number {
  if (length === 1) return value * 100;
  if (length === 2) return value * 10;
  let digits = Math.min(length, MAX_SIGNIFICANT_DIGITS);
  let n = value;
  while (digits > 3) {
    n = Math.floor(n / 10);
    digits--;
  }
  return n;
}

/** Accumulates hour, minute, second and millisecond, in that order. */
export class TimeComposer {
  private readonly slots: number[] = [];
  private hourOffset: number | undefined;

  isEmpty(): boolean {
    return this.slots.length === 0;
  }

  /** Whether `n` fits the slot that would be filled next (minute, second or millisecond). */
  isExpecting(n: number): boolean {
    switch (this.slots.length) {
      case 1: return isMinute(n);
      case 2: return isSecond(n);
      case 3: return isMillisecond(n);
      default: return false;
    }
  }

  add(n: number): boolean {
    if (this.slots.length >= SLOT_COUNT) return false;
    this.slots.push(n);
    return true;
  }

  /** Adds `n` and closes the time: remaining slots become 0. */
  addFinal(n: number): boolean {
    if (!this.add(n)) return false;
    while (this.slots.length < SLOT_COUNT) this.slots.push(0);
    return true;
  }

  /** Hours added to a 12-hour reading: 0 for AM, 12 for PM. */
  setHourOffset(n: number): void {
    this.hourOffset = n;
  }

  write(output: DateOutput): boolean {
    const [rawHour = 0, minute = 0, second = 0, millisecond = 0] = this.slots;

    let hour = rawHour;
    if (this.hourOffset !== undefined) {
      if (!isHour12(hour)) return false;
      hour = (hour % 12) + this.hourOffset;
    }

    if (!isHour(hour) || !isMinute(minute) || !isSecond(second) || !isMillisecond(millisecond)) {
      return false;
    }

    output[HOUR] = hour;
    output[MINUTE] = minute;
    output[SECOND] = second;
    output[MILLISECOND] = millisecond;
    return true;
  }
}
