import { DAY, MONTH, YEAR, type DateOutput } from '../types/date-record.js';
import { between } from './ranges.js';

const SLOT_COUNT = 3;

/** Years written with at most this many digits are expanded around the pivot. */
const SHORT_YEAR_DIGITS = 2;
const SHORT_YEAR_PIVOT = 50;

/**
 * When two bare numbers could be read either way ("03/04/2020"), the first
 * one is taken as the month.
 */
export const MONTH_BEFORE_DAY = true;

export const isMonth = (x: number): boolean => between(x, 1, 12);
export const isDay = (x: number): boolean => between(x, 1, 31);

interface DaySlot {
  value: number;
  digits: number;
}

interface DayFields {
  year: DaySlot;
  month: number; // 1-based
  day: number;
}

/**
 * Collects the numbers and month name that make up a calendar date and
 * decides which one is the year, the month and the day.
 */
export class DayComposer {
  private readonly slots: DaySlot[] = [];
  private namedMonth: number | undefined;
  private isoDate = false;

  isEmpty(): boolean {
    return this.slots.length === 0;
  }

  add(n: number, digits: number = String(Math.abs(n)).length): boolean {
    if (this.slots.length >= SLOT_COUNT) return false;
    this.slots.push({ value: n, digits });
    return true;
  }

  /** `n` is the 0-based month taken from a month name. */
  setNamedMonth(n: number): void {
    this.namedMonth = n;
  }

  /** The slots were filled in year, month, day order. */
  setIsoDate(): void {
    this.isoDate = true;
  }

  write(output: DateOutput): boolean {
    const fields = this.resolve();
    if (fields === undefined) return false;

    const { month, day } = fields;
    let year = fields.year.value;
    if (!this.isoDate && fields.year.digits <= SHORT_YEAR_DIGITS && between(year, 0, 99)) {
      year += year < SHORT_YEAR_PIVOT ? 2000 : 1900;
    }

    if (!isMonth(month) || !isDay(day)) return false;

    output[YEAR] = year;
    output[MONTH] = month - 1;
    output[DAY] = day;
    return true;
  }

  private resolve(): DayFields | undefined {
    const slots = this.slots;

    if (this.namedMonth !== undefined) {
      if (slots.length !== 2) return undefined;
      const month = this.namedMonth + 1;
      const yearIndex = this.isoDate ? 0 : this.yearIndex();
      const dayIndex = yearIndex === 0 ? 1 : 0;
      return { year: slots[yearIndex], month, day: slots[dayIndex].value };
    }

    if (slots.length !== SLOT_COUNT) return undefined;

    if (this.isoDate) {
      return { year: slots[0], month: slots[1].value, day: slots[2].value };
    }

    const yearIndex = this.yearIndex();
    const [first, second] = slots.filter((_, i) => i !== yearIndex).map((slot) => slot.value);
    const monthFirst = isMonth(first) && isDay(second);
    const dayFirst = isDay(first) && isMonth(second);

    if (monthFirst && (MONTH_BEFORE_DAY || !dayFirst)) {
      return { year: slots[yearIndex], month: first, day: second };
    }
    if (dayFirst) {
      return { year: slots[yearIndex], month: second, day: first };
    }
    return { year: slots[yearIndex], month: first, day: second };
  }

  /**
   * A four-digit number is the year. Failing that, the first number that
   * cannot be a day of the month, and failing that, the last number.
   */
  private yearIndex(): number {
    const slots = this.slots;
    const long = slots.findIndex((slot) => slot.digits >= 4);
    if (long >= 0) return long;
    const notADay = slots.findIndex((slot) => !isDay(slot.value));
    if (notADay >= 0) return notADay;
    return slots.length - 1;
  }
}
