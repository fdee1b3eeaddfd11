import { UTC_OFFSET, type DateOutput } from '../types/date-record.js';
import { isMinute } from './time-composer.js';

export class TimeZoneComposer {
  private sign: number | undefined;
  private hour: number | undefined;
  private minute: number | undefined;

  set(offsetInHours: number): void {
    this.sign = offsetInHours < 0 ? -1 : 1;
    this.hour = offsetInHours * this.sign;
    this.minute = 0;
  }

  setSign(sign: number): void {
    this.sign = sign < 0 ? -1 : 1;
  }

  setAbsoluteHour(hour: number): void {
    this.hour = hour;
  }

  setAbsoluteMinute(minute: number | undefined): void {
    this.minute = minute;
  }

  /** True while an hour is set and its minutes may still follow. */
  isExpecting(n: number): boolean {
    return this.hour !== undefined && this.minute === undefined && isMinute(n);
  }

  isUTC(): boolean {
    return this.hour === 0 && this.minute === 0;
  }

  isEmpty(): boolean {
    return this.hour === undefined;
  }

  write(output: DateOutput): boolean {
    if (this.hour === undefined) {
      output[UTC_OFFSET] = null;
      return true;
    }
    const minute = this.minute ?? 0;
    if (!isMinute(minute)) return false;
    output[UTC_OFFSET] = (this.sign ?? 1) * (this.hour * 3600 + minute * 60);
    return true;
  }
}
