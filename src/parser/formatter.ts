import type { DateRecord } from '../types/date-record.js';

function pad(n: number, width: number): string {
  return String(n).padStart(width, '0');
}

function formatYear(year: number): string {
  if (year >= 0 && year <= 9999) return pad(year, 4);
  return `${year < 0 ? '-' : '+'}${pad(Math.abs(year), 6)}`;
}

function formatOffset(seconds: number): string {
  const sign = seconds < 0 ? '-' : '+';
  const minutes = Math.floor(Math.abs(seconds) / 60);
  return `${sign}${pad(Math.floor(minutes / 60), 2)}:${pad(minutes % 60, 2)}`;
}

/**
 * Render a record as `YYYY-MM-DDThh:mm:ss.mmm±hh:mm`, the form the strict
 * parser reads back to the same record. The offset is left off when the
 * record has none; years outside 0..9999 use the signed six-digit form.
 */
export function formatDateRecord(record: DateRecord): string {
  const date = `${formatYear(record.year)}-${pad(record.month + 1, 2)}-${pad(record.day, 2)}`;
  const time = `${pad(record.hour, 2)}:${pad(record.minute, 2)}:${pad(record.second, 2)}.${pad(record.millisecond, 3)}`;
  const offset = record.utc_offset_seconds === null ? '' : formatOffset(record.utc_offset_seconds);
  return `${date}T${time}${offset}`;
}
