/**
 * Codec for the packed calendar dates TMTask uses for startDate and deadline.
 *
 * Bits, most significant first: 11-bit year, 4-bit month, 5-bit day, then
 * 7 zero bits, i.e. `year << 16 | month << 12 | day << 7`.
 *
 *   2021-03-28  ->  132464128  ->  0b111111001010011111000000000
 *                                    YYYYYYYYYYYMMMMDDDDD0000000
 *
 * The field widths bound the range to years 0-2047.
 */

import { sql, type SQL } from 'drizzle-orm';
import { FormatError } from '../errors.js';

export const YEAR_MASK = 0b111111111110000000000000000;
export const MONTH_MASK = 0b000000000001111000000000000;
export const DAY_MASK = 0b000000000000000111110000000;

export const MAX_YEAR = 2047;

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

function parseIsoDate(value: string): CalendarDate | null {
  const m = ISO_DATE_RE.exec(value);
  if (!m) return null;

  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  return { year, month, day };
}

/** True for a real yyyy-MM-dd calendar date (2021-02-29 is not one) */
export function isIsoDate(value: unknown): value is string {
  return typeof value === 'string' && parseIsoDate(value) !== null;
}

/** yyyy-MM-dd -> packed integer */
export function encodeThingsDate(isoDate: string): number {
  const date = parseIsoDate(isoDate);
  if (!date || date.year > MAX_YEAR) {
    throw new FormatError('date', isoDate);
  }
  return (date.year << 16) | (date.month << 12) | (date.day << 7);
}

/** Packed integer -> yyyy-MM-dd */
export function decodeThingsDate(value: number): string {
  const year = (value & YEAR_MASK) >> 16;
  const month = (value & MONTH_MASK) >> 12;
  const day = (value & DAY_MASK) >> 7;
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

function toSql(expression: SQL | string): SQL {
  return typeof expression === 'string' ? sql.raw(expression) : expression;
}

/**
 * SQL expression turning an ISO date expression into a packed integer.
 * With `nullPossible`, a NULL (or otherwise falsy) input comes back as-is
 * instead of being packed into a bogus zero date.
 */
export function isoDateToThingsDateSql(expression: SQL | string, nullPossible = true): SQL {
  const isoDate = toSql(expression);
  const year = sql`strftime('%Y', ${isoDate}) << 16`;
  const month = sql`strftime('%m', ${isoDate}) << 12`;
  const day = sql`strftime('%d', ${isoDate}) << 7`;
  const thingsDate = sql`((${year}) | (${month}) | (${day}))`;

  if (nullPossible) {
    return sql`CASE WHEN ${isoDate} THEN ${thingsDate} ELSE ${isoDate} END`;
  }
  return thingsDate;
}

/** SQL expression turning a packed-integer expression into yyyy-MM-dd, NULL passing through */
export function thingsDateToIsoDateSql(expression: SQL | string): SQL {
  const thingsDate = toSql(expression);
  const year = sql`(${thingsDate} & ${sql.raw(String(YEAR_MASK))}) >> 16`;
  const month = sql`(${thingsDate} & ${sql.raw(String(MONTH_MASK))}) >> 12`;
  const day = sql`(${thingsDate} & ${sql.raw(String(DAY_MASK))}) >> 7`;
  const isoDate = sql`printf('%04d-%02d-%02d', ${year}, ${month}, ${day})`;
  return sql`CASE WHEN ${thingsDate} THEN ${isoDate} ELSE ${thingsDate} END`;
}

/** Packed encoding of today's local date, evaluated by SQLite */
export function todayAsThingsDateSql(): SQL {
  return isoDateToThingsDateSql("date('now', 'localtime')", false);
}
