/**
 * @fileoverview Time utilities: strict parsing of access log timestamps and
 * formatting of the run timestamp used in report filenames.
 *
 * @module utils/time
 */

/** `YYYY-MM-DDTHH:MM:SS`, no fractional seconds, no zone designator. */
const ACCESS_TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})$/;

/**
 * Calendar fields of a local access timestamp.
 */
export interface AccessTime {
  year: number;
  /** 1-12 */
  month: number;
  /** 1-31 */
  day: number;
  /** 0-23 */
  hour: number;
  minute: number;
  second: number;
}

/**
 * Returns the number of days in a month of the proleptic Gregorian calendar.
 *
 * @param year - Four-digit year
 * @param month - Month number, 1-12
 */
export function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Parses an access timestamp in the exact `YYYY-MM-DDTHH:MM:SS` form.
 *
 * @param value - Raw timestamp text
 * @returns The parsed fields, or `null` when the text does not match the
 *          format or names a date or time that does not exist
 *
 * @example
 * ```typescript
 * parseAccessTimestamp('2023-05-15T08:30:00')?.hour; // 8
 * parseAccessTimestamp('2023-05-15 08:30');          // null
 * parseAccessTimestamp('2023-02-30T08:30:00');       // null
 * ```
 */
export function parseAccessTimestamp(value: string): AccessTime | null {
  const match = ACCESS_TIMESTAMP_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  const [year, month, day, hour, minute, second] = match
    .slice(1)
    .map((part) => Number.parseInt(part, 10));

  if (month < 1 || month > 12) {
    return null;
  }
  if (day < 1 || day > daysInMonth(year, month)) {
    return null;
  }
  if (hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  return { year, month, day, hour, minute, second };
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Formats a date as a local `YYYYMMDD_HHMMSS` stamp for report filenames.
 *
 * @example
 * ```typescript
 * formatRunTimestamp(new Date(2024, 0, 5, 7, 8, 9)); // '20240105_070809'
 * ```
 */
export function formatRunTimestamp(date: Date): string {
  const datePart = `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`;
  const timePart = `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
  return `${datePart}_${timePart}`;
}
