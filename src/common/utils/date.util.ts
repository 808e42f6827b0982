import { DateTime } from 'luxon';

// All calendar math runs in UTC. Trade timestamps are UTC instants.

export function toUtc(date: Date): DateTime {
  return DateTime.fromJSDate(date, { zone: 'utc' });
}

/** Midnight UTC of the instant's calendar day. */
export function utcDayStart(date: Date): Date {
  return toUtc(date).startOf('day').toJSDate();
}

/** yyyy-MM-dd key of the instant's UTC calendar day. */
export function utcDateKey(date: Date): string {
  return toUtc(date).toFormat('yyyy-MM-dd');
}

/** Hour of day (0-23) in UTC. */
export function utcHour(date: Date): number {
  return toUtc(date).hour;
}

export interface IsoWeek {
  weekYear: number;
  weekNumber: number;
  start: Date; // Monday 00:00:00 UTC
  end: Date;   // Sunday 23:59:59 UTC
}

/** ISO week containing the instant, with its Monday-to-Sunday window. */
export function isoWeekOf(date: Date): IsoWeek {
  const utc = toUtc(date);
  const monday = utc.startOf('week');
  return {
    weekYear: utc.weekYear,
    weekNumber: utc.weekNumber,
    start: monday.toJSDate(),
    end: monday.plus({ days: 6, hours: 23, minutes: 59, seconds: 59 }).toJSDate(),
  };
}

/**
 * Parses a broker timestamp like "2024-03-04 09:30:00" as UTC.
 * Returns undefined when the text doesn't match the format.
 */
export function parseUtcTimestamp(text: string, format = 'yyyy-MM-dd HH:mm:ss'): Date | undefined {
  const parsed = DateTime.fromFormat(text.trim(), format, { zone: 'utc' });
  return parsed.isValid ? parsed.toJSDate() : undefined;
}

/** Parses a yyyy-MM-dd calendar date as UTC midnight. */
export function parseUtcDate(text: string): Date | undefined {
  return parseUtcTimestamp(text, 'yyyy-MM-dd');
}

/**
 * Parses an ISO 8601 timestamp. Text without an offset is read as UTC,
 * never in the server's zone. Returns undefined when invalid.
 */
export function parseUtcIso(text: string): Date | undefined {
  const parsed = DateTime.fromISO(text.trim(), { zone: 'utc' });
  return parsed.isValid ? parsed.toJSDate() : undefined;
}
