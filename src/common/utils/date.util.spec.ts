import { isoWeekOf, parseUtcDate, parseUtcIso, parseUtcTimestamp, utcDateKey, utcDayStart, utcHour } from './date.util';

describe('date utils', () => {
  it('should bucket by the UTC calendar day and hour', () => {
    const late = new Date('2024-03-04T23:59:59Z');

    expect(utcDateKey(late)).toBe('2024-03-04');
    expect(utcDayStart(late).toISOString()).toBe('2024-03-04T00:00:00.000Z');
    expect(utcHour(late)).toBe(23);
  });

  it('should take the ISO week of a Sunday from the preceding Monday', () => {
    const week = isoWeekOf(new Date('2024-03-10T18:00:00Z'));

    expect(week.weekYear).toBe(2024);
    expect(week.weekNumber).toBe(10);
    expect(week.start.toISOString()).toBe('2024-03-04T00:00:00.000Z');
    expect(week.end.toISOString()).toBe('2024-03-10T23:59:59.000Z');
  });

  it('should place early January in the last week of the previous ISO year', () => {
    const week = isoWeekOf(new Date('2021-01-01T12:00:00Z'));

    expect(week.weekYear).toBe(2020);
    expect(week.weekNumber).toBe(53);
  });

  it('should parse broker timestamps as UTC', () => {
    expect(parseUtcTimestamp('2024-03-04 09:30:15')?.toISOString()).toBe('2024-03-04T09:30:15.000Z');
    expect(parseUtcTimestamp('2024-03-04T09:30:15')).toBeUndefined();
    expect(parseUtcTimestamp('2024-02-30 09:30:15')).toBeUndefined();
  });

  it('should parse calendar dates as UTC midnight', () => {
    expect(parseUtcDate('2024-03-04')?.toISOString()).toBe('2024-03-04T00:00:00.000Z');
    expect(parseUtcDate('04/03/2024')).toBeUndefined();
  });

  it('should read ISO timestamps as UTC unless they carry an offset', () => {
    expect(parseUtcIso('2024-03-04T23:30:00')?.toISOString()).toBe('2024-03-04T23:30:00.000Z');
    expect(parseUtcIso('2024-03-04T23:30:00+01:00')?.toISOString()).toBe('2024-03-04T22:30:00.000Z');
    expect(parseUtcIso('yesterday')).toBeUndefined();
  });
});
