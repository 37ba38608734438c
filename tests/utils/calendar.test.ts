/**
 * @file Tests for calendar arithmetic and time-zone conversion
 */

import {
  addDays,
  compareDates,
  dayOfWeek,
  formatIsoDate,
  isLeapYear,
  nthWeekdayOfMonth,
  parseIsoDate,
} from '../../src/utils/calendar';
import { isValidTimeZone, localDate, zonedToUtc } from '../../src/utils/timezone';

describe('calendar', () => {
  it('should reject impossible dates', () => {
    expect(parseIsoDate('2023-02-30')).toBeNull();
    expect(parseIsoDate('2023-13-01')).toBeNull();
    expect(parseIsoDate('06/10/2025')).toBeNull();
    expect(parseIsoDate('2024-02-29')).toEqual({ year: 2024, month: 2, day: 29 });
  });

  it('should format with zero padding', () => {
    expect(formatIsoDate({ year: 2025, month: 6, day: 3 })).toBe('2025-06-03');
  });

  it('should know leap years', () => {
    expect(isLeapYear(2024)).toBe(true);
    expect(isLeapYear(2025)).toBe(false);
    expect(isLeapYear(1900)).toBe(false);
    expect(isLeapYear(2000)).toBe(true);
  });

  it('should add days across month and year ends', () => {
    expect(addDays({ year: 2025, month: 6, day: 10 }, -14)).toEqual({ year: 2025, month: 5, day: 27 });
    expect(addDays({ year: 2025, month: 12, day: 30 }, 3)).toEqual({ year: 2026, month: 1, day: 2 });
    expect(addDays({ year: 2024, month: 3, day: 1 }, -1)).toEqual({ year: 2024, month: 2, day: 29 });
  });

  it('should compare dates', () => {
    expect(compareDates({ year: 2025, month: 1, day: 2 }, { year: 2025, month: 1, day: 1 })).toBeGreaterThan(0);
    expect(compareDates({ year: 2025, month: 1, day: 1 }, { year: 2025, month: 1, day: 1 })).toBe(0);
  });

  it('should find the nth weekday of a month', () => {
    expect(dayOfWeek({ year: 2025, month: 6, day: 1 })).toBe(0);
    expect(nthWeekdayOfMonth(2025, 5, 0, 2)).toEqual({ year: 2025, month: 5, day: 11 });
    expect(nthWeekdayOfMonth(2025, 6, 0, 3)).toEqual({ year: 2025, month: 6, day: 15 });
  });
});

describe('timezone', () => {
  it('should validate IANA zone names', () => {
    expect(isValidTimeZone('America/New_York')).toBe(true);
    expect(isValidTimeZone('Mars/Olympus_Mons')).toBe(false);
  });

  it('should read the local date in a zone', () => {
    const instant = new Date('2025-05-02T02:00:00.000Z');
    expect(localDate(instant, 'America/New_York')).toEqual({ year: 2025, month: 5, day: 1 });
    expect(localDate(instant, 'UTC')).toEqual({ year: 2025, month: 5, day: 2 });
  });

  it('should convert wall-clock time to UTC', () => {
    expect(zonedToUtc({ year: 2025, month: 5, day: 27 }, 9, 0, 'America/New_York').toISOString()).toBe(
      '2025-05-27T13:00:00.000Z'
    );
    expect(zonedToUtc({ year: 2025, month: 1, day: 15 }, 9, 0, 'America/New_York').toISOString()).toBe(
      '2025-01-15T14:00:00.000Z'
    );
  });

  it('should resolve a skipped time to just after the gap', () => {
    // 02:30 does not exist on 2025-03-09 in New York
    expect(zonedToUtc({ year: 2025, month: 3, day: 9 }, 2, 30, 'America/New_York').toISOString()).toBe(
      '2025-03-09T07:30:00.000Z'
    );
  });

  it('should resolve a repeated time to its first occurrence', () => {
    expect(zonedToUtc({ year: 2025, month: 11, day: 2 }, 1, 30, 'America/New_York').toISOString()).toBe(
      '2025-11-02T05:30:00.000Z'
    );
  });
});
