/**
 * @file Wall-clock conversions for IANA time zones using Intl.
 */

import type { CalendarDate } from './calendar';
import { compareDates } from './calendar';

export interface ZonedDateTime extends CalendarDate {
  hour: number;
  minute: number;
  second: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

export function isValidTimeZone(timeZone: string): boolean {
  if (!timeZone) return false;
  try {
    formatterFor(timeZone);
    return true;
  } catch {
    return false;
  }
}

/**
 * Local wall-clock fields of an instant in the given zone.
 */
export function toZoned(instant: Date, timeZone: string): ZonedDateTime {
  const fields: Record<string, number> = {};
  for (const part of formatterFor(timeZone).formatToParts(instant)) {
    if (part.type !== 'literal') {
      fields[part.type] = Number(part.value);
    }
  }
  return {
    year: fields.year,
    month: fields.month,
    day: fields.day,
    hour: fields.hour === 24 ? 0 : fields.hour,
    minute: fields.minute,
    second: fields.second,
  };
}

/**
 * The user's local calendar date at the given instant.
 */
export function localDate(instant: Date, timeZone: string): CalendarDate {
  const { year, month, day } = toZoned(instant, timeZone);
  return { year, month, day };
}

function offsetMs(epochMs: number, timeZone: string): number {
  const z = toZoned(new Date(epochMs), timeZone);
  const asUtc = Date.UTC(z.year, z.month - 1, z.day, z.hour, z.minute, z.second);
  return asUtc - Math.floor(epochMs / 1000) * 1000;
}

function matches(epochMs: number, date: CalendarDate, hour: number, minute: number, timeZone: string): boolean {
  const z = toZoned(new Date(epochMs), timeZone);
  return compareDates(z, date) === 0 && z.hour === hour && z.minute === minute;
}

/**
 * The UTC instant of a local wall-clock time.
 * A time skipped by a DST gap resolves to the instant just after the gap
 * (02:30 on a spring-forward day becomes 03:30 daylight time); a repeated
 * time resolves to its first occurrence.
 */
export function zonedToUtc(date: CalendarDate, hour: number, minute: number, timeZone: string): Date {
  const wallAsUtc = Date.UTC(date.year, date.month - 1, date.day, hour, minute);

  const first = wallAsUtc - offsetMs(wallAsUtc, timeZone);
  const second = wallAsUtc - offsetMs(first, timeZone);
  const candidates = Array.from(new Set([Math.min(first, second), Math.max(first, second)]));

  for (const candidate of candidates) {
    if (matches(candidate, date, hour, minute, timeZone)) {
      return new Date(candidate);
    }
  }
  return new Date(Math.max(first, second));
}
