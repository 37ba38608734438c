/**
 * @file Quiet hours and time-zone resolution.
 */

import stateTimezones from '../../data/us_state_timezones.json';
import { addDays, type CalendarDate } from '../../utils/calendar';
import { isValidTimeZone, zonedToUtc } from '../../utils/timezone';
import type { UserSettings } from '../../models/user';
import type { VaultLocation } from '../../models/vault';

const STATE_TIMEZONES: Record<string, string> = stateTimezones;

export interface LocalSlot {
  date: CalendarDate;
  hour: number;
  minute: number;
}

/**
 * True when `hour` is inside [start, end). The window may wrap midnight;
 * start === end means no quiet hours.
 */
export function isQuietHour(hour: number, start: number, end: number): boolean {
  if (start === end) return false;
  if (start < end) return hour >= start && hour < end;
  return hour >= start || hour < end;
}

/**
 * Move a slot that falls in quiet hours to the end of that window, which is
 * the next day when the window wraps midnight and the slot is before it.
 */
export function deferPastQuietHours(slot: LocalSlot, start: number, end: number): LocalSlot {
  if (!isQuietHour(slot.hour, start, end)) return slot;

  const wrapsAndLate = start > end && slot.hour >= start;
  return {
    date: wrapsAndLate ? addDays(slot.date, 1) : slot.date,
    hour: end,
    minute: 0,
  };
}

/**
 * Explicit user zone, else the zone of the vault's US state, else the default.
 */
export function resolveTimezone(
  settings: Pick<UserSettings, 'timezone'> | null,
  location: VaultLocation | undefined,
  defaultTimezone: string
): string {
  if (settings?.timezone && isValidTimeZone(settings.timezone)) {
    return settings.timezone;
  }
  const state = location?.state?.trim().toUpperCase();
  if (state && STATE_TIMEZONES[state]) {
    return STATE_TIMEZONES[state];
  }
  return defaultTimezone;
}

/**
 * UTC instant for a lead time: `daysBefore` days ahead of the occurrence at the
 * send hour, pushed past quiet hours.
 */
export function deliveryInstant(
  occurrence: CalendarDate,
  daysBefore: number,
  options: { sendHour: number; quietHoursStart: number; quietHoursEnd: number; timeZone: string }
): { instant: Date; local: LocalSlot } {
  const target: LocalSlot = { date: addDays(occurrence, -daysBefore), hour: options.sendHour, minute: 0 };
  const local = deferPastQuietHours(target, options.quietHoursStart, options.quietHoursEnd);
  return { instant: zonedToUtc(local.date, local.hour, local.minute, options.timeZone), local };
}
