/**
 * @file When does a milestone next happen, in the user's local calendar.
 */

import {
  compareDates,
  isLeapYear,
  nthWeekdayOfMonth,
  parseIsoDate,
  type CalendarDate,
} from '../../utils/calendar';
import { InvariantViolationError } from '../../utils/errors';
import type { Milestone } from '../../models/vault';

const SUNDAY = 0;
const MAY = 5;
const JUNE = 6;

/**
 * The milestone's date in a given year. Floating holidays are recomputed per
 * year; Feb 29 falls on Feb 28 in non-leap years.
 */
export function occurrenceInYear(
  milestone: Pick<Milestone, 'name' | 'type' | 'date'>,
  year: number
): CalendarDate {
  if (milestone.type === 'holiday') {
    const name = milestone.name.toLowerCase();
    if (name.includes('mother')) return nthWeekdayOfMonth(year, MAY, SUNDAY, 2);
    if (name.includes('father')) return nthWeekdayOfMonth(year, JUNE, SUNDAY, 3);
  }

  const stored = parseIsoDate(milestone.date);
  if (!stored) {
    throw new InvariantViolationError(`Milestone date is not a calendar date: ${milestone.date}`);
  }
  if (stored.month === 2 && stored.day === 29 && !isLeapYear(year)) {
    return { year, month: 2, day: 28 };
  }
  return { year, month: stored.month, day: stored.day };
}

/**
 * First occurrence on or after `today`. One-time milestones only have an
 * occurrence while their date is still ahead of today.
 */
export function nextOccurrence(
  milestone: Pick<Milestone, 'name' | 'type' | 'date' | 'recurrence'>,
  today: CalendarDate
): CalendarDate | null {
  if (milestone.recurrence === 'one_time') {
    const date = parseIsoDate(milestone.date);
    if (!date) {
      throw new InvariantViolationError(`Milestone date is not a calendar date: ${milestone.date}`);
    }
    return compareDates(date, today) > 0 ? date : null;
  }

  const thisYear = occurrenceInYear(milestone, today.year);
  return compareDates(thisYear, today) >= 0 ? thisYear : occurrenceInYear(milestone, today.year + 1);
}

/**
 * The yearly occurrence after `occurrence`.
 */
export function followingOccurrence(
  milestone: Pick<Milestone, 'name' | 'type' | 'date'>,
  occurrence: CalendarDate
): CalendarDate {
  return occurrenceInYear(milestone, occurrence.year + 1);
}
