import type { Contact } from '@contacts/database';

/** Size of the upcoming-birthday window, in days (inclusive on both ends). */
export const BIRTHDAY_WINDOW_DAYS = 7;

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})/;

interface MonthDay {
  month: number;
  day: number;
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function parseMonthDay(dateOfBirth: string): MonthDay | null {
  const match = CALENDAR_DATE.exec(dateOfBirth);
  if (!match) return null;

  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;

  return { month, day };
}

/**
 * Midnight UTC of the birthday in `year`. Feb 29 falls on Mar 1 in
 * non-leap years.
 */
function anchorToYear({ month, day }: MonthDay, year: number): number {
  if (month === 2 && day === 29 && !isLeapYear(year)) {
    return Date.UTC(year, 2, 1);
  }
  return Date.UTC(year, month - 1, day);
}

/**
 * Whole days from `today` (local calendar date) to the next occurrence of
 * the birthday. 0 means today. A birthday already past this year counts
 * towards next year's occurrence, so Dec 29 → Jan 2 is 4.
 *
 * Returns null when `dateOfBirth` is not a `YYYY-MM-DD` date.
 */
export function daysUntilNextBirthday(
  dateOfBirth: string,
  today: Date,
): number | null {
  const birthday = parseMonthDay(dateOfBirth);
  if (!birthday) return null;

  const year = today.getFullYear();
  const todayUtc = Date.UTC(year, today.getMonth(), today.getDate());

  let next = anchorToYear(birthday, year);
  if (next < todayUtc) {
    next = anchorToYear(birthday, year + 1);
  }

  return Math.round((next - todayUtc) / MS_PER_DAY);
}

/**
 * Keeps the contacts whose birthday falls within
 * [today, today + windowDays]. Input order is preserved.
 */
export function selectUpcomingBirthdays(
  contacts: ReadonlyArray<Contact>,
  today: Date,
  windowDays: number = BIRTHDAY_WINDOW_DAYS,
): Contact[] {
  return contacts.filter((contact) => {
    const days = daysUntilNextBirthday(contact.dateOfBirth, today);
    return days !== null && days <= windowDays;
  });
}
