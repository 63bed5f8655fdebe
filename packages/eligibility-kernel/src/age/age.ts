// Eligibility Kernel - Age arithmetic (v1)
//
// Day-precision age from a MM/DD/YYYY birth date. The reference date is always
// passed in; this module never reads the clock.

export type CalendarDateV1 = {
  year: number;
  month: number; // 1-12
  day: number; // 1-31
};

const DOB_RE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

function daysInMonth(year: number, month: number): number {
  // Day 0 of the next month is the last day of this one.
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Parses `MM/DD/YYYY` (one or two digit month and day) into a real calendar date.
 * Returns null for other shapes and for dates that do not exist (02/30, 13/01).
 */
export function parseDobV1(text: string): CalendarDateV1 | null {
  const m = DOB_RE.exec(text.trim());
  if (!m) return null;
  const month = Number(m[1]);
  const day = Number(m[2]);
  const year = Number(m[3]);
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  return { year, month, day };
}

/**
 * Local calendar date of a timestamp.
 */
export function calendarDateOfV1(ts: number): CalendarDateV1 {
  const d = new Date(ts);
  return { year: d.getFullYear(), month: d.getMonth() + 1, day: d.getDate() };
}

/**
 * Whole years between `birth` and `today`, minus one if this year's birthday has not come yet.
 */
export function ageOnV1(birth: CalendarDateV1, today: CalendarDateV1): number {
  const beforeBirthday = today.month < birth.month || (today.month === birth.month && today.day < birth.day);
  return today.year - birth.year - (beforeBirthday ? 1 : 0);
}
