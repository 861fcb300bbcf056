/**
 * Birthday values and date matching.
 *
 * Birthdays are stored as `YYYY-MM-DD`, or `--MM-DD` when the year is not
 * known (the vCard convention). Both forms end in `MM-DD`, which is what the
 * daily lookup compares.
 */

export interface ParsedBirthday {
  year: number | null;
  month: number;
  day: number;
}

const BIRTHDAY_REGEX = /^(\d{4}|-)-(\d{2})-(\d{2})$/;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(month: number, year: number | null): number {
  if (month === 2) {
    // Without a year, 29 February is allowed.
    return year === null || isLeapYear(year) ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/** Parse a stored birthday; null when the value is malformed or not a real date. */
export function parseBirthday(value: string): ParsedBirthday | null {
  const m = BIRTHDAY_REGEX.exec(value);
  if (!m) return null;

  const year = m[1] === '-' ? null : parseInt(m[1], 10);
  const month = parseInt(m[2], 10);
  const day = parseInt(m[3], 10);

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(month, year)) return null;
  return { year, month, day };
}

export function isValidBirthday(value: string): boolean {
  return parseBirthday(value) !== null;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * The `MM-DD` keys whose birthdays fall on `date` (UTC). On 28 February of a
 * common year this includes `02-29`, so leap-day birthdays are not skipped.
 */
export function birthdayKeysFor(date: Date): string[] {
  const month = date.getUTCMonth() + 1;
  const day = date.getUTCDate();
  const keys = [`${pad2(month)}-${pad2(day)}`];
  if (month === 2 && day === 28 && !isLeapYear(date.getUTCFullYear())) {
    keys.push('02-29');
  }
  return keys;
}

/**
 * Human-readable age on `date`, e.g. "34 years old", or "unknown age" when
 * the birth year is not recorded.
 */
export function describeAge(birthday: string, date: Date): string {
  const parsed = parseBirthday(birthday);
  if (!parsed || parsed.year === null) {
    return 'unknown age';
  }

  let age = date.getUTCFullYear() - parsed.year;
  const month = date.getUTCMonth() + 1;
  const day = date.getUTCDate();
  if (month < parsed.month || (month === parsed.month && day < parsed.day)) {
    age -= 1;
  }
  // Leap-day birthdays celebrated on 28 February count as reached.
  if (parsed.month === 2 && parsed.day === 29 && month === 2 && day === 28 && !isLeapYear(date.getUTCFullYear())) {
    age += 1;
  }
  return `${age} years old`;
}
