/**
 * Rescheduling of recurring reminders.
 *
 * Each recurrence maps onto an RRULE; dates are whole days handled as UTC
 * midnights so no timezone shifts creep in.
 */

import { RRule, type Frequency, type Options } from 'rrule';
import type { ReminderRecurrence } from './types.ts';

const RULES: Record<Exclude<ReminderRecurrence, 'once'>, { freq: Frequency; interval: number }> = {
  weekly: { freq: RRule.WEEKLY, interval: 1 },
  monthly: { freq: RRule.MONTHLY, interval: 1 },
  quarterly: { freq: RRule.MONTHLY, interval: 3 },
  'six-months': { freq: RRule.MONTHLY, interval: 6 },
  yearly: { freq: RRule.YEARLY, interval: 1 },
};

function parseDay(day: string): Date {
  return new Date(`${day}T00:00:00Z`);
}

function formatDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * The next `remind_at` after completing a recurring reminder on `completedOn`.
 *
 * The series is anchored on `completedOn` when `fromCompletion` is set and on
 * `remindAt` otherwise. The result is the first occurrence after both
 * `remindAt` and `completedOn`, so completing early still advances.
 *
 * An anchor past the 28th falls on the last day of shorter months, so a
 * reminder due on 31 January comes back on 28 February and one due on
 * 29 February comes back on 28 February in common years.
 */
export function nextRemindAt(
  recurrence: Exclude<ReminderRecurrence, 'once'>,
  remindAt: string,
  completedOn: string,
  fromCompletion: boolean,
): string {
  const { freq, interval } = RULES[recurrence];
  const anchor = parseDay(fromCompletion ? completedOn : remindAt);
  const options: Partial<Options> = { freq, interval, dtstart: anchor };
  if (freq !== RRule.WEEKLY && anchor.getUTCDate() > 28) {
    options.bymonthday = [anchor.getUTCDate(), -1];
    options.bysetpos = [1];
    if (freq === RRule.YEARLY) options.bymonth = [anchor.getUTCMonth() + 1];
  }
  const rule = new RRule(options);

  const after = remindAt > completedOn ? parseDay(remindAt) : parseDay(completedOn);
  const next = rule.after(after, false);
  if (!next) {
    throw new Error(`No occurrence of ${recurrence} after ${formatDay(after)}`);
  }
  return formatDay(next);
}
