/**
 * Types for contact reminders.
 */

export const REMINDER_RECURRENCES = ['once', 'weekly', 'monthly', 'quarterly', 'six-months', 'yearly'] as const;

export type ReminderRecurrence = (typeof REMINDER_RECURRENCES)[number];

export interface ReminderEntry {
  id: string;
  contact_id: string;
  message: string;
  /** Email the reminder when it falls due */
  by_mail: boolean;
  /** `YYYY-MM-DD` */
  remind_at: string;
  recurrence: ReminderRecurrence;
  /**
   * When completing a recurring reminder, count the next interval from the
   * completion date instead of from `remind_at`.
   */
  reoccur_from_completion: boolean;
  completed: boolean;
  last_sent_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

/** A reminder joined with its contact's display name. */
export interface ReminderWithContact extends ReminderEntry {
  contact_name: string;
}

export interface CreateReminderInput {
  message: string;
  remind_at: string;
  by_mail?: boolean;
  recurrence?: ReminderRecurrence;
  reoccur_from_completion?: boolean;
}

export interface UpdateReminderInput {
  message?: string;
  remind_at?: string;
  by_mail?: boolean;
  recurrence?: ReminderRecurrence;
  reoccur_from_completion?: boolean;
  completed?: boolean;
}
