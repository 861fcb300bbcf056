/**
 * Service layer for contact reminders.
 */

import type { Pool } from 'pg';
import { todayIso } from '../utils/validation.ts';
import { toDate, toNullableDate, toText } from '../utils/rows.ts';
import { nextRemindAt } from './recurrence.ts';
import {
  REMINDER_RECURRENCES,
  type CreateReminderInput,
  type ReminderEntry,
  type ReminderRecurrence,
  type ReminderWithContact,
  type UpdateReminderInput,
} from './types.ts';

const REMINDER_COLUMNS = `
  r.id::text AS id,
  r.contact_id::text AS contact_id,
  r.message,
  r.by_mail,
  r.remind_at::text AS remind_at,
  r.recurrence,
  r.reoccur_from_completion,
  r.completed,
  r.last_sent_at,
  r.created_at,
  r.updated_at
`;

/** Longest look-ahead accepted by {@link listUpcomingReminders}. */
export const MAX_UPCOMING_DAYS = 366;

function toRecurrence(value: unknown): ReminderRecurrence {
  const found = REMINDER_RECURRENCES.find((r) => r === value);
  if (!found) {
    throw new Error(`Unknown reminder recurrence: ${String(value)}`);
  }
  return found;
}

export function mapRowToReminder(row: Record<string, unknown>): ReminderEntry {
  return {
    id: toText(row.id),
    contact_id: toText(row.contact_id),
    message: toText(row.message),
    by_mail: row.by_mail === true,
    remind_at: toText(row.remind_at),
    recurrence: toRecurrence(row.recurrence),
    reoccur_from_completion: row.reoccur_from_completion === true,
    completed: row.completed === true,
    last_sent_at: toNullableDate(row.last_sent_at),
    created_at: toDate(row.created_at),
    updated_at: toDate(row.updated_at),
  };
}

function mapRowToReminderWithContact(row: Record<string, unknown>): ReminderWithContact {
  return {
    ...mapRowToReminder(row),
    contact_name: toText(row.contact_name),
  };
}

/**
 * Creates a reminder for a contact. The caller checks that the contact exists.
 */
export async function createReminder(pool: Pool, contactId: string, input: CreateReminderInput): Promise<ReminderEntry> {
  const result = await pool.query(
    `INSERT INTO reminder AS r (contact_id, message, by_mail, remind_at, recurrence, reoccur_from_completion)
     VALUES ($1, $2, $3, $4::date, $5, $6)
     RETURNING ${REMINDER_COLUMNS}`,
    [
      contactId,
      input.message,
      input.by_mail ?? false,
      input.remind_at,
      input.recurrence ?? 'once',
      input.reoccur_from_completion ?? false,
    ],
  );
  return mapRowToReminder(result.rows[0]);
}

export async function getReminder(pool: Pool, id: string): Promise<ReminderEntry | null> {
  const result = await pool.query(`SELECT ${REMINDER_COLUMNS} FROM reminder r WHERE r.id = $1`, [id]);
  return result.rows.length === 0 ? null : mapRowToReminder(result.rows[0]);
}

/**
 * Reminders of any of the given contacts, soonest first.
 */
export async function listRemindersForContacts(pool: Pool, contactIds: string[]): Promise<ReminderEntry[]> {
  if (contactIds.length === 0) return [];
  const result = await pool.query(
    `SELECT ${REMINDER_COLUMNS} FROM reminder r
     WHERE r.contact_id = ANY($1::uuid[])
     ORDER BY r.remind_at, r.created_at`,
    [contactIds],
  );
  return result.rows.map(mapRowToReminder);
}

/**
 * Open reminders due on or before `today + days`, overdue ones included.
 */
export async function listUpcomingReminders(
  pool: Pool,
  options: { days: number; today?: string },
): Promise<ReminderWithContact[]> {
  const days = Math.min(Math.max(options.days, 0), MAX_UPCOMING_DAYS);
  const result = await pool.query(
    `SELECT ${REMINDER_COLUMNS}, trim(c.firstname || ' ' || c.lastname) AS contact_name
     FROM reminder r
     JOIN contact c ON c.id = r.contact_id
     WHERE NOT r.completed
       AND r.remind_at <= $1::date + $2::int
     ORDER BY r.remind_at, r.created_at`,
    [options.today ?? todayIso(), days],
  );
  return result.rows.map(mapRowToReminderWithContact);
}

/**
 * Open `by_mail` reminders due by `today` that have not been mailed today.
 */
export async function listRemindersDueForMail(pool: Pool, today: string): Promise<ReminderWithContact[]> {
  const result = await pool.query(
    `SELECT ${REMINDER_COLUMNS}, trim(c.firstname || ' ' || c.lastname) AS contact_name
     FROM reminder r
     JOIN contact c ON c.id = r.contact_id
     WHERE NOT r.completed
       AND r.by_mail
       AND r.remind_at <= $1::date
       AND (r.last_sent_at IS NULL OR (r.last_sent_at AT TIME ZONE 'UTC')::date < $1::date)
     ORDER BY r.remind_at, r.created_at`,
    [today],
  );
  return result.rows.map(mapRowToReminderWithContact);
}

export async function markReminderSent(pool: Pool, id: string, sentAt: Date): Promise<void> {
  await pool.query('UPDATE reminder SET last_sent_at = $2 WHERE id = $1', [id, sentAt]);
}

export async function updateReminder(pool: Pool, id: string, input: UpdateReminderInput): Promise<ReminderEntry | null> {
  const updates: string[] = [];
  const params: unknown[] = [];
  let paramIndex = 1;

  const columns: Array<[keyof UpdateReminderInput, string]> = [
    ['message', 'message'],
    ['by_mail', 'by_mail'],
    ['remind_at', 'remind_at'],
    ['recurrence', 'recurrence'],
    ['reoccur_from_completion', 'reoccur_from_completion'],
    ['completed', 'completed'],
  ];

  for (const [key, column] of columns) {
    const value = input[key];
    if (value === undefined) continue;
    updates.push(column === 'remind_at' ? `${column} = $${paramIndex}::date` : `${column} = $${paramIndex}`);
    params.push(value);
    paramIndex++;
  }

  if (updates.length === 0) {
    return getReminder(pool, id);
  }

  updates.push('updated_at = now()');
  params.push(id);

  const result = await pool.query(
    `UPDATE reminder AS r SET ${updates.join(', ')} WHERE r.id = $${paramIndex} RETURNING ${REMINDER_COLUMNS}`,
    params,
  );
  return result.rows.length === 0 ? null : mapRowToReminder(result.rows[0]);
}

export async function deleteReminder(pool: Pool, id: string): Promise<boolean> {
  const result = await pool.query('DELETE FROM reminder WHERE id = $1 RETURNING id', [id]);
  return result.rows.length > 0;
}

/**
 * Marks a reminder done on `completedOn`.
 *
 * One-off reminders are closed. Recurring reminders stay open and move to
 * their next date; the mail stamp is cleared so the next occurrence is sent.
 * Returns null when the reminder does not exist.
 */
export async function completeReminder(
  pool: Pool,
  id: string,
  completedOn: string = todayIso(),
): Promise<ReminderEntry | null> {
  const reminder = await getReminder(pool, id);
  if (!reminder) return null;

  if (reminder.recurrence === 'once') {
    return updateReminder(pool, id, { completed: true });
  }

  const next = nextRemindAt(reminder.recurrence, reminder.remind_at, completedOn, reminder.reoccur_from_completion);
  const result = await pool.query(
    `UPDATE reminder AS r
     SET remind_at = $2::date, completed = false, last_sent_at = NULL, updated_at = now()
     WHERE r.id = $1
     RETURNING ${REMINDER_COLUMNS}`,
    [id, next],
  );
  return result.rows.length === 0 ? null : mapRowToReminder(result.rows[0]);
}
