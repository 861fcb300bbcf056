/**
 * Daily mail for reminders that are due.
 */

import type { Pool } from 'pg';
import type { TemplateMailer } from '../../email/mailer.ts';
import { todayIso } from '../utils/validation.ts';
import { listRemindersDueForMail, markReminderSent } from './service.ts';
import type { ReminderWithContact } from './types.ts';

export interface ReminderMailJobResult {
  due: number;
  sent: number;
  failed: number;
  skipped: boolean;
}

export interface ReminderMailJobDeps {
  pool: Pool;
  mailer: TemplateMailer;
  template: string;
  now?: () => Date;
}

export function reminderTemplateModel(reminder: ReminderWithContact): Record<string, string> {
  return {
    reminder_message: reminder.message,
    contact_name: reminder.contact_name,
    remind_at: reminder.remind_at,
  };
}

/**
 * Mails each open `by_mail` reminder that is due and not yet mailed today,
 * then stamps it so a rerun the same day does not send it twice.
 */
export async function sendDueReminderMail(deps: ReminderMailJobDeps): Promise<ReminderMailJobResult> {
  const now = (deps.now ?? (() => new Date()))();
  const due = await listRemindersDueForMail(deps.pool, todayIso(now));

  if (due.length === 0) {
    return { due: 0, sent: 0, failed: 0, skipped: false };
  }

  if (!deps.mailer.isConfigured()) {
    console.warn(`[ReminderJob] ${due.length} reminder(s) due but mail is not configured`);
    return { due: due.length, sent: 0, failed: 0, skipped: true };
  }

  let sent = 0;
  let failed = 0;
  for (const reminder of due) {
    const result = await deps.mailer.send(deps.template, reminderTemplateModel(reminder));
    if (result.delivered) {
      try {
        await markReminderSent(deps.pool, reminder.id, now);
        sent++;
      } catch (err) {
        // Delivered but not stamped, so a rerun today may mail it again
        failed++;
        console.error(`[ReminderJob] Reminder ${reminder.id} sent but not marked: ${(err as Error).message}`);
      }
    } else {
      failed++;
      console.error(`[ReminderJob] Reminder ${reminder.id} not delivered: ${result.error ?? 'unknown error'}`);
    }
  }

  console.log(`[ReminderJob] ${due.length} due: ${sent} sent, ${failed} failed`);
  return { due: due.length, sent, failed, skipped: false };
}
