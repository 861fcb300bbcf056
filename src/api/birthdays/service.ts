/**
 * Daily birthday notifications.
 */

import type { Pool } from 'pg';
import type { TemplateMailer } from '../../email/mailer.ts';
import { toText } from '../utils/rows.ts';
import { birthdayKeysFor, describeAge } from './birthday.ts';

export interface BirthdayContact {
  id: string;
  firstname: string;
  lastname: string;
  nickname: string;
  birthday: string;
}

/** Template variables of the birthday email. */
export interface BirthdayTemplateModel {
  [key: string]: string;
  birthday_person_nick: string;
  birthday_person: string;
  birthday_age: string;
}

export interface BirthdayJobResult {
  matched: number;
  sent: number;
  failed: number;
  /** Mail is not configured, so nothing was attempted */
  skipped: boolean;
}

/**
 * Contacts whose birthday falls on `date` (UTC), by name.
 */
export async function findBirthdayContacts(pool: Pool, date: Date): Promise<BirthdayContact[]> {
  const result = await pool.query(
    `SELECT id::text AS id, firstname, lastname, nickname, birthday
     FROM contact
     WHERE birthday IS NOT NULL AND right(birthday, 5) = ANY($1::text[])
     ORDER BY lastname, firstname`,
    [birthdayKeysFor(date)],
  );
  return result.rows.map((row) => ({
    id: toText(row.id),
    firstname: toText(row.firstname),
    lastname: toText(row.lastname),
    nickname: toText(row.nickname),
    birthday: toText(row.birthday),
  }));
}

export function birthdayTemplateModel(contact: BirthdayContact, date: Date): BirthdayTemplateModel {
  const nickname = contact.nickname.trim();
  return {
    birthday_person_nick: nickname || contact.firstname,
    birthday_person: `${contact.firstname} ${contact.lastname}`.trim(),
    birthday_age: describeAge(contact.birthday, date),
  };
}

export interface BirthdayJobDeps {
  pool: Pool;
  mailer: TemplateMailer;
  template: string;
  now?: () => Date;
}

/**
 * Sends one templated email per contact whose birthday is today. A failed
 * send is counted and the rest still go out.
 */
export async function sendBirthdayReminders(deps: BirthdayJobDeps): Promise<BirthdayJobResult> {
  const today = (deps.now ?? (() => new Date()))();
  const contacts = await findBirthdayContacts(deps.pool, today);

  if (contacts.length === 0) {
    console.log('[BirthdayJob] No birthdays today');
    return { matched: 0, sent: 0, failed: 0, skipped: false };
  }

  if (!deps.mailer.isConfigured()) {
    console.warn(`[BirthdayJob] ${contacts.length} birthday(s) today but mail is not configured`);
    return { matched: contacts.length, sent: 0, failed: 0, skipped: true };
  }

  let sent = 0;
  let failed = 0;
  for (const contact of contacts) {
    const result = await deps.mailer.send(deps.template, birthdayTemplateModel(contact, today));
    if (result.delivered) {
      sent++;
    } else {
      failed++;
      console.error(`[BirthdayJob] Reminder for contact ${contact.id} not delivered: ${result.error ?? 'unknown error'}`);
    }
  }

  console.log(`[BirthdayJob] ${contacts.length} birthday(s): ${sent} sent, ${failed} failed`);
  return { matched: contacts.length, sent, failed, skipped: false };
}
