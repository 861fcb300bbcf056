/**
 * Service layer for contacts.
 *
 * Provides CRUD, the filtered listing with relation preloading, and the
 * circle index.
 */

import type { Pool } from 'pg';
import { listActivitiesForContacts } from '../activities/service.ts';
import { listNotesForContacts } from '../notes/service.ts';
import { listRelationshipsForContacts } from '../relationships/service.ts';
import { listRemindersForContacts } from '../reminders/service.ts';
import { toDate, toNullableText, toStringArray, toText } from '../utils/rows.ts';
import { buildContactListSql } from './query.ts';
import {
  CONTACT_INCLUDES,
  type ContactEntry,
  type ContactField,
  type ContactInclude,
  type ContactListItem,
  type ContactListOptions,
  type ContactListResult,
  type ContactRelations,
  type ContactWithRelations,
  type CreateContactInput,
  type UpdateContactInput,
} from './types.ts';

const CONTACT_COLUMNS = `
  id::text AS id,
  firstname, lastname, nickname, gender, email, phone, birthday, address,
  how_we_met, food_preference, work_information, contact_information,
  circles, photo, created_at, updated_at
`;

/** Columns writable through create/update, in insert order. */
const WRITABLE_COLUMNS = [
  'firstname',
  'lastname',
  'nickname',
  'gender',
  'email',
  'phone',
  'birthday',
  'address',
  'how_we_met',
  'food_preference',
  'work_information',
  'contact_information',
  'circles',
] as const satisfies ReadonlyArray<keyof CreateContactInput>;

export function mapRowToContact(row: Record<string, unknown>): ContactEntry {
  return {
    id: toText(row.id),
    firstname: toText(row.firstname),
    lastname: toText(row.lastname),
    nickname: toText(row.nickname),
    gender: toText(row.gender),
    email: toText(row.email),
    phone: toText(row.phone),
    birthday: toNullableText(row.birthday),
    address: toText(row.address),
    how_we_met: toText(row.how_we_met),
    food_preference: toText(row.food_preference),
    work_information: toText(row.work_information),
    contact_information: toText(row.contact_information),
    circles: toStringArray(row.circles),
    photo: toNullableText(row.photo),
    created_at: toDate(row.created_at),
    updated_at: toDate(row.updated_at),
  };
}

/** Map a listing row, keeping only the selected fields. */
export function mapRowToListItem(row: Record<string, unknown>, fields: ContactListOptions['fields']): ContactListItem {
  const item: ContactListItem = { id: toText(row.id) };
  for (const field of fields) {
    if (field === 'id') continue;
    assignField(item, field, row[field]);
  }
  return item;
}

function assignField(item: ContactListItem, field: ContactField, value: unknown): void {
  switch (field) {
    case 'circles':
      item.circles = toStringArray(value);
      break;
    case 'birthday':
    case 'photo':
      item[field] = toNullableText(value);
      break;
    default:
      item[field] = toText(value);
  }
}

/** Normalize circle names: trimmed, non-empty, unique, in the given order. */
export function normalizeCircles(circles: string[]): string[] {
  return [...new Set(circles.map((c) => c.trim()).filter(Boolean))];
}

function columnValue(column: (typeof WRITABLE_COLUMNS)[number], input: UpdateContactInput): unknown {
  if (column === 'circles') {
    return JSON.stringify(normalizeCircles(input.circles ?? []));
  }
  const value = input[column];
  if (column === 'birthday') {
    return value === '' ? null : value;
  }
  return typeof value === 'string' ? value.trim() : value;
}

export async function createContact(pool: Pool, input: CreateContactInput): Promise<ContactEntry> {
  const columns: string[] = [];
  const placeholders: string[] = [];
  const params: unknown[] = [];

  for (const column of WRITABLE_COLUMNS) {
    if (input[column] === undefined) continue;
    columns.push(column);
    params.push(columnValue(column, input));
    placeholders.push(column === 'circles' ? `$${params.length}::jsonb` : `$${params.length}`);
  }

  const result = await pool.query(
    `INSERT INTO contact (${columns.join(', ')})
     VALUES (${placeholders.join(', ')})
     RETURNING ${CONTACT_COLUMNS}`,
    params,
  );
  return mapRowToContact(result.rows[0]);
}

export async function getContact(pool: Pool, id: string): Promise<ContactEntry | null> {
  const result = await pool.query(`SELECT ${CONTACT_COLUMNS} FROM contact WHERE id = $1`, [id]);
  return result.rows.length === 0 ? null : mapRowToContact(result.rows[0]);
}

export async function contactExists(pool: Pool, id: string): Promise<boolean> {
  const result = await pool.query('SELECT 1 FROM contact WHERE id = $1', [id]);
  return result.rows.length > 0;
}

/**
 * A contact with notes, activities, relationships and reminders attached.
 */
export async function getContactWithRelations(pool: Pool, id: string): Promise<ContactWithRelations | null> {
  const contact = await getContact(pool, id);
  if (!contact) return null;

  const relations = await loadRelations(pool, [id], CONTACT_INCLUDES);
  return { ...contact, ...emptyRelations(), ...relations.get(id) };
}

function emptyRelations(): ContactRelations {
  return { notes: [], activities: [], relationships: [], reminders: [] };
}

/**
 * Load the requested relations for a set of contacts, one query per relation.
 * Every contact in `contactIds` gets an entry, with empty arrays where it
 * has nothing.
 */
export async function loadRelations(
  pool: Pool,
  contactIds: string[],
  includes: readonly ContactInclude[],
): Promise<Map<string, Partial<ContactRelations>>> {
  const byContact = new Map<string, Partial<ContactRelations>>();
  for (const id of contactIds) {
    const entry: Partial<ContactRelations> = {};
    for (const include of includes) entry[include] = [];
    byContact.set(id, entry);
  }
  if (contactIds.length === 0 || includes.length === 0) return byContact;

  const wanted = new Set(includes);
  const [notes, activities, relationships, reminders] = await Promise.all([
    wanted.has('notes') ? listNotesForContacts(pool, contactIds) : Promise.resolve([]),
    wanted.has('activities') ? listActivitiesForContacts(pool, contactIds) : Promise.resolve([]),
    wanted.has('relationships') ? listRelationshipsForContacts(pool, contactIds) : Promise.resolve([]),
    wanted.has('reminders') ? listRemindersForContacts(pool, contactIds) : Promise.resolve([]),
  ]);

  for (const note of notes) byContact.get(note.contact_id)?.notes?.push(note);
  for (const { owner_id, activity } of activities) byContact.get(owner_id)?.activities?.push(activity);
  for (const rel of relationships) byContact.get(rel.contact_id)?.relationships?.push(rel);
  for (const reminder of reminders) byContact.get(reminder.contact_id)?.reminders?.push(reminder);

  return byContact;
}

/**
 * Lists contacts for the given normalized options.
 */
export async function listContacts(pool: Pool, options: ContactListOptions): Promise<ContactListResult> {
  const sql = buildContactListSql(options);

  const [countResult, result] = await Promise.all([
    pool.query<{ total: string }>(sql.count_text, sql.count_values),
    pool.query(sql.text, sql.values),
  ]);

  const contacts = result.rows.map((row) => mapRowToListItem(row, options.fields));

  if (options.includes.length > 0) {
    const relations = await loadRelations(
      pool,
      contacts.map((c) => c.id),
      options.includes,
    );
    for (const contact of contacts) {
      Object.assign(contact, relations.get(contact.id));
    }
  }

  return {
    contacts,
    total: parseInt(countResult.rows[0]?.total ?? '0', 10),
    page: options.page,
    limit: options.limit,
  };
}

/**
 * Updates a contact. Omitted fields keep their value. Returns null when the
 * contact does not exist.
 */
export async function updateContact(pool: Pool, id: string, input: UpdateContactInput): Promise<ContactEntry | null> {
  const updates: string[] = [];
  const params: unknown[] = [];

  for (const column of WRITABLE_COLUMNS) {
    if (input[column] === undefined) continue;
    params.push(columnValue(column, input));
    updates.push(column === 'circles' ? `${column} = $${params.length}::jsonb` : `${column} = $${params.length}`);
  }

  if (updates.length === 0) {
    return getContact(pool, id);
  }

  updates.push('updated_at = now()');
  params.push(id);

  const result = await pool.query(
    `UPDATE contact SET ${updates.join(', ')} WHERE id = $${params.length} RETURNING ${CONTACT_COLUMNS}`,
    params,
  );
  return result.rows.length === 0 ? null : mapRowToContact(result.rows[0]);
}

/**
 * Deletes a contact; notes, relationships, reminders and activity links go
 * with it. Returns the removed photo path so the caller can delete the file,
 * or null when the contact did not exist.
 */
export async function deleteContact(pool: Pool, id: string): Promise<{ photo: string | null } | null> {
  const result = await pool.query('DELETE FROM contact WHERE id = $1 RETURNING photo', [id]);
  if (result.rows.length === 0) return null;
  return { photo: toNullableText(result.rows[0].photo) };
}

/** Distinct circle names across all contacts, sorted. */
export async function listCircles(pool: Pool): Promise<string[]> {
  const result = await pool.query<{ circle: string }>(
    `SELECT DISTINCT jsonb_array_elements_text(circles) AS circle
     FROM contact
     ORDER BY circle`,
  );
  return result.rows.map((r) => r.circle);
}

/**
 * Sets (or clears) a contact's photo path. Returns the previous path, or
 * undefined when the contact does not exist.
 */
export async function setContactPhoto(pool: Pool, id: string, photo: string | null): Promise<string | null | undefined> {
  const result = await pool.query(
    `UPDATE contact c
     SET photo = $2, updated_at = now()
     FROM (SELECT id, photo AS previous FROM contact WHERE id = $1 FOR UPDATE) prev
     WHERE c.id = prev.id
     RETURNING prev.previous`,
    [id, photo],
  );
  if (result.rows.length === 0) return undefined;
  return toNullableText(result.rows[0].previous);
}
