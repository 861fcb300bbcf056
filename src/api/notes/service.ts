/**
 * Service layer for contact notes.
 */

import type { Pool } from 'pg';
import { toDate, toText } from '../utils/rows.ts';
import { todayIso } from '../utils/validation.ts';
import type { CreateNoteInput, NoteEntry, UpdateNoteInput } from './types.ts';

const NOTE_COLUMNS = `
  id::text AS id,
  contact_id::text AS contact_id,
  content,
  date::text AS date,
  created_at,
  updated_at
`;

export function mapRowToNote(row: Record<string, unknown>): NoteEntry {
  return {
    id: String(row.id),
    contact_id: String(row.contact_id),
    content: toText(row.content),
    date: toText(row.date),
    created_at: toDate(row.created_at),
    updated_at: toDate(row.updated_at),
  };
}

/**
 * Creates a note for a contact. The caller checks that the contact exists.
 */
export async function createNote(pool: Pool, contactId: string, input: CreateNoteInput): Promise<NoteEntry> {
  const result = await pool.query(
    `INSERT INTO note (contact_id, content, date)
     VALUES ($1, $2, $3::date)
     RETURNING ${NOTE_COLUMNS}`,
    [contactId, input.content, input.date ?? todayIso()],
  );
  return mapRowToNote(result.rows[0]);
}

export async function getNote(pool: Pool, id: string): Promise<NoteEntry | null> {
  const result = await pool.query(`SELECT ${NOTE_COLUMNS} FROM note WHERE id = $1`, [id]);
  return result.rows.length === 0 ? null : mapRowToNote(result.rows[0]);
}

/**
 * Notes for any of the given contacts, newest first.
 */
export async function listNotesForContacts(pool: Pool, contactIds: string[]): Promise<NoteEntry[]> {
  if (contactIds.length === 0) return [];
  const result = await pool.query(
    `SELECT ${NOTE_COLUMNS} FROM note
     WHERE contact_id = ANY($1::uuid[])
     ORDER BY date DESC, created_at DESC`,
    [contactIds],
  );
  return result.rows.map(mapRowToNote);
}

export async function updateNote(pool: Pool, id: string, input: UpdateNoteInput): Promise<NoteEntry | null> {
  const updates: string[] = [];
  const params: unknown[] = [];
  let paramIndex = 1;

  if (input.content !== undefined) {
    updates.push(`content = $${paramIndex}`);
    params.push(input.content);
    paramIndex++;
  }

  if (input.date !== undefined) {
    updates.push(`date = $${paramIndex}::date`);
    params.push(input.date);
    paramIndex++;
  }

  if (updates.length === 0) {
    return getNote(pool, id);
  }

  updates.push('updated_at = now()');
  params.push(id);

  const result = await pool.query(
    `UPDATE note SET ${updates.join(', ')} WHERE id = $${paramIndex} RETURNING ${NOTE_COLUMNS}`,
    params,
  );
  return result.rows.length === 0 ? null : mapRowToNote(result.rows[0]);
}

export async function deleteNote(pool: Pool, id: string): Promise<boolean> {
  const result = await pool.query('DELETE FROM note WHERE id = $1 RETURNING id', [id]);
  return result.rows.length > 0;
}
