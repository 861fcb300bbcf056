/**
 * Service layer for activities and their participants.
 */

import type { Pool, PoolClient } from 'pg';
import { toDate, toStringArray, toText } from '../utils/rows.ts';
import { todayIso } from '../utils/validation.ts';
import type {
  ActivityEntry,
  CreateActivityInput,
  ListActivitiesOptions,
  ListActivitiesResult,
  UpdateActivityInput,
} from './types.ts';

/** One or more participant IDs do not name a contact. */
export class UnknownParticipantError extends Error {
  constructor(public contact_ids: string[]) {
    super(`Unknown contact(s): ${contact_ids.join(', ')}`);
    this.name = 'UnknownParticipantError';
  }
}

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 200;

const ACTIVITY_COLUMNS = `
  a.id::text AS id,
  a.name,
  a.description,
  a.date::text AS date,
  COALESCE(
    (SELECT array_agg(ac.contact_id::text ORDER BY ac.contact_id)
       FROM activity_contact ac
      WHERE ac.activity_id = a.id),
    '{}'
  ) AS contact_ids,
  a.created_at,
  a.updated_at
`;

export function mapRowToActivity(row: Record<string, unknown>): ActivityEntry {
  return {
    id: toText(row.id),
    name: toText(row.name),
    description: toText(row.description),
    date: toText(row.date),
    contact_ids: toStringArray(row.contact_ids),
    created_at: toDate(row.created_at),
    updated_at: toDate(row.updated_at),
  };
}

async function assertContactsExist(client: PoolClient, contactIds: string[]): Promise<void> {
  if (contactIds.length === 0) return;
  const found = await client.query<{ id: string }>(
    'SELECT id::text AS id FROM contact WHERE id = ANY($1::uuid[])',
    [contactIds],
  );
  const foundIds = new Set(found.rows.map((r) => r.id));
  const missing = contactIds.filter((id) => !foundIds.has(id));
  if (missing.length > 0) {
    throw new UnknownParticipantError(missing);
  }
}

async function setParticipants(client: PoolClient, activityId: string, contactIds: string[]): Promise<void> {
  await client.query('DELETE FROM activity_contact WHERE activity_id = $1', [activityId]);
  if (contactIds.length === 0) return;
  await client.query(
    `INSERT INTO activity_contact (activity_id, contact_id)
     SELECT $1, unnest($2::uuid[])
     ON CONFLICT DO NOTHING`,
    [activityId, contactIds],
  );
}

async function withTransaction<T>(pool: Pool, fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

const SELECT_BY_ID = `SELECT ${ACTIVITY_COLUMNS} FROM activity a WHERE a.id = $1`;

export async function getActivity(pool: Pool, id: string): Promise<ActivityEntry | null> {
  const result = await pool.query(SELECT_BY_ID, [id]);
  return result.rows.length === 0 ? null : mapRowToActivity(result.rows[0]);
}

async function getActivityInTransaction(client: PoolClient, id: string): Promise<ActivityEntry | null> {
  const result = await client.query(SELECT_BY_ID, [id]);
  return result.rows.length === 0 ? null : mapRowToActivity(result.rows[0]);
}

/**
 * Creates an activity and links its participants in one transaction.
 *
 * @throws UnknownParticipantError if any contact ID does not exist
 */
export async function createActivity(pool: Pool, input: CreateActivityInput): Promise<ActivityEntry> {
  const contactIds = [...new Set(input.contact_ids)];

  return withTransaction(pool, async (client) => {
    await assertContactsExist(client, contactIds);

    const inserted = await client.query<{ id: string }>(
      `INSERT INTO activity (name, description, date)
       VALUES ($1, $2, $3::date)
       RETURNING id::text AS id`,
      [input.name, input.description ?? '', input.date ?? todayIso()],
    );
    const id = inserted.rows[0].id;
    await setParticipants(client, id, contactIds);

    const created = await getActivityInTransaction(client, id);
    if (!created) {
      throw new Error('Activity vanished after insert');
    }
    return created;
  });
}

/**
 * Updates an activity. Returns null when it does not exist.
 *
 * @throws UnknownParticipantError if a new participant does not exist
 */
export async function updateActivity(pool: Pool, id: string, input: UpdateActivityInput): Promise<ActivityEntry | null> {
  return withTransaction(pool, async (client) => {
    const existing = await client.query('SELECT 1 FROM activity WHERE id = $1 FOR UPDATE', [id]);
    if (existing.rows.length === 0) return null;

    const updates: string[] = [];
    const params: unknown[] = [];
    let paramIndex = 1;

    if (input.name !== undefined) {
      updates.push(`name = $${paramIndex}`);
      params.push(input.name);
      paramIndex++;
    }

    if (input.description !== undefined) {
      updates.push(`description = $${paramIndex}`);
      params.push(input.description);
      paramIndex++;
    }

    if (input.date !== undefined) {
      updates.push(`date = $${paramIndex}::date`);
      params.push(input.date);
      paramIndex++;
    }

    if (input.contact_ids !== undefined) {
      const contactIds = [...new Set(input.contact_ids)];
      await assertContactsExist(client, contactIds);
      await setParticipants(client, id, contactIds);
    }

    if (updates.length > 0 || input.contact_ids !== undefined) {
      updates.push('updated_at = now()');
      params.push(id);
      await client.query(`UPDATE activity SET ${updates.join(', ')} WHERE id = $${paramIndex}`, params);
    }

    return getActivityInTransaction(client, id);
  });
}

export async function deleteActivity(pool: Pool, id: string): Promise<boolean> {
  const result = await pool.query('DELETE FROM activity WHERE id = $1 RETURNING id', [id]);
  return result.rows.length > 0;
}

/**
 * Lists activities, newest first.
 */
export async function listActivities(pool: Pool, options: ListActivitiesOptions = {}): Promise<ListActivitiesResult> {
  const limit = Math.min(options.limit ?? DEFAULT_LIMIT, MAX_LIMIT);
  const offset = options.offset ?? 0;

  const [countResult, result] = await Promise.all([
    pool.query<{ total: string }>('SELECT COUNT(*) AS total FROM activity'),
    pool.query(
      `SELECT ${ACTIVITY_COLUMNS} FROM activity a
       ORDER BY a.date DESC, a.created_at DESC
       LIMIT $1 OFFSET $2`,
      [limit, offset],
    ),
  ]);

  return {
    activities: result.rows.map(mapRowToActivity),
    total: parseInt(countResult.rows[0]?.total ?? '0', 10),
  };
}

/**
 * Activities involving any of the given contacts, each paired with the
 * contact it was found through. An activity shared by two of the contacts
 * appears once per contact.
 */
export async function listActivitiesForContacts(
  pool: Pool,
  contactIds: string[],
): Promise<Array<{ owner_id: string; activity: ActivityEntry }>> {
  if (contactIds.length === 0) return [];
  const result = await pool.query(
    `SELECT owner.contact_id::text AS owner_id, ${ACTIVITY_COLUMNS}
     FROM activity_contact owner
     JOIN activity a ON a.id = owner.activity_id
     WHERE owner.contact_id = ANY($1::uuid[])
     ORDER BY a.date DESC, a.created_at DESC`,
    [contactIds],
  );
  return result.rows.map((row) => ({
    owner_id: toText(row.owner_id),
    activity: mapRowToActivity(row),
  }));
}
