/**
 * Service layer for relationships between a contact and another person.
 */

import type { Pool } from 'pg';
import { toDate, toNullableText, toText } from '../utils/rows.ts';
import type {
  CreateRelationshipInput,
  RelationshipEntry,
  UpdateRelationshipInput,
} from './types.ts';

/** The referenced contact does not exist. */
export class RelatedContactNotFoundError extends Error {
  constructor(public related_contact_id: string) {
    super('Related contact not found');
    this.name = 'RelatedContactNotFoundError';
  }
}

/** A relationship may not point back at its owner. */
export class SelfRelationshipError extends Error {
  constructor() {
    super('A contact cannot have a relationship with itself');
    this.name = 'SelfRelationshipError';
  }
}

const SELECT_WITH_RELATED = `
  SELECT
    r.id::text AS id,
    r.contact_id::text AS contact_id,
    r.name,
    r.type,
    r.related_contact_id::text AS related_contact_id,
    rc.firstname AS related_firstname,
    rc.lastname AS related_lastname,
    r.created_at,
    r.updated_at
  FROM relationship r
  LEFT JOIN contact rc ON rc.id = r.related_contact_id
`;

export function mapRowToRelationship(row: Record<string, unknown>): RelationshipEntry {
  const relatedId = toNullableText(row.related_contact_id);
  return {
    id: toText(row.id),
    contact_id: toText(row.contact_id),
    name: toText(row.name),
    type: toText(row.type),
    related_contact_id: relatedId,
    related_contact:
      relatedId === null
        ? null
        : {
            id: relatedId,
            firstname: toText(row.related_firstname),
            lastname: toText(row.related_lastname),
          },
    created_at: toDate(row.created_at),
    updated_at: toDate(row.updated_at),
  };
}

async function assertRelatedContact(pool: Pool, ownerId: string, relatedId: string): Promise<void> {
  if (relatedId === ownerId) {
    throw new SelfRelationshipError();
  }
  const existing = await pool.query('SELECT 1 FROM contact WHERE id = $1', [relatedId]);
  if (existing.rows.length === 0) {
    throw new RelatedContactNotFoundError(relatedId);
  }
}

export async function getRelationship(pool: Pool, id: string): Promise<RelationshipEntry | null> {
  const result = await pool.query(`${SELECT_WITH_RELATED} WHERE r.id = $1`, [id]);
  return result.rows.length === 0 ? null : mapRowToRelationship(result.rows[0]);
}

/**
 * Creates a relationship owned by `contactId`.
 *
 * @throws SelfRelationshipError if the related contact is the owner
 * @throws RelatedContactNotFoundError if the related contact does not exist
 */
export async function createRelationship(
  pool: Pool,
  contactId: string,
  input: CreateRelationshipInput,
): Promise<RelationshipEntry> {
  const relatedId = input.related_contact_id ?? null;
  if (relatedId !== null) {
    await assertRelatedContact(pool, contactId, relatedId);
  }

  const inserted = await pool.query(
    `INSERT INTO relationship (contact_id, name, type, related_contact_id)
     VALUES ($1, $2, $3, $4)
     RETURNING id::text AS id`,
    [contactId, input.name ?? '', input.type, relatedId],
  );

  const created = await getRelationship(pool, inserted.rows[0].id);
  if (!created) {
    throw new Error('Relationship vanished after insert');
  }
  return created;
}

/**
 * Relationships owned by any of the given contacts, grouped by type then name.
 */
export async function listRelationshipsForContacts(pool: Pool, contactIds: string[]): Promise<RelationshipEntry[]> {
  if (contactIds.length === 0) return [];
  const result = await pool.query(
    `${SELECT_WITH_RELATED}
     WHERE r.contact_id = ANY($1::uuid[])
     ORDER BY r.type, r.name, r.created_at`,
    [contactIds],
  );
  return result.rows.map(mapRowToRelationship);
}

/**
 * Updates a relationship. Returns null when it does not exist.
 *
 * @throws SelfRelationshipError, RelatedContactNotFoundError as for create
 */
export async function updateRelationship(
  pool: Pool,
  id: string,
  input: UpdateRelationshipInput,
): Promise<RelationshipEntry | null> {
  const existing = await getRelationship(pool, id);
  if (!existing) return null;

  const updates: string[] = [];
  const params: unknown[] = [];
  let paramIndex = 1;

  if (input.name !== undefined) {
    updates.push(`name = $${paramIndex}`);
    params.push(input.name);
    paramIndex++;
  }

  if (input.type !== undefined) {
    updates.push(`type = $${paramIndex}`);
    params.push(input.type);
    paramIndex++;
  }

  if (input.related_contact_id !== undefined) {
    if (input.related_contact_id !== null) {
      await assertRelatedContact(pool, existing.contact_id, input.related_contact_id);
    }
    updates.push(`related_contact_id = $${paramIndex}`);
    params.push(input.related_contact_id);
    paramIndex++;
  }

  if (updates.length === 0) {
    return existing;
  }

  updates.push('updated_at = now()');
  params.push(id);

  await pool.query(`UPDATE relationship SET ${updates.join(', ')} WHERE id = $${paramIndex}`, params);
  return getRelationship(pool, id);
}

export async function deleteRelationship(pool: Pool, id: string): Promise<boolean> {
  const result = await pool.query('DELETE FROM relationship WHERE id = $1 RETURNING id', [id]);
  return result.rows.length > 0;
}
