/**
 * Relationship routes: /api/contacts/:id/relationships and /api/relationships/:id.
 */

import type { FastifyInstance, FastifyReply } from 'fastify';
import type { Pool } from 'pg';
import { z } from 'zod';

import { contactExists } from '../contacts/service.ts';
import { isValidUUID, parseOrReply } from '../utils/validation.ts';
import {
  RelatedContactNotFoundError,
  SelfRelationshipError,
  createRelationship,
  deleteRelationship,
  getRelationship,
  listRelationshipsForContacts,
  updateRelationship,
} from './service.ts';

interface IdParams {
  id: string;
}

const relatedContactId = z
  .string()
  .refine(isValidUUID, { message: 'related_contact_id must be a UUID' })
  .nullable();

const CreateRelationshipSchema = z.object({
  name: z.string().trim().max(200).optional(),
  type: z.string().trim().min(1, 'type is required').max(100),
  related_contact_id: relatedContactId.optional(),
});

const UpdateRelationshipSchema = CreateRelationshipSchema.partial();

/** Answer 400 for the domain errors raised on create/update; rethrow anything else. */
function replyRelationshipError(error: unknown, reply: FastifyReply): FastifyReply {
  if (error instanceof RelatedContactNotFoundError || error instanceof SelfRelationshipError) {
    return reply.code(400).send({ error: error.message });
  }
  throw error;
}

export interface RelationshipRoutesOptions {
  pool: Pool;
}

export async function relationshipRoutesPlugin(app: FastifyInstance, opts: RelationshipRoutesOptions): Promise<void> {
  const { pool } = opts;

  // POST /api/contacts/:id/relationships
  app.post<{ Params: IdParams }>('/api/contacts/:id/relationships', async (req, reply) => {
    const { id } = req.params;
    if (!isValidUUID(id)) {
      return reply.code(400).send({ error: 'Invalid contact ID' });
    }

    const body = parseOrReply(CreateRelationshipSchema, req.body, reply);
    if (!body) return reply;

    if (!(await contactExists(pool, id))) {
      return reply.code(404).send({ error: 'Contact not found' });
    }

    try {
      const relationship = await createRelationship(pool, id, body);
      return reply.code(201).send({ message: 'Relationship created successfully', relationship });
    } catch (error) {
      return replyRelationshipError(error, reply);
    }
  });

  // GET /api/contacts/:id/relationships
  app.get<{ Params: IdParams }>('/api/contacts/:id/relationships', async (req, reply) => {
    const { id } = req.params;
    if (!isValidUUID(id)) {
      return reply.code(400).send({ error: 'Invalid contact ID' });
    }
    if (!(await contactExists(pool, id))) {
      return reply.code(404).send({ error: 'Contact not found' });
    }

    const relationships = await listRelationshipsForContacts(pool, [id]);
    return reply.send({ relationships });
  });

  // GET /api/relationships/:id
  app.get<{ Params: IdParams }>('/api/relationships/:id', async (req, reply) => {
    const { id } = req.params;
    if (!isValidUUID(id)) {
      return reply.code(400).send({ error: 'Invalid relationship ID' });
    }

    const relationship = await getRelationship(pool, id);
    if (!relationship) {
      return reply.code(404).send({ error: 'Relationship not found' });
    }
    return reply.send(relationship);
  });

  // PUT /api/relationships/:id
  app.put<{ Params: IdParams }>('/api/relationships/:id', async (req, reply) => {
    const { id } = req.params;
    if (!isValidUUID(id)) {
      return reply.code(400).send({ error: 'Invalid relationship ID' });
    }

    const body = parseOrReply(UpdateRelationshipSchema, req.body, reply);
    if (!body) return reply;

    try {
      const relationship = await updateRelationship(pool, id, body);
      if (!relationship) {
        return reply.code(404).send({ error: 'Relationship not found' });
      }
      return reply.send({ message: 'Relationship updated successfully', relationship });
    } catch (error) {
      return replyRelationshipError(error, reply);
    }
  });

  // DELETE /api/relationships/:id
  app.delete<{ Params: IdParams }>('/api/relationships/:id', async (req, reply) => {
    const { id } = req.params;
    if (!isValidUUID(id)) {
      return reply.code(400).send({ error: 'Invalid relationship ID' });
    }

    const deleted = await deleteRelationship(pool, id);
    if (!deleted) {
      return reply.code(404).send({ error: 'Relationship not found' });
    }
    return reply.send({ message: 'Relationship deleted' });
  });
}
