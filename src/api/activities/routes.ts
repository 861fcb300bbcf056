/**
 * Activity routes: /api/activities* and /api/contacts/:id/activities.
 */

import type { FastifyInstance } from 'fastify';
import type { Pool } from 'pg';
import { z } from 'zod';

import { contactExists } from '../contacts/service.ts';
import { isoDateSchema, isValidUUID, parseOrReply } from '../utils/validation.ts';
import {
  UnknownParticipantError,
  createActivity,
  deleteActivity,
  getActivity,
  listActivities,
  listActivitiesForContacts,
  updateActivity,
} from './service.ts';

interface IdParams {
  id: string;
}

interface PaginationQuery {
  limit?: string;
  offset?: string;
}

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 200;

function parsePagination(query: PaginationQuery): { limit: number; offset: number } {
  const rawLimit = parseInt(query.limit ?? '', 10);
  const rawOffset = parseInt(query.offset ?? '', 10);
  return {
    limit: Number.isFinite(rawLimit) && rawLimit > 0 ? Math.min(rawLimit, MAX_LIMIT) : DEFAULT_LIMIT,
    offset: Number.isFinite(rawOffset) && rawOffset >= 0 ? rawOffset : 0,
  };
}

const contactIds = z.array(z.string().refine(isValidUUID, { message: 'contact_ids must be UUIDs' })).max(500);

const CreateActivitySchema = z.object({
  name: z.string().trim().min(1, 'name is required').max(500),
  description: z.string().max(100_000).optional(),
  date: isoDateSchema.optional(),
  contact_ids: contactIds.default([]),
});

const UpdateActivitySchema = z.object({
  name: z.string().trim().min(1, 'name cannot be empty').max(500).optional(),
  description: z.string().max(100_000).optional(),
  date: isoDateSchema.optional(),
  contact_ids: contactIds.optional(),
});

export interface ActivityRoutesOptions {
  pool: Pool;
}

export async function activityRoutesPlugin(app: FastifyInstance, opts: ActivityRoutesOptions): Promise<void> {
  const { pool } = opts;

  // POST /api/activities
  app.post('/api/activities', async (req, reply) => {
    const body = parseOrReply(CreateActivitySchema, req.body, reply);
    if (!body) return reply;

    try {
      const activity = await createActivity(pool, body);
      return reply.code(201).send({ message: 'Activity created successfully', activity });
    } catch (error) {
      if (error instanceof UnknownParticipantError) {
        return reply.code(400).send({ error: 'Contact not found', contact_ids: error.contact_ids });
      }
      throw error;
    }
  });

  // GET /api/activities
  app.get<{ Querystring: PaginationQuery }>('/api/activities', async (req, reply) => {
    const { limit, offset } = parsePagination(req.query);
    const result = await listActivities(pool, { limit, offset });
    return reply.send({ ...result, limit, offset });
  });

  // GET /api/activities/:id
  app.get<{ Params: IdParams }>('/api/activities/:id', async (req, reply) => {
    const { id } = req.params;
    if (!isValidUUID(id)) {
      return reply.code(400).send({ error: 'Invalid activity ID' });
    }

    const activity = await getActivity(pool, id);
    if (!activity) {
      return reply.code(404).send({ error: 'Activity not found' });
    }
    return reply.send(activity);
  });

  // PUT /api/activities/:id
  app.put<{ Params: IdParams }>('/api/activities/:id', async (req, reply) => {
    const { id } = req.params;
    if (!isValidUUID(id)) {
      return reply.code(400).send({ error: 'Invalid activity ID' });
    }

    const body = parseOrReply(UpdateActivitySchema, req.body, reply);
    if (!body) return reply;

    try {
      const activity = await updateActivity(pool, id, body);
      if (!activity) {
        return reply.code(404).send({ error: 'Activity not found' });
      }
      return reply.send({ message: 'Activity updated successfully', activity });
    } catch (error) {
      if (error instanceof UnknownParticipantError) {
        return reply.code(400).send({ error: 'Contact not found', contact_ids: error.contact_ids });
      }
      throw error;
    }
  });

  // DELETE /api/activities/:id
  app.delete<{ Params: IdParams }>('/api/activities/:id', async (req, reply) => {
    const { id } = req.params;
    if (!isValidUUID(id)) {
      return reply.code(400).send({ error: 'Invalid activity ID' });
    }

    const deleted = await deleteActivity(pool, id);
    if (!deleted) {
      return reply.code(404).send({ error: 'Activity not found' });
    }
    return reply.send({ message: 'Activity deleted' });
  });

  // GET /api/contacts/:id/activities
  app.get<{ Params: IdParams }>('/api/contacts/:id/activities', async (req, reply) => {
    const { id } = req.params;
    if (!isValidUUID(id)) {
      return reply.code(400).send({ error: 'Invalid contact ID' });
    }
    if (!(await contactExists(pool, id))) {
      return reply.code(404).send({ error: 'Contact not found' });
    }

    const rows = await listActivitiesForContacts(pool, [id]);
    return reply.send({ activities: rows.map((r) => r.activity) });
  });
}
