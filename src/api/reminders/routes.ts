/**
 * Reminder routes: /api/contacts/:id/reminders and /api/reminders*.
 */

import type { FastifyInstance } from 'fastify';
import type { Pool } from 'pg';
import { z } from 'zod';

import { contactExists } from '../contacts/service.ts';
import { isoDateSchema, isValidUUID, parseOrReply } from '../utils/validation.ts';
import {
  MAX_UPCOMING_DAYS,
  completeReminder,
  createReminder,
  deleteReminder,
  getReminder,
  listRemindersForContacts,
  listUpcomingReminders,
  updateReminder,
} from './service.ts';
import { REMINDER_RECURRENCES } from './types.ts';

interface IdParams {
  id: string;
}

interface UpcomingQuery {
  days?: string;
}

const DEFAULT_UPCOMING_DAYS = 14;

const ReminderBodySchema = z.object({
  message: z.string().trim().min(1, 'message is required').max(10_000),
  remind_at: isoDateSchema,
  by_mail: z.boolean().optional(),
  recurrence: z.enum(REMINDER_RECURRENCES).optional(),
  reoccur_from_completion: z.boolean().optional(),
});

const CreateReminderSchema = ReminderBodySchema;

const UpdateReminderSchema = ReminderBodySchema.partial().extend({
  completed: z.boolean().optional(),
});

const CompleteReminderSchema = z.object({
  completed_on: isoDateSchema.optional(),
});

export interface ReminderRoutesOptions {
  pool: Pool;
}

export async function reminderRoutesPlugin(app: FastifyInstance, opts: ReminderRoutesOptions): Promise<void> {
  const { pool } = opts;

  // POST /api/contacts/:id/reminders
  app.post<{ Params: IdParams }>('/api/contacts/:id/reminders', async (req, reply) => {
    const { id } = req.params;
    if (!isValidUUID(id)) {
      return reply.code(400).send({ error: 'Invalid contact ID' });
    }

    const body = parseOrReply(CreateReminderSchema, req.body, reply);
    if (!body) return reply;

    if (!(await contactExists(pool, id))) {
      return reply.code(404).send({ error: 'Contact not found' });
    }

    const reminder = await createReminder(pool, id, body);
    return reply.code(201).send({ message: 'Reminder created successfully', reminder });
  });

  // GET /api/contacts/:id/reminders
  app.get<{ Params: IdParams }>('/api/contacts/:id/reminders', async (req, reply) => {
    const { id } = req.params;
    if (!isValidUUID(id)) {
      return reply.code(400).send({ error: 'Invalid contact ID' });
    }
    if (!(await contactExists(pool, id))) {
      return reply.code(404).send({ error: 'Contact not found' });
    }

    const reminders = await listRemindersForContacts(pool, [id]);
    return reply.send({ reminders });
  });

  // GET /api/reminders/upcoming?days=N
  app.get<{ Querystring: UpcomingQuery }>('/api/reminders/upcoming', async (req, reply) => {
    let days = DEFAULT_UPCOMING_DAYS;
    if (req.query.days !== undefined) {
      days = Number(req.query.days);
      if (!Number.isInteger(days) || days < 0) {
        return reply.code(400).send({ error: 'days must be a non-negative integer' });
      }
      days = Math.min(days, MAX_UPCOMING_DAYS);
    }

    const reminders = await listUpcomingReminders(pool, { days });
    return reply.send({ reminders, days });
  });

  // GET /api/reminders/:id
  app.get<{ Params: IdParams }>('/api/reminders/:id', async (req, reply) => {
    const { id } = req.params;
    if (!isValidUUID(id)) {
      return reply.code(400).send({ error: 'Invalid reminder ID' });
    }

    const reminder = await getReminder(pool, id);
    if (!reminder) {
      return reply.code(404).send({ error: 'Reminder not found' });
    }
    return reply.send(reminder);
  });

  // PUT /api/reminders/:id
  app.put<{ Params: IdParams }>('/api/reminders/:id', async (req, reply) => {
    const { id } = req.params;
    if (!isValidUUID(id)) {
      return reply.code(400).send({ error: 'Invalid reminder ID' });
    }

    const body = parseOrReply(UpdateReminderSchema, req.body, reply);
    if (!body) return reply;

    const reminder = await updateReminder(pool, id, body);
    if (!reminder) {
      return reply.code(404).send({ error: 'Reminder not found' });
    }
    return reply.send({ message: 'Reminder updated successfully', reminder });
  });

  // DELETE /api/reminders/:id
  app.delete<{ Params: IdParams }>('/api/reminders/:id', async (req, reply) => {
    const { id } = req.params;
    if (!isValidUUID(id)) {
      return reply.code(400).send({ error: 'Invalid reminder ID' });
    }

    const deleted = await deleteReminder(pool, id);
    if (!deleted) {
      return reply.code(404).send({ error: 'Reminder not found' });
    }
    return reply.send({ message: 'Reminder deleted' });
  });

  // POST /api/reminders/:id/complete
  app.post<{ Params: IdParams }>('/api/reminders/:id/complete', async (req, reply) => {
    const { id } = req.params;
    if (!isValidUUID(id)) {
      return reply.code(400).send({ error: 'Invalid reminder ID' });
    }

    const body = parseOrReply(CompleteReminderSchema, req.body, reply);
    if (!body) return reply;

    const reminder = await completeReminder(pool, id, body.completed_on);
    if (!reminder) {
      return reply.code(404).send({ error: 'Reminder not found' });
    }
    return reply.send({ message: 'Reminder completed', reminder });
  });
}
