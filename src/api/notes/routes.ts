/**
 * Note routes: /api/contacts/:id/notes and /api/notes/:id.
 */

import type { FastifyInstance } from 'fastify';
import type { Pool } from 'pg';
import { z } from 'zod';

import { contactExists } from '../contacts/service.ts';
import { isoDateSchema, isValidUUID, parseOrReply } from '../utils/validation.ts';
import { createNote, deleteNote, getNote, listNotesForContacts, updateNote } from './service.ts';

interface IdParams {
  id: string;
}

const CreateNoteSchema = z.object({
  content: z.string().trim().min(1, 'content is required').max(100_000),
  date: isoDateSchema.optional(),
});

const UpdateNoteSchema = CreateNoteSchema.partial();

export interface NoteRoutesOptions {
  pool: Pool;
}

export async function noteRoutesPlugin(app: FastifyInstance, opts: NoteRoutesOptions): Promise<void> {
  const { pool } = opts;

  // POST /api/contacts/:id/notes
  app.post<{ Params: IdParams }>('/api/contacts/:id/notes', async (req, reply) => {
    const { id } = req.params;
    if (!isValidUUID(id)) {
      return reply.code(400).send({ error: 'Invalid contact ID' });
    }

    const body = parseOrReply(CreateNoteSchema, req.body, reply);
    if (!body) return reply;

    if (!(await contactExists(pool, id))) {
      return reply.code(404).send({ error: 'Contact not found' });
    }

    const note = await createNote(pool, id, body);
    return reply.code(201).send({ message: 'Note created successfully', note });
  });

  // GET /api/contacts/:id/notes
  app.get<{ Params: IdParams }>('/api/contacts/:id/notes', async (req, reply) => {
    const { id } = req.params;
    if (!isValidUUID(id)) {
      return reply.code(400).send({ error: 'Invalid contact ID' });
    }
    if (!(await contactExists(pool, id))) {
      return reply.code(404).send({ error: 'Contact not found' });
    }

    const notes = await listNotesForContacts(pool, [id]);
    return reply.send({ notes });
  });

  // GET /api/notes/:id
  app.get<{ Params: IdParams }>('/api/notes/:id', async (req, reply) => {
    const { id } = req.params;
    if (!isValidUUID(id)) {
      return reply.code(400).send({ error: 'Invalid note ID' });
    }

    const note = await getNote(pool, id);
    if (!note) {
      return reply.code(404).send({ error: 'Note not found' });
    }
    return reply.send(note);
  });

  // PUT /api/notes/:id
  app.put<{ Params: IdParams }>('/api/notes/:id', async (req, reply) => {
    const { id } = req.params;
    if (!isValidUUID(id)) {
      return reply.code(400).send({ error: 'Invalid note ID' });
    }

    const body = parseOrReply(UpdateNoteSchema, req.body, reply);
    if (!body) return reply;

    const note = await updateNote(pool, id, body);
    if (!note) {
      return reply.code(404).send({ error: 'Note not found' });
    }
    return reply.send({ message: 'Note updated successfully', note });
  });

  // DELETE /api/notes/:id
  app.delete<{ Params: IdParams }>('/api/notes/:id', async (req, reply) => {
    const { id } = req.params;
    if (!isValidUUID(id)) {
      return reply.code(400).send({ error: 'Invalid note ID' });
    }

    const deleted = await deleteNote(pool, id);
    if (!deleted) {
      return reply.code(404).send({ error: 'Note not found' });
    }
    return reply.send({ message: 'Note deleted' });
  });
}
