/**
 * Contact REST routes: CRUD, filtered listing, circles and profile photos.
 *
 * Exports a Fastify plugin that registers /api/contacts*. The photo upload
 * routes need @fastify/multipart registered on the parent instance.
 */

import type { FastifyInstance } from 'fastify';
import type { Pool } from 'pg';
import { z } from 'zod';

import { isValidBirthday } from '../birthdays/birthday.ts';
import { isValidUUID, parseOrReply } from '../utils/validation.ts';
import {
  PhotoTooLargeError,
  UnsupportedPhotoTypeError,
  deletePhotoFile,
  removeContactPhoto,
  storeContactPhoto,
  type PhotoStorage,
} from './photo.ts';
import { parseContactListQuery } from './query.ts';
import {
  createContact,
  deleteContact,
  getContactWithRelations,
  listCircles,
  listContacts,
  updateContact,
} from './service.ts';
import type { ContactListQuery } from './types.ts';

interface IdParams {
  id: string;
}

const text = z.string().max(10_000);

const birthday = z
  .string()
  .trim()
  .refine((v) => v === '' || isValidBirthday(v), { message: 'birthday must be YYYY-MM-DD or --MM-DD' })
  .nullable();

const ContactBodySchema = z.object({
  firstname: z.string().trim().min(1, 'firstname is required').max(200),
  lastname: text.optional(),
  nickname: text.optional(),
  gender: text.optional(),
  email: text.optional(),
  phone: text.optional(),
  birthday: birthday.optional(),
  address: text.optional(),
  how_we_met: text.optional(),
  food_preference: text.optional(),
  work_information: text.optional(),
  contact_information: text.optional(),
  circles: z.array(z.string().max(200)).max(100).optional(),
});

/** Unknown keys (id, photo, timestamps) are stripped. */
export const CreateContactSchema = ContactBodySchema;
export const UpdateContactSchema = ContactBodySchema.partial();

export interface ContactRoutesOptions {
  pool: Pool;
  photoStorage: PhotoStorage;
  maxPhotoSizeBytes: number;
}

/**
 * Fastify plugin that registers the /api/contacts routes.
 *
 * Usage:
 * ```ts
 * app.register(contactRoutesPlugin, { pool, photoStorage, maxPhotoSizeBytes });
 * ```
 */
export async function contactRoutesPlugin(app: FastifyInstance, opts: ContactRoutesOptions): Promise<void> {
  const { pool, photoStorage, maxPhotoSizeBytes } = opts;

  // POST /api/contacts
  app.post('/api/contacts', async (req, reply) => {
    const body = parseOrReply(CreateContactSchema, req.body, reply);
    if (!body) return reply;

    const contact = await createContact(pool, body);
    return reply.code(201).send({ message: 'Contact created successfully', contact });
  });

  // GET /api/contacts
  app.get<{ Querystring: ContactListQuery }>('/api/contacts', async (req, reply) => {
    const options = parseContactListQuery(req.query);
    const result = await listContacts(pool, options);
    return reply.send(result);
  });

  // GET /api/contacts/circles
  app.get('/api/contacts/circles', async (_req, reply) => {
    const circles = await listCircles(pool);
    return reply.send(circles);
  });

  // GET /api/contacts/:id
  app.get<{ Params: IdParams }>('/api/contacts/:id', async (req, reply) => {
    const { id } = req.params;
    if (!isValidUUID(id)) {
      return reply.code(400).send({ error: 'Invalid contact ID' });
    }

    const contact = await getContactWithRelations(pool, id);
    if (!contact) {
      return reply.code(404).send({ error: 'Contact not found' });
    }
    return reply.send(contact);
  });

  // PUT /api/contacts/:id
  app.put<{ Params: IdParams }>('/api/contacts/:id', async (req, reply) => {
    const { id } = req.params;
    if (!isValidUUID(id)) {
      return reply.code(400).send({ error: 'Invalid contact ID' });
    }

    const body = parseOrReply(UpdateContactSchema, req.body, reply);
    if (!body) return reply;

    const contact = await updateContact(pool, id, body);
    if (!contact) {
      return reply.code(404).send({ error: 'Contact not found' });
    }
    return reply.send(contact);
  });

  // DELETE /api/contacts/:id
  app.delete<{ Params: IdParams }>('/api/contacts/:id', async (req, reply) => {
    const { id } = req.params;
    if (!isValidUUID(id)) {
      return reply.code(400).send({ error: 'Invalid contact ID' });
    }

    const deleted = await deleteContact(pool, id);
    if (!deleted) {
      return reply.code(404).send({ error: 'Contact not found' });
    }

    try {
      await deletePhotoFile(photoStorage, deleted.photo);
    } catch (err) {
      req.log.warn({ err, photo: deleted.photo }, 'Failed to remove photo of deleted contact');
    }
    return reply.send({ message: 'Contact deleted' });
  });

  // POST /api/contacts/:id/photo - multipart upload, field "photo"
  app.post<{ Params: IdParams }>('/api/contacts/:id/photo', async (req, reply) => {
    const { id } = req.params;
    if (!isValidUUID(id)) {
      return reply.code(400).send({ error: 'Invalid contact ID' });
    }
    if (!req.isMultipart()) {
      return reply.code(400).send({ error: 'Expected multipart/form-data' });
    }

    try {
      const file = await req.file();
      if (!file) {
        return reply.code(400).send({ error: 'No photo uploaded' });
      }
      if (file.fieldname !== 'photo') {
        file.file.resume();
        return reply.code(400).send({ error: 'No photo uploaded' });
      }

      const data = await file.toBuffer();
      const photo = await storeContactPhoto(pool, photoStorage, id, { content_type: file.mimetype, data }, maxPhotoSizeBytes);
      if (!photo) {
        return reply.code(404).send({ error: 'Contact not found' });
      }
      return reply.send({ message: 'Photo uploaded', photo });
    } catch (error) {
      if (error instanceof UnsupportedPhotoTypeError) {
        return reply.code(400).send({ error: 'Unsupported photo type', message: error.message });
      }
      if (error instanceof PhotoTooLargeError || isFileTooLarge(error)) {
        return reply.code(413).send({
          error: 'Photo too large',
          message: `Photo exceeds maximum size of ${maxPhotoSizeBytes} bytes`,
          max_size_bytes: maxPhotoSizeBytes,
        });
      }
      throw error;
    }
  });

  // DELETE /api/contacts/:id/photo
  app.delete<{ Params: IdParams }>('/api/contacts/:id/photo', async (req, reply) => {
    const { id } = req.params;
    if (!isValidUUID(id)) {
      return reply.code(400).send({ error: 'Invalid contact ID' });
    }

    const removed = await removeContactPhoto(pool, photoStorage, id);
    if (!removed) {
      return reply.code(404).send({ error: 'Contact not found' });
    }
    return reply.send({ message: 'Photo removed' });
  });
}

/** @fastify/multipart rejects oversized parts with this code. */
function isFileTooLarge(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'FST_REQ_FILE_TOO_LARGE';
}
