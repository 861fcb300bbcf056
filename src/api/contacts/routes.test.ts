import { describe, it, expect, vi, beforeEach } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import multipart from '@fastify/multipart';
import type { Pool } from 'pg';

import type { PhotoStorage } from './photo.ts';
import { contactRoutesPlugin } from './routes.ts';

// ---------- helpers ----------

type QueryFn = ReturnType<typeof vi.fn>;

function mockPool(queryFn: QueryFn): Pool {
  return { query: queryFn } as unknown as Pool;
}

const CONTACT_ID = '550e8400-e29b-41d4-a716-446655440001';
const OTHER_ID = '660e8400-e29b-41d4-a716-446655440002';

function makeContactRow(overrides: Record<string, unknown> = {}) {
  return {
    id: CONTACT_ID,
    firstname: 'Ada',
    lastname: 'Lovelace',
    nickname: '',
    gender: '',
    email: 'ada@example.com',
    phone: '',
    birthday: '1815-12-10',
    address: '',
    how_we_met: '',
    food_preference: '',
    work_information: '',
    contact_information: '',
    circles: ['family'],
    photo: null,
    created_at: new Date('2026-01-01T00:00:00Z'),
    updated_at: new Date('2026-01-02T00:00:00Z'),
    ...overrides,
  };
}

function makeStorage(): PhotoStorage & { save: QueryFn; delete: QueryFn; exists: QueryFn } {
  return {
    save: vi.fn().mockResolvedValue(undefined),
    delete: vi.fn().mockResolvedValue(undefined),
    exists: vi.fn().mockResolvedValue(true),
  };
}

async function buildApp(queryFn: QueryFn, storage: PhotoStorage = makeStorage(), maxPhotoSizeBytes = 1024) {
  const app = Fastify({ logger: false });
  await app.register(multipart, { limits: { fileSize: maxPhotoSizeBytes } });
  await app.register(contactRoutesPlugin, { pool: mockPool(queryFn), photoStorage: storage, maxPhotoSizeBytes });
  await app.ready();
  return app;
}

function multipartBody(field: string, contentType: string, data: Buffer) {
  const boundary = '----kith-test-boundary';
  const payload = Buffer.concat([
    Buffer.from(
      `--${boundary}\r\nContent-Disposition: form-data; name="${field}"; filename="upload"\r\nContent-Type: ${contentType}\r\n\r\n`,
    ),
    data,
    Buffer.from(`\r\n--${boundary}--\r\n`),
  ]);
  return { payload, headers: { 'content-type': `multipart/form-data; boundary=${boundary}` } };
}

// ---------- tests ----------

describe('contact routes', () => {
  let queryFn: QueryFn;
  let app: FastifyInstance;

  beforeEach(async () => {
    queryFn = vi.fn();
    app = await buildApp(queryFn);
  });

  describe('POST /api/contacts', () => {
    it('creates a contact and answers 201', async () => {
      queryFn.mockResolvedValueOnce({ rows: [makeContactRow()] });

      const res = await app.inject({
        method: 'POST',
        url: '/api/contacts',
        payload: { firstname: ' Ada ', lastname: 'Lovelace', circles: ['family', ' family ', ''], birthday: '1815-12-10' },
      });

      expect(res.statusCode).toBe(201);
      const body = res.json();
      expect(body.message).toBe('Contact created successfully');
      expect(body.contact).toMatchObject({ id: CONTACT_ID, firstname: 'Ada', circles: ['family'] });

      const [sql, params] = queryFn.mock.calls[0];
      expect(sql).toContain('INSERT INTO contact (firstname, lastname, birthday, circles)');
      expect(sql).toContain('VALUES ($1, $2, $3, $4::jsonb)');
      expect(params).toEqual(['Ada', 'Lovelace', '1815-12-10', '["family"]']);
    });

    it('rejects a missing firstname', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/contacts', payload: { lastname: 'Lovelace' } });

      expect(res.statusCode).toBe(400);
      const body = res.json();
      expect(body.error).toBe('Invalid request body');
      expect(body.details[0].path).toBe('firstname');
      expect(queryFn).not.toHaveBeenCalled();
    });

    it('rejects an impossible birthday', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/contacts',
        payload: { firstname: 'Ada', birthday: '1815-02-30' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().details).toEqual([{ path: 'birthday', message: 'birthday must be YYYY-MM-DD or --MM-DD' }]);
    });

    it('accepts a birthday without a year', async () => {
      queryFn.mockResolvedValueOnce({ rows: [makeContactRow({ birthday: '--12-10' })] });

      const res = await app.inject({
        method: 'POST',
        url: '/api/contacts',
        payload: { firstname: 'Ada', birthday: '--12-10' },
      });

      expect(res.statusCode).toBe(201);
      expect(res.json().contact.birthday).toBe('--12-10');
    });
  });

  describe('GET /api/contacts', () => {
    it('returns the page with total, page and limit', async () => {
      queryFn.mockImplementation(async (sql: string) => {
        if (sql.startsWith('SELECT COUNT(*)')) return { rows: [{ total: '42' }] };
        return { rows: [{ id: CONTACT_ID, firstname: 'Ada', email: 'ada@example.com' }] };
      });

      const res = await app.inject({ method: 'GET', url: '/api/contacts?fields=firstname,email,bogus&page=2&limit=10' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        contacts: [{ id: CONTACT_ID, firstname: 'Ada', email: 'ada@example.com' }],
        total: 42,
        page: 2,
        limit: 10,
      });

      const pageCall = queryFn.mock.calls.find(([sql]) => !String(sql).startsWith('SELECT COUNT(*)'));
      expect(pageCall?.[1]).toEqual([10, 10]);
    });

    it('attaches requested relations with one query per relation', async () => {
      queryFn.mockImplementation(async (sql: string) => {
        if (sql.startsWith('SELECT COUNT(*)')) return { rows: [{ total: '2' }] };
        if (sql.includes('FROM note')) {
          return {
            rows: [
              {
                id: 'n1',
                contact_id: OTHER_ID,
                content: 'Likes tea',
                date: '2026-10-01',
                created_at: new Date('2026-10-01T00:00:00Z'),
                updated_at: new Date('2026-10-01T00:00:00Z'),
              },
            ],
          };
        }
        return { rows: [{ id: CONTACT_ID, firstname: 'Ada' }, { id: OTHER_ID, firstname: 'Charles' }] };
      });

      const res = await app.inject({ method: 'GET', url: '/api/contacts?fields=firstname&includes=notes,unknown' });

      expect(res.statusCode).toBe(200);
      const { contacts } = res.json();
      expect(contacts[0]).toEqual({ id: CONTACT_ID, firstname: 'Ada', notes: [] });
      expect(contacts[1].notes).toHaveLength(1);
      expect(contacts[1].notes[0].content).toBe('Likes tea');
      expect(queryFn).toHaveBeenCalledTimes(3);
    });

    it('passes search and circle as bound parameters', async () => {
      queryFn.mockImplementation(async (sql: string) =>
        sql.startsWith('SELECT COUNT(*)') ? { rows: [{ total: '0' }] } : { rows: [] },
      );

      const res = await app.inject({ method: 'GET', url: '/api/contacts?search=lo_ve&circle=work' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ contacts: [], total: 0, page: 1, limit: 25 });
      const countCall = queryFn.mock.calls.find(([sql]) => String(sql).startsWith('SELECT COUNT(*)'));
      expect(countCall?.[1]).toEqual(['%lo\\_ve%', 'work']);
    });
  });

  describe('GET /api/contacts/circles', () => {
    it('returns the distinct circle names', async () => {
      queryFn.mockResolvedValueOnce({ rows: [{ circle: 'family' }, { circle: 'work' }] });

      const res = await app.inject({ method: 'GET', url: '/api/contacts/circles' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual(['family', 'work']);
    });
  });

  describe('GET /api/contacts/:id', () => {
    it('returns 400 for a malformed id', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/contacts/not-a-uuid' });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: 'Invalid contact ID' });
    });

    it('returns 404 when the contact does not exist', async () => {
      queryFn.mockResolvedValueOnce({ rows: [] });
      const res = await app.inject({ method: 'GET', url: `/api/contacts/${CONTACT_ID}` });
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: 'Contact not found' });
    });

    it('preloads every relation', async () => {
      queryFn.mockImplementation(async (sql: string) => {
        if (sql.includes('FROM contact WHERE id = $1')) return { rows: [makeContactRow()] };
        return { rows: [] };
      });

      const res = await app.inject({ method: 'GET', url: `/api/contacts/${CONTACT_ID}` });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({
        id: CONTACT_ID,
        firstname: 'Ada',
        notes: [],
        activities: [],
        relationships: [],
        reminders: [],
      });
      // contact + notes + activities + relationships + reminders
      expect(queryFn).toHaveBeenCalledTimes(5);
    });
  });

  describe('PUT /api/contacts/:id', () => {
    it('updates only the supplied fields', async () => {
      queryFn.mockResolvedValueOnce({ rows: [makeContactRow({ nickname: 'Countess' })] });

      const res = await app.inject({
        method: 'PUT',
        url: `/api/contacts/${CONTACT_ID}`,
        payload: { nickname: 'Countess', id: 'ignored' },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json().nickname).toBe('Countess');
      const [sql, params] = queryFn.mock.calls[0];
      expect(sql).toContain('SET nickname = $1, updated_at = now() WHERE id = $2');
      expect(params).toEqual(['Countess', CONTACT_ID]);
    });

    it('clears the birthday with an empty string', async () => {
      queryFn.mockResolvedValueOnce({ rows: [makeContactRow({ birthday: null })] });

      const res = await app.inject({ method: 'PUT', url: `/api/contacts/${CONTACT_ID}`, payload: { birthday: '' } });

      expect(res.statusCode).toBe(200);
      expect(queryFn.mock.calls[0][1]).toEqual([null, CONTACT_ID]);
    });

    it('returns 404 when the contact does not exist', async () => {
      queryFn.mockResolvedValueOnce({ rows: [] });
      const res = await app.inject({ method: 'PUT', url: `/api/contacts/${CONTACT_ID}`, payload: { lastname: 'Byron' } });
      expect(res.statusCode).toBe(404);
    });

    it('rejects an empty firstname', async () => {
      const res = await app.inject({ method: 'PUT', url: `/api/contacts/${CONTACT_ID}`, payload: { firstname: '  ' } });
      expect(res.statusCode).toBe(400);
      expect(res.json().details[0]).toEqual({ path: 'firstname', message: 'firstname is required' });
    });
  });

  describe('DELETE /api/contacts/:id', () => {
    it('deletes the contact and its photo file', async () => {
      const storage = makeStorage();
      const localApp = await buildApp(queryFn, storage);
      queryFn.mockResolvedValueOnce({ rows: [{ photo: '/static/photos/old.jpg' }] });

      const res = await localApp.inject({ method: 'DELETE', url: `/api/contacts/${CONTACT_ID}` });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ message: 'Contact deleted' });
      expect(storage.delete).toHaveBeenCalledWith('old.jpg');
    });

    it('returns 404 when the contact does not exist', async () => {
      queryFn.mockResolvedValueOnce({ rows: [] });
      const res = await app.inject({ method: 'DELETE', url: `/api/contacts/${CONTACT_ID}` });
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: 'Contact not found' });
    });
  });

  describe('POST /api/contacts/:id/photo', () => {
    it('stores the upload and returns its public path', async () => {
      const storage = makeStorage();
      const localApp = await buildApp(queryFn, storage);
      queryFn.mockResolvedValueOnce({ rows: [{ previous: '/static/photos/old.png' }] });

      const res = await localApp.inject({
        method: 'POST',
        url: `/api/contacts/${CONTACT_ID}/photo`,
        ...multipartBody('photo', 'image/png', Buffer.from('fake-png')),
      });

      expect(res.statusCode).toBe(200);
      const { photo } = res.json();
      expect(photo).toMatch(new RegExp(`^/static/photos/${CONTACT_ID}-[0-9a-f-]{36}\\.png$`));
      expect(storage.save).toHaveBeenCalledWith(photo.slice('/static/photos/'.length), Buffer.from('fake-png'));
      expect(storage.delete).toHaveBeenCalledWith('old.png');
    });

    it('rejects unsupported content types', async () => {
      const res = await app.inject({
        method: 'POST',
        url: `/api/contacts/${CONTACT_ID}/photo`,
        ...multipartBody('photo', 'application/pdf', Buffer.from('%PDF')),
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe('Unsupported photo type');
      expect(queryFn).not.toHaveBeenCalled();
    });

    it('answers 413 for uploads over the limit', async () => {
      const res = await app.inject({
        method: 'POST',
        url: `/api/contacts/${CONTACT_ID}/photo`,
        ...multipartBody('photo', 'image/jpeg', Buffer.alloc(2048, 1)),
      });

      expect(res.statusCode).toBe(413);
      expect(res.json()).toMatchObject({ error: 'Photo too large', max_size_bytes: 1024 });
    });

    it('answers 400 when the field is not named photo', async () => {
      const res = await app.inject({
        method: 'POST',
        url: `/api/contacts/${CONTACT_ID}/photo`,
        ...multipartBody('avatar', 'image/png', Buffer.from('fake-png')),
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: 'No photo uploaded' });
    });

    it('answers 400 for a non-multipart request', async () => {
      const res = await app.inject({
        method: 'POST',
        url: `/api/contacts/${CONTACT_ID}/photo`,
        payload: { photo: 'data' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: 'Expected multipart/form-data' });
    });

    it('returns 404 and removes the file when the contact is missing', async () => {
      const storage = makeStorage();
      const localApp = await buildApp(queryFn, storage);
      queryFn.mockResolvedValueOnce({ rows: [] });

      const res = await localApp.inject({
        method: 'POST',
        url: `/api/contacts/${CONTACT_ID}/photo`,
        ...multipartBody('photo', 'image/webp', Buffer.from('fake-webp')),
      });

      expect(res.statusCode).toBe(404);
      expect(storage.delete).toHaveBeenCalledTimes(1);
      expect(storage.delete.mock.calls[0][0]).toMatch(/\.webp$/);
    });
  });

  describe('DELETE /api/contacts/:id/photo', () => {
    it('clears the photo and deletes the file', async () => {
      const storage = makeStorage();
      const localApp = await buildApp(queryFn, storage);
      queryFn.mockResolvedValueOnce({ rows: [{ previous: '/static/photos/me.gif' }] });

      const res = await localApp.inject({ method: 'DELETE', url: `/api/contacts/${CONTACT_ID}/photo` });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ message: 'Photo removed' });
      expect(queryFn.mock.calls[0][1]).toEqual([CONTACT_ID, null]);
      expect(storage.delete).toHaveBeenCalledWith('me.gif');
    });
  });
});
