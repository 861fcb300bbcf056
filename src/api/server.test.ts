import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { FastifyInstance } from 'fastify';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Pool } from 'pg';

import { loadConfig } from '../config.ts';
import { Scheduler } from '../worker/scheduler.ts';
import { buildServer } from './server.ts';

const AUTH = { authorization: 'Bearer test-secret' };

describe('buildServer', () => {
  let tmpDir: string;
  let query: ReturnType<typeof vi.fn>;
  let scheduler: Scheduler;
  let app: FastifyInstance;

  beforeEach(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'kith-server-'));
    const frontendDir = path.join(tmpDir, 'public');
    fs.mkdirSync(frontendDir);
    fs.writeFileSync(path.join(frontendDir, 'index.html'), '<!doctype html><title>kith</title>');
    fs.writeFileSync(path.join(frontendDir, 'app.js'), 'console.log("kith");');

    const config = loadConfig({
      KITH_AUTH_SECRET: 'test-secret',
      FRONTEND_DIR: frontendDir,
      UPLOAD_DIR: path.join(tmpDir, 'photos'),
    });
    query = vi.fn().mockResolvedValue({ rows: [] });
    scheduler = new Scheduler({ timezone: 'UTC' });

    app = buildServer({ config, pool: { query } as unknown as Pool, scheduler });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
    scheduler.stop();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('GET /health', () => {
    it('reports degraded while the scheduler is stopped', async () => {
      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.status).toBe('degraded');
      expect(body.components.database.status).toBe('healthy');
      expect(body.components.scheduler.details).toEqual({ running: false, jobs: 0, failing: [] });
    });

    it('returns 503 when the database is down', async () => {
      query.mockRejectedValue(new Error('connection refused'));

      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(503);
      expect(res.json().status).toBe('unhealthy');
    });
  });

  describe('authentication', () => {
    it('requires the bearer token on /api', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/contacts/circles' });
      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({ error: 'unauthorized' });
    });

    it('requires the token when the path is percent-encoded', async () => {
      const list = await app.inject({ method: 'GET', url: '/%61pi/contacts/circles' });
      expect(list.statusCode).toBe(401);

      const remove = await app.inject({
        method: 'DELETE',
        url: '/%61pi/contacts/550e8400-e29b-41d4-a716-446655440001',
      });
      expect(remove.statusCode).toBe(401);
      expect(query).not.toHaveBeenCalled();
    });

    it('serves the API with the token', async () => {
      query.mockResolvedValue({ rows: [{ circle: 'family' }] });

      const res = await app.inject({ method: 'GET', url: '/api/contacts/circles', headers: AUTH });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual(['family']);
    });
  });

  describe('not found handling', () => {
    it('returns JSON 404 for unknown API routes', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/unknown', headers: AUTH });
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: 'Not Found' });
    });

    it('serves index.html for client-side routes', async () => {
      const res = await app.inject({ method: 'GET', url: '/contacts/550e8400-e29b-41d4-a716-446655440001' });
      expect(res.statusCode).toBe(200);
      expect(res.headers['content-type']).toMatch(/^text\/html/);
      expect(res.body).toBe('<!doctype html><title>kith</title>');
    });

    it('serves frontend assets', async () => {
      const res = await app.inject({ method: 'GET', url: '/app.js' });
      expect(res.statusCode).toBe(200);
      expect(res.body).toBe('console.log("kith");');
    });

    it('returns 404 for missing assets', async () => {
      const res = await app.inject({ method: 'GET', url: '/missing.js' });
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: 'Not Found' });
    });
  });

  it('serves uploaded photos without the token', async () => {
    fs.writeFileSync(path.join(tmpDir, 'photos', 'ada.png'), 'png-bytes');

    const res = await app.inject({ method: 'GET', url: '/static/photos/ada.png' });

    expect(res.statusCode).toBe(200);
    expect(res.body).toBe('png-bytes');
  });

  it('hides internal errors', async () => {
    query.mockRejectedValue(new Error('relation "contact" does not exist'));

    const res = await app.inject({
      method: 'GET',
      url: '/api/contacts/550e8400-e29b-41d4-a716-446655440001',
      headers: AUTH,
    });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: 'Internal server error' });
  });

  it('answers CORS preflights without the token', async () => {
    const res = await app.inject({
      method: 'OPTIONS',
      url: '/api/contacts',
      headers: { origin: 'http://localhost:3000', 'access-control-request-method': 'POST' },
    });

    expect(res.statusCode).toBe(204);
    expect(res.headers['access-control-allow-origin']).toBe('http://localhost:3000');
  });

  describe('jobs', () => {
    it('lists and runs scheduled jobs', async () => {
      const run = vi.fn().mockResolvedValue({ sent: 1 });
      scheduler.register({ name: 'ping', cron: '0 8 * * *', run });

      const list = await app.inject({ method: 'GET', url: '/api/jobs', headers: AUTH });
      expect(list.json()).toEqual({
        jobs: [
          { name: 'ping', cron: '0 8 * * *', next_run_at: null, last_run_at: null, last_error: null, running: false },
        ],
        scheduler_running: false,
      });

      const res = await app.inject({ method: 'POST', url: '/api/jobs/ping/run', headers: AUTH });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ job: 'ping', result: { sent: 1 } });
      expect(run).toHaveBeenCalledTimes(1);
    });

    it('returns 409 while the job is already running', async () => {
      let finish: (value: string) => void = () => {};
      const pending = new Promise<string>((resolve) => {
        finish = resolve;
      });
      scheduler.register({ name: 'slow', cron: '0 8 * * *', run: () => pending });
      const inFlight = scheduler.runNow('slow');

      const res = await app.inject({ method: 'POST', url: '/api/jobs/slow/run', headers: AUTH });

      expect(res.statusCode).toBe(409);
      expect(res.json()).toEqual({ error: 'Job slow is already running' });
      finish('done');
      await expect(inFlight).resolves.toBe('done');
    });

    it('returns 404 for unknown jobs', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/jobs/nope/run', headers: AUTH });
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: 'Job not found' });
    });

    it('returns 500 with the message when a job fails', async () => {
      scheduler.register({ name: 'broken', cron: '0 8 * * *', run: vi.fn().mockRejectedValue(new Error('smtp down')) });

      const res = await app.inject({ method: 'POST', url: '/api/jobs/broken/run', headers: AUTH });

      expect(res.statusCode).toBe(500);
      expect(res.json()).toEqual({ error: 'Job failed', message: 'smtp down' });
    });
  });
});
