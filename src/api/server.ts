import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import multipart from '@fastify/multipart';
import fastifyStatic from '@fastify/static';
import { existsSync, mkdirSync } from 'node:fs';
import path from 'node:path';
import type { Pool } from 'pg';

import type { AppConfig } from '../config.ts';
import type { Scheduler } from '../worker/scheduler.ts';
import { activityRoutesPlugin } from './activities/routes.ts';
import { loadSecret, registerBearerAuth } from './auth/secret.ts';
import { LocalPhotoStorage, PHOTO_PUBLIC_PREFIX, type PhotoStorage } from './contacts/photo.ts';
import { contactRoutesPlugin } from './contacts/routes.ts';
import { registerCors } from './cors.ts';
import { DatabaseHealthChecker, HealthCheckRegistry, SchedulerHealthChecker } from './health.ts';
import { jobRoutesPlugin } from './jobs/routes.ts';
import { noteRoutesPlugin } from './notes/routes.ts';
import { relationshipRoutesPlugin } from './relationships/routes.ts';
import { reminderRoutesPlugin } from './reminders/routes.ts';

export type KithServerOptions = {
  config: AppConfig;
  pool: Pool;
  scheduler: Scheduler;
  /** Defaults to a {@link LocalPhotoStorage} in `config.uploads.dir` */
  photoStorage?: PhotoStorage;
  logger?: boolean;
};

export function buildServer(options: KithServerOptions): FastifyInstance {
  const { config, pool, scheduler } = options;
  const app = Fastify({ logger: options.logger ?? false });

  registerCors(app, config.cors);
  registerBearerAuth(app, {
    secret: loadSecret(config.auth),
    disabled: config.auth.disabled,
  });

  app.register(multipart, {
    limits: {
      fileSize: config.uploads.max_photo_size_bytes,
      files: 1,
    },
  });

  // Frontend bundle at the root; this registration decorates reply.sendFile
  app.register(fastifyStatic, {
    root: path.resolve(config.frontend_dir),
    prefix: '/',
  });

  mkdirSync(config.uploads.dir, { recursive: true });
  app.register(fastifyStatic, {
    root: path.resolve(config.uploads.dir),
    prefix: PHOTO_PUBLIC_PREFIX,
    decorateReply: false,
  });

  const healthRegistry = new HealthCheckRegistry();
  healthRegistry.register(new DatabaseHealthChecker(pool));
  healthRegistry.register(new SchedulerHealthChecker(scheduler));

  app.get('/health', async (_req, reply) => {
    const health = await healthRegistry.checkAll();
    return reply.code(health.status === 'unhealthy' ? 503 : 200).send(health);
  });

  const photoStorage = options.photoStorage ?? new LocalPhotoStorage(config.uploads.dir);

  app.register(contactRoutesPlugin, {
    pool,
    photoStorage,
    maxPhotoSizeBytes: config.uploads.max_photo_size_bytes,
  });
  app.register(relationshipRoutesPlugin, { pool });
  app.register(noteRoutesPlugin, { pool });
  app.register(activityRoutesPlugin, { pool });
  app.register(reminderRoutesPlugin, { pool });
  app.register(jobRoutesPlugin, { scheduler });

  app.setErrorHandler<FastifyError>((error, req, reply) => {
    const status = error.statusCode ?? 500;
    if (status < 500) {
      return reply.code(status).send({ error: error.message });
    }
    req.log.error({ err: error }, 'Unhandled error');
    return reply.code(500).send({ error: 'Internal server error' });
  });

  // SPA fallback for client-side routing: extensionless GET paths outside
  // /api get index.html; everything else is a JSON 404.
  const indexHtmlPath = path.join(path.resolve(config.frontend_dir), 'index.html');
  app.setNotFoundHandler((request, reply) => {
    const url = request.url.split('?')[0];
    const isApi = url === '/api' || url.startsWith('/api/');
    const lastSegment = url.split('/').pop() ?? '';

    if (request.method === 'GET' && !isApi && !lastSegment.includes('.') && existsSync(indexHtmlPath)) {
      return reply.code(200).type('text/html; charset=utf-8').sendFile('index.html');
    }

    return reply.code(404).send({ error: 'Not Found' });
  });

  return app;
}
