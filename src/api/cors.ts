/**
 * CORS for the API server, with an origin allowlist from configuration.
 *
 * Requests without an Origin header (server-to-server, curl) are always allowed.
 */
import cors from '@fastify/cors';
import type { FastifyInstance } from 'fastify';

export interface CorsOptions {
  /** Exact origins (scheme + host + port) allowed to call the API */
  allowed_origins: string[];
}

/**
 * Register @fastify/cors on the given Fastify instance.
 */
export function registerCors(app: FastifyInstance, opts: CorsOptions): void {
  const allowed = new Set(opts.allowed_origins);

  app.register(cors, {
    origin: (origin, callback) => {
      if (!origin) return callback(null, true);
      // false makes @fastify/cors omit the ACAO header
      return callback(null, allowed.has(origin));
    },
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Authorization', 'Content-Type', 'Accept'],
    credentials: true,
    maxAge: 86400,
  });
}
