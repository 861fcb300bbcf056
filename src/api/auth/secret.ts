import { readFileSync, statSync } from 'node:fs';
import { timingSafeEqual } from 'node:crypto';
import type { FastifyInstance } from 'fastify';

import type { AppConfig } from '../../config.ts';

/**
 * Loads the shared API secret from the configured file or value.
 *
 * Priority order (highest first):
 * 1. KITH_AUTH_SECRET_FILE - Read from file
 * 2. KITH_AUTH_SECRET - Direct value
 *
 * @returns The secret string, or empty string if not configured
 */
export function loadSecret(auth: Pick<AppConfig['auth'], 'secret' | 'secret_file'>): string {
  const file = auth.secret_file?.trim();
  if (file) {
    try {
      // Warn if world-readable
      const stats = statSync(file);
      const mode = stats.mode & 0o777;
      if (mode & 0o004) {
        console.warn(`[Auth] Warning: Secret file ${file} is world-readable (mode ${mode.toString(8)})`);
      }

      return readFileSync(file, 'utf-8').trim();
    } catch (error) {
      console.error('[Auth] Failed to read secret file:', (error as Error).message);
    }
  }

  return auth.secret?.trim() ?? '';
}

/**
 * Compares two secrets in constant time.
 *
 * @returns true if the secrets match
 */
export function compareSecrets(provided: string, expected: string): boolean {
  if (!provided || !expected) {
    return false;
  }

  const providedBuf = Buffer.from(provided);
  const expectedBuf = Buffer.from(expected);

  if (providedBuf.length !== expectedBuf.length) {
    // Still compare equal-length buffers so timing does not leak the length
    const paddedProvided = Buffer.alloc(expectedBuf.length);
    providedBuf.copy(paddedProvided, 0, 0, Math.min(providedBuf.length, expectedBuf.length));
    timingSafeEqual(paddedProvided, expectedBuf);
    return false;
  }

  return timingSafeEqual(providedBuf, expectedBuf);
}

/** Extract the token from an `Authorization: Bearer <token>` header. */
export function bearerToken(header: string | undefined): string | null {
  if (!header || !header.startsWith('Bearer ')) return null;
  return header.slice(7);
}

function isApiPath(path: string): boolean {
  return path === '/api' || path.startsWith('/api/');
}

export interface BearerAuthOptions {
  /** Expected token; an empty string leaves the API open. */
  secret: string;
  disabled: boolean;
}

/**
 * Require `Authorization: Bearer <secret>` on every /api/* request.
 * Static files, /health and CORS preflights stay public.
 */
export function registerBearerAuth(app: FastifyInstance, opts: BearerAuthOptions): void {
  if (opts.disabled) {
    app.log.warn('Authentication is disabled. Do not use in production!');
    return;
  }
  if (!opts.secret) {
    app.log.warn('No API secret configured - /api/* is open to anyone who can reach the server');
    return;
  }

  app.addHook('onRequest', async (req, reply) => {
    // Preflights carry no credentials
    if (req.method === 'OPTIONS') return;
    // The matched route pattern, not the raw URL: the router decodes
    // percent-escapes, so `/%61pi/contacts` reaches `/api/contacts`.
    const paths = [req.routeOptions.url ?? '', req.url.split('?')[0]];
    if (!paths.some(isApiPath)) return;

    const token = bearerToken(req.headers.authorization);
    if (!token || !compareSecrets(token, opts.secret)) {
      return reply.code(401).send({ error: 'unauthorized' });
    }
  });
}
