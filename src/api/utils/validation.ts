/**
 * Request validation helpers shared by the route plugins.
 */

import type { FastifyReply } from 'fastify';
import { z } from 'zod';

const UUID_REGEX = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** `YYYY-MM-DD` calendar date. */
export const ISO_DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;

export function isValidUUID(s: string): boolean {
  return UUID_REGEX.test(s);
}

/** True when `value` is a real calendar date in `YYYY-MM-DD` form. */
export function isIsoDate(value: string): boolean {
  if (!ISO_DATE_REGEX.test(value)) return false;
  const d = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(d.getTime()) && d.toISOString().slice(0, 10) === value;
}

/** Zod schema for a `YYYY-MM-DD` calendar date. */
export const isoDateSchema = z.string().refine(isIsoDate, { message: 'must be a date in YYYY-MM-DD form' });

/** Today's date in UTC as `YYYY-MM-DD`. */
export function todayIso(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export function formatIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Parse `value` with `schema`. On failure sends a 400 and returns null, so the
 * handler can `if (!body) return;`.
 */
export function parseOrReply<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  reply: FastifyReply,
  message = 'Invalid request body',
): z.infer<T> | null {
  const result = schema.safeParse(value ?? {});
  if (!result.success) {
    void reply.code(400).send({ error: message, details: formatIssues(result.error) });
    return null;
  }
  return result.data;
}
