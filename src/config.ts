/**
 * Runtime configuration, read from environment variables and validated with Zod.
 *
 * Every module that needs configuration takes the parsed {@link AppConfig}
 * (or the slice it needs) as an argument; only the entry points call
 * {@link loadConfig}.
 */

import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const projectRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

/** Accepts 'true'/'false'/'1'/'0' (any case); anything else fails validation. */
const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .refine((v) => ['true', 'false', '1', '0'].includes(v), { message: 'must be true or false' })
  .transform((v) => v === 'true' || v === '1');

const port = z.coerce.number().int().min(1).max(65535);

/** Five-field cron expression; the scheduler re-validates with cron-parser. */
const cronExpression = z
  .string()
  .trim()
  .refine((v) => v.split(/\s+/).length === 5, { message: 'must be a 5-field cron expression' });

export const EnvSchema = z.object({
  PORT: port.default(3000),
  HOST: z.string().default('::'),

  PGHOST: z.string().default('localhost'),
  PGPORT: port.default(5432),
  PGUSER: z.string().default('kith'),
  PGPASSWORD: z.string().default('kith'),
  PGDATABASE: z.string().default('kith'),

  KITH_AUTH_SECRET: z.string().optional(),
  KITH_AUTH_SECRET_FILE: z.string().optional(),
  KITH_AUTH_DISABLED: booleanFlag.default('false'),

  CORS_ALLOWED_ORIGINS: z.string().optional(),
  PUBLIC_BASE_URL: z.string().url().optional(),

  UPLOAD_DIR: z.string().default(path.join(projectRoot, 'static', 'photos')),
  MAX_PHOTO_SIZE_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024),
  FRONTEND_DIR: z.string().default(path.join(projectRoot, 'public')),

  SCHEDULER_ENABLED: booleanFlag.default('true'),
  BIRTHDAY_JOB_CRON: cronExpression.default('0 8 * * *'),
  REMINDER_JOB_CRON: cronExpression.default('0 7 * * *'),

  POSTMARK_SERVER_TOKEN: z.string().optional(),
  POSTMARK_SERVER_TOKEN_FILE: z.string().optional(),
  POSTMARK_FROM_EMAIL: z.string().email().optional(),
  NOTIFY_TO_EMAIL: z.string().email().optional(),
  POSTMARK_BIRTHDAY_TEMPLATE: z.string().min(1).default('birthday-reminder'),
  POSTMARK_REMINDER_TEMPLATE: z.string().min(1).default('contact-reminder'),
  POSTMARK_MESSAGE_STREAM: z.string().min(1).default('outbound'),
});

export type Env = z.infer<typeof EnvSchema>;

export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
}

export interface MailConfig {
  server_token?: string;
  server_token_file?: string;
  from_email?: string;
  to_email?: string;
  birthday_template: string;
  reminder_template: string;
  message_stream: string;
}

export interface SchedulerConfig {
  enabled: boolean;
  birthday_cron: string;
  reminder_cron: string;
}

export interface AppConfig {
  port: number;
  host: string;
  database: DatabaseConfig;
  auth: {
    secret?: string;
    secret_file?: string;
    disabled: boolean;
  };
  cors: {
    allowed_origins: string[];
  };
  uploads: {
    dir: string;
    max_photo_size_bytes: number;
  };
  frontend_dir: string;
  scheduler: SchedulerConfig;
  mail: MailConfig;
}

/** Normalize a URL string to its origin, leaving non-URLs untouched. */
function toOrigin(url: string): string {
  try {
    return new URL(url).origin;
  } catch {
    return url;
  }
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Parse and validate configuration from an environment map.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const e = parsed.data;

  const origins = (e.CORS_ALLOWED_ORIGINS || e.PUBLIC_BASE_URL || 'http://localhost:3000')
    .split(',')
    .map((s) => toOrigin(s.trim()))
    .filter(Boolean);

  return {
    port: e.PORT,
    host: e.HOST,
    database: {
      host: e.PGHOST,
      port: e.PGPORT,
      user: e.PGUSER,
      password: e.PGPASSWORD,
      database: e.PGDATABASE,
    },
    auth: {
      secret: e.KITH_AUTH_SECRET,
      secret_file: e.KITH_AUTH_SECRET_FILE,
      disabled: e.KITH_AUTH_DISABLED,
    },
    cors: { allowed_origins: origins },
    uploads: {
      dir: e.UPLOAD_DIR,
      max_photo_size_bytes: e.MAX_PHOTO_SIZE_BYTES,
    },
    frontend_dir: e.FRONTEND_DIR,
    scheduler: {
      enabled: e.SCHEDULER_ENABLED,
      birthday_cron: e.BIRTHDAY_JOB_CRON,
      reminder_cron: e.REMINDER_JOB_CRON,
    },
    mail: {
      server_token: e.POSTMARK_SERVER_TOKEN,
      server_token_file: e.POSTMARK_SERVER_TOKEN_FILE,
      from_email: e.POSTMARK_FROM_EMAIL,
      to_email: e.NOTIFY_TO_EMAIL,
      birthday_template: e.POSTMARK_BIRTHDAY_TEMPLATE,
      reminder_template: e.POSTMARK_REMINDER_TEMPLATE,
      message_stream: e.POSTMARK_MESSAGE_STREAM,
    },
  };
}
