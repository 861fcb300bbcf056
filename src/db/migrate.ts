/**
 * Applies and rolls back the SQL migrations under `migrations/`.
 *
 * Files come in `NNN_name.up.sql` / `NNN_name.down.sql` pairs and applied
 * versions are tracked in `schema_migrations`.
 */

import { readFileSync, readdirSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Pool, PoolClient } from 'pg';

export const MIGRATIONS_PATH = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../migrations');

/** Arbitrary constant advisory lock key so concurrent runs serialize. */
const MIGRATION_LOCK_KEY = 51_842_117;

export interface Migration {
  version: number;
  name: string;
  up_path: string;
  down_path: string;
}

function parseFilename(filename: string): { version: number; name: string } {
  const m = filename.match(/^(\d+)_(.+)\.(up|down)\.sql$/);
  if (!m) throw new Error(`Invalid migration filename: ${filename}`);
  return { version: parseInt(m[1], 10), name: m[2] };
}

/**
 * List migrations in version order.
 *
 * @throws Error if a version lacks its up or down file
 */
export function listMigrations(dir: string = MIGRATIONS_PATH): Migration[] {
  const byVersion = new Map<number, { name: string; up_path?: string; down_path?: string }>();

  for (const f of readdirSync(dir).sort((a, b) => a.localeCompare(b))) {
    if (!f.endsWith('.sql')) continue;
    const { version, name } = parseFilename(f);
    const entry = byVersion.get(version) ?? { name };
    const full = path.join(dir, f);
    if (f.endsWith('.up.sql')) entry.up_path = full;
    else entry.down_path = full;
    byVersion.set(version, entry);
  }

  const migrations: Migration[] = [];
  for (const [version, entry] of byVersion) {
    if (!entry.up_path || !entry.down_path) {
      throw new Error(`Migration ${version} missing up/down pair`);
    }
    migrations.push({ version, name: entry.name, up_path: entry.up_path, down_path: entry.down_path });
  }
  return migrations.sort((a, b) => a.version - b.version);
}

async function ensureMigrationsTable(client: PoolClient): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version bigint PRIMARY KEY,
      dirty boolean NOT NULL DEFAULT false,
      applied_at timestamptz NOT NULL DEFAULT now()
    )
  `);
}

async function inTransaction(client: PoolClient, fn: () => Promise<void>): Promise<void> {
  await client.query('BEGIN');
  try {
    await fn();
    await client.query('COMMIT');
  } catch (e) {
    await client.query('ROLLBACK');
    throw e;
  }
}

/**
 * Apply pending migrations (`up`) or roll back applied ones (`down`, newest
 * first, `steps` at most). Returns the versions that were changed.
 */
export async function runMigrations(
  pool: Pool,
  direction: 'up' | 'down',
  options: { steps?: number; dir?: string } = {},
): Promise<number[]> {
  const migrations = listMigrations(options.dir);
  const client = await pool.connect();

  try {
    await client.query('SELECT pg_advisory_lock($1)', [MIGRATION_LOCK_KEY]);
    try {
      await ensureMigrationsTable(client);
      const applied = await client.query<{ version: number }>(
        'SELECT version::int AS version FROM schema_migrations ORDER BY version',
      );
      const appliedVersions = applied.rows.map((r) => r.version);
      const changed: number[] = [];

      if (direction === 'up') {
        const appliedSet = new Set(appliedVersions);
        for (const m of migrations) {
          if (appliedSet.has(m.version)) continue;
          if (options.steps !== undefined && changed.length >= options.steps) break;

          await inTransaction(client, async () => {
            await client.query(readFileSync(m.up_path, 'utf-8'));
            await client.query('INSERT INTO schema_migrations (version, dirty) VALUES ($1, false)', [m.version]);
          });
          console.log(`[Migrate] Applied ${m.version}_${m.name}`);
          changed.push(m.version);
        }
        return changed;
      }

      const toRollback = [...appliedVersions].reverse().slice(0, options.steps ?? appliedVersions.length);
      for (const version of toRollback) {
        const m = migrations.find((x) => x.version === version);
        if (!m) {
          throw new Error(`Cannot roll back version ${version}: migration files not found`);
        }

        await inTransaction(client, async () => {
          await client.query(readFileSync(m.down_path, 'utf-8'));
          await client.query('DELETE FROM schema_migrations WHERE version = $1', [version]);
        });
        console.log(`[Migrate] Rolled back ${m.version}_${m.name}`);
        changed.push(version);
      }
      return changed;
    } finally {
      await client.query('SELECT pg_advisory_unlock($1)', [MIGRATION_LOCK_KEY]);
    }
  } finally {
    client.release();
  }
}
