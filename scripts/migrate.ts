/**
 * Apply or roll back database migrations.
 * Usage: tsx scripts/migrate.ts [up|down] [steps]
 */
import { loadConfig } from '../src/config.ts';
import { createPool } from '../src/db.ts';
import { runMigrations } from '../src/db/migrate.ts';

async function main() {
  const direction = process.argv[2] ?? 'up';
  if (direction !== 'up' && direction !== 'down') {
    throw new Error(`Unknown direction "${direction}". Use "up" or "down".`);
  }

  const rawSteps = process.argv[3];
  const steps = rawSteps === undefined ? undefined : parseInt(rawSteps, 10);
  if (steps !== undefined && (!Number.isInteger(steps) || steps < 1)) {
    throw new Error(`steps must be a positive integer, got "${rawSteps}"`);
  }

  const config = loadConfig();
  const pool = createPool(config.database, { max: 1 });

  try {
    const changed = await runMigrations(pool, direction, { steps });
    console.log(`[Migrate] ${direction}: ${changed.length} migration(s) changed`);
  } finally {
    await pool.end();
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
