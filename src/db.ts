import { Pool, type PoolConfig } from 'pg';
import type { DatabaseConfig } from './config.ts';

export function createPool(database: DatabaseConfig, config?: PoolConfig): Pool {
  return new Pool({
    host: database.host,
    port: database.port,
    user: database.user,
    password: database.password,
    database: database.database,
    ...config,
  });
}
