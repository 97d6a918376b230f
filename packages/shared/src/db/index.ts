import { promises as fs } from 'node:fs';
import path from 'node:path';

import { Pool, type PoolClient } from 'pg';

import { config } from '../config';
import { StorageUnavailableError } from '../errors';
import { logger } from '../logger';

let pool: Pool | null = null;

/** The subset of `pg.Pool` that the transaction helper relies on. */
export interface ConnectionSource {
  connect(): Promise<PoolClient>;
}

export type MigrationSource = Pick<Pool, 'query' | 'connect'>;

export interface MigrationOptions {
  directory?: string;
  source?: MigrationSource;
}

const MIGRATION_LEDGER_DDL = `CREATE TABLE IF NOT EXISTS schema_migrations (
  name TEXT PRIMARY KEY,
  applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
)`;

export function getDb(): Pool {
  if (!pool) {
    if (!config.DATABASE_URL) {
      throw new StorageUnavailableError('DATABASE_URL is not configured');
    }

    pool = new Pool({
      connectionString: config.DATABASE_URL,
      max: config.DATABASE_MAX_POOL
    });
    // An idle client losing its connection must not take the process down.
    pool.on('error', (error) => {
      logger.error({ err: error }, 'Idle database client failed');
    });
  }

  return pool;
}

export async function withTransaction<T>(
  handler: (client: PoolClient) => Promise<T>,
  source: ConnectionSource = getDb()
): Promise<T> {
  const client = await source.connect();

  try {
    await client.query('BEGIN');
    const result = await handler(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

/**
 * Applies the `.sql` files of `directory` in name order, each in its own
 * transaction together with its row in `schema_migrations`. Files already
 * recorded there are skipped. Resolves to the names applied by this run.
 */
export async function runMigrations(options: MigrationOptions = {}): Promise<string[]> {
  const directory = options.directory ?? config.MIGRATIONS_DIR;
  const files = (await fs.readdir(directory)).filter((file) => file.endsWith('.sql')).sort();

  if (files.length === 0) {
    logger.info({ directory }, 'No SQL migrations found');
    return [];
  }

  const source = options.source ?? getDb();
  await source.query(MIGRATION_LEDGER_DDL);
  const { rows } = await source.query<{ name: string }>('SELECT name FROM schema_migrations');
  const recorded = new Set(rows.map((row) => row.name));

  const applied: string[] = [];
  for (const file of files) {
    if (recorded.has(file)) {
      continue;
    }

    const sql = await fs.readFile(path.join(directory, file), 'utf-8');
    logger.info({ migration: file }, 'Applying migration');

    try {
      await withTransaction(async (client) => {
        await client.query(sql);
        await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file]);
      }, source);
    } catch (error) {
      logger.error({ err: error, migration: file }, 'Failed to apply migration');
      throw error;
    }

    applied.push(file);
  }

  logger.info({ applied: applied.length, skipped: files.length - applied.length }, 'Migrations up to date');
  return applied;
}
