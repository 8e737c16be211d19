import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import type { Pool } from 'pg';
import type { Logger } from 'pino';

export interface Migration {
  filename: string;
  version: number;
}

/**
 * List `NNN_name.sql` files in `dir`, ordered by version.
 */
export async function listMigrations(dir: string): Promise<Migration[]> {
  const files = await readdir(dir);
  return files
    .filter((f) => f.endsWith('.sql'))
    .map((filename) => {
      const match = filename.match(/^(\d+)_/);
      if (!match) {
        throw new Error(`Invalid migration filename: ${filename}`);
      }
      return {
        filename,
        version: parseInt(match[1], 10),
      };
    })
    .sort((a, b) => a.version - b.version);
}

async function ensureMigrationsTable(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function getAppliedVersions(pool: Pool): Promise<Set<number>> {
  const result = await pool.query<{ version: number }>(
    'SELECT version FROM schema_migrations ORDER BY version'
  );
  return new Set(result.rows.map((row) => row.version));
}

async function applyMigration(pool: Pool, dir: string, migration: Migration): Promise<void> {
  const sql = await readFile(join(dir, migration.filename), 'utf-8');

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [
      migration.version,
    ]);
    await client.query('COMMIT');
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Apply every pending migration, each in its own transaction.
 */
export async function runMigrations(pool: Pool, logger: Logger, dir: string): Promise<number> {
  await ensureMigrationsTable(pool);
  const migrations = await listMigrations(dir);
  const applied = await getAppliedVersions(pool);

  const pending = migrations.filter((m) => !applied.has(m.version));
  if (pending.length === 0) {
    logger.info('No pending migrations');
    return 0;
  }

  logger.info({ count: pending.length }, 'Applying pending migrations');
  for (const migration of pending) {
    await applyMigration(pool, dir, migration);
    logger.info({ version: migration.version, filename: migration.filename }, 'Applied migration');
  }

  return pending.length;
}
