import dotenv from 'dotenv';
import { loadConfig } from '../config.js';
import { createLogger } from '../logger.js';
import { createPool } from '../infra/db/pool.js';
import { runMigrations } from '../infra/db/migrate.js';

dotenv.config();

async function migrate(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, serviceName: config.serviceName });
  const pool = createPool(config.database, logger);

  try {
    logger.info({ dir: config.database.migrationsDir }, 'Starting migrations');
    const applied = await runMigrations(pool, logger, config.database.migrationsDir);
    logger.info({ applied }, 'Migrations complete');
  } catch (error) {
    logger.error({ err: error }, 'Migration failed');
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

migrate().catch((error: unknown) => {
  // Config or logger could not be built, so there is nothing better to log with
  console.error('Migration failed:', error);
  process.exit(1);
});
