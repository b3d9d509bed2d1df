import { createPool } from '../db/client';
import { SCHEMA_SQL } from '../db/schema';
import { loadConfig } from '../config';
import { createLogger } from '../utils/logger';

/**
 * Database migration script
 * Creates the listings table for the postgres store
 */
async function migrate(): Promise<void> {
  const config = loadConfig({ ...process.env, STORE_BACKEND: 'postgres' });
  const logger = createLogger({ level: config.logLevel });

  if (!config.databaseUrl) {
    logger.error('Database migration failed', new Error('DATABASE_URL is not set'));
    process.exitCode = 1;
    return;
  }

  const pool = createPool({ databaseUrl: config.databaseUrl, ssl: config.databaseSsl });
  try {
    logger.info('Starting database migration...');
    await pool.query(SCHEMA_SQL);
    logger.info('Database migration completed successfully');
  } catch (error) {
    logger.error('Database migration failed', error);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

migrate().catch(error => {
  console.error(error);
  process.exitCode = 1;
});
