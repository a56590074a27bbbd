import { readFileSync } from 'fs';
import { join } from 'path';
import { loadConfig } from '../config';
import { closePool, getPool } from '../db/client';
import { logger } from '../utils/logger';

/**
 * Database migration script
 * Runs the schema.sql file to set up the database
 */
async function migrate(): Promise<void> {
  try {
    logger.info('Starting database migration...');

    const config = loadConfig(process.env, { requireTelegram: false });
    const schemaPath = join(__dirname, '../db/schema.sql');
    const schema = readFileSync(schemaPath, 'utf-8');

    const pool = getPool({ databaseUrl: config.databaseUrl, statementTimeoutMs: config.dbStatementTimeoutMs });
    await pool.query(schema);

    logger.info('Database migration completed successfully');
  } catch (error) {
    logger.error('Database migration failed', error);
    process.exitCode = 1;
  } finally {
    await closePool();
  }
}

void migrate();
