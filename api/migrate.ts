import type { VercelRequest, VercelResponse } from '@vercel/node';
import { loadConfig } from '../src/config';
import { getPool } from '../src/db/client';
import { logger } from '../src/utils/logger';

/**
 * Database schema - embedded for serverless compatibility
 * This matches the schema in src/db/schema.sql
 */
const SCHEMA_SQL = `
-- Jobs Table
-- One row per admitted posting. source_link is the natural key but is NOT
-- unique: duplicates are collapsed by the purge job.
CREATE TABLE IF NOT EXISTS jobs (
  id BIGSERIAL PRIMARY KEY,
  source_link TEXT NOT NULL DEFAULT '',
  date_posted TEXT,
  company TEXT NOT NULL,
  job_title TEXT NOT NULL,
  experience TEXT NOT NULL,
  location TEXT NOT NULL,
  apply_link TEXT NOT NULL,
  description TEXT NOT NULL,
  title TEXT NOT NULL,
  created_at TIMESTAMP WITH TIME ZONE DEFAULT NOW()
);

-- Indexes for the existence check and retention scans
CREATE INDEX IF NOT EXISTS idx_jobs_source_link ON jobs(source_link);
CREATE INDEX IF NOT EXISTS idx_jobs_date_posted ON jobs(date_posted);
`;

/**
 * Database migration API endpoint
 * Runs the schema to set up the jobs table
 * Secured with CRON_SECRET or MIGRATION_SECRET
 */
export default async function handler(
  req: VercelRequest,
  res: VercelResponse
): Promise<void> {
  const authHeader = req.headers.authorization;
  const expectedSecret = process.env.MIGRATION_SECRET || process.env.CRON_SECRET;

  if (expectedSecret && authHeader !== `Bearer ${expectedSecret}`) {
    logger.warn('Unauthorized migration request', { authHeader: authHeader ? 'present' : 'missing' });
    res.status(401).json({ error: 'Unauthorized' });
    return;
  }

  try {
    logger.info('Starting database migration...');

    const config = loadConfig(process.env, { requireTelegram: false });
    const pool = getPool({ databaseUrl: config.databaseUrl, statementTimeoutMs: config.dbStatementTimeoutMs });
    await pool.query(SCHEMA_SQL);

    logger.info('Database migration completed successfully');

    res.status(200).json({
      success: true,
      message: 'Database migration completed successfully',
    });
  } catch (error) {
    logger.error('Database migration failed', error);

    res.status(500).json({
      success: false,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
  }
}
