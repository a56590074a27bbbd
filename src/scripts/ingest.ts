import { loadConfig } from '../config';
import { closePool } from '../db/client';
import { runIngest } from '../services/runs';
import { logger } from '../utils/logger';

/**
 * Runs one ingest pass outside the serverless host
 */
async function ingest(): Promise<void> {
  const startTime = Date.now();
  try {
    const result = await runIngest(loadConfig());
    logger.info('Ingest finished', {
      expiry: result.expiry,
      admission: result.admission,
      duration: `${Date.now() - startTime}ms`,
    });
  } catch (error) {
    logger.error('Ingest failed', error);
    process.exitCode = 1;
  } finally {
    await closePool();
  }
}

void ingest();
