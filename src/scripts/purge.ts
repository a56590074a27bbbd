import { loadConfig } from '../config';
import { closePool } from '../db/client';
import { runExpire, runPurge } from '../services/runs';
import { logger } from '../utils/logger';

/**
 * Runs the duplicate purge, or the retention sweep with --expire
 */
async function purge(): Promise<void> {
  const expireOnly = process.argv.includes('--expire');
  try {
    const config = loadConfig(process.env, { requireTelegram: false });
    const summary = expireOnly ? await runExpire(config) : await runPurge(config);
    logger.info(expireOnly ? 'Retention sweep finished' : 'Purge finished', { ...summary });
  } catch (error) {
    logger.error(expireOnly ? 'Retention sweep failed' : 'Purge failed', error);
    process.exitCode = 1;
  } finally {
    await closePool();
  }
}

void purge();
