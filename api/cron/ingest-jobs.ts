import type { VercelRequest, VercelResponse } from '@vercel/node';
import { loadConfig } from '../../src/config';
import { runIngest } from '../../src/services/runs';
import { authorizeCron } from '../../src/utils/cron-auth';
import { logger } from '../../src/utils/logger';

/**
 * Ingest cron endpoint
 * Expires old jobs, then admits new links posted in the channel
 */
export default async function handler(
  req: VercelRequest,
  res: VercelResponse
): Promise<void> {
  if (!authorizeCron(req, res)) return;

  const startTime = Date.now();
  logger.info('Ingest cron started');

  try {
    const config = loadConfig();
    const { expiry, admission } = await runIngest(config);

    const duration = Date.now() - startTime;
    logger.info('Ingest cron completed', { duration: `${duration}ms` });

    res.status(200).json({
      success: true,
      stats: {
        expiry,
        admission,
        duration: `${duration}ms`,
      },
    });
  } catch (error) {
    const duration = Date.now() - startTime;
    logger.error('Ingest cron failed', error, { duration: `${duration}ms` });

    res.status(500).json({
      success: false,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
  }
}
