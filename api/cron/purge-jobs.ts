import type { VercelRequest, VercelResponse } from '@vercel/node';
import { loadConfig } from '../../src/config';
import { runPurge } from '../../src/services/runs';
import { authorizeCron } from '../../src/utils/cron-auth';
import { logger } from '../../src/utils/logger';

/**
 * Purge cron endpoint
 * Removes jobs inside the recency window and collapses duplicate source links
 */
export default async function handler(
  req: VercelRequest,
  res: VercelResponse
): Promise<void> {
  if (!authorizeCron(req, res)) return;

  const startTime = Date.now();

  try {
    const config = loadConfig(process.env, { requireTelegram: false });
    const summary = await runPurge(config);

    res.status(200).json({
      success: true,
      stats: { ...summary, duration: `${Date.now() - startTime}ms` },
    });
  } catch (error) {
    logger.error('Purge cron failed', error, { duration: `${Date.now() - startTime}ms` });

    res.status(500).json({
      success: false,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
  }
}
