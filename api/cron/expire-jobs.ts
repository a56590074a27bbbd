import type { VercelRequest, VercelResponse } from '@vercel/node';
import { loadConfig } from '../../src/config';
import { runExpire } from '../../src/services/runs';
import { authorizeCron } from '../../src/utils/cron-auth';
import { logger } from '../../src/utils/logger';

/**
 * Retention cron endpoint
 * Deletes jobs posted before the retention horizon
 */
export default async function handler(
  req: VercelRequest,
  res: VercelResponse
): Promise<void> {
  if (!authorizeCron(req, res)) return;

  try {
    const config = loadConfig(process.env, { requireTelegram: false });
    const summary = await runExpire(config);

    res.status(200).json({ success: true, stats: summary });
  } catch (error) {
    logger.error('Retention cron failed', error);

    res.status(500).json({
      success: false,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
  }
}
