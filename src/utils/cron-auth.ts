import type { VercelRequest, VercelResponse } from '@vercel/node';
import { logger } from './logger';

/**
 * Rejects the request with 401 unless it carries the cron secret.
 * With no secret configured every request passes.
 */
export function authorizeCron(
  req: Pick<VercelRequest, 'headers'>,
  res: Pick<VercelResponse, 'status'>,
  secret: string | undefined = process.env.CRON_SECRET
): boolean {
  const authHeader = req.headers.authorization;

  if (secret && authHeader !== `Bearer ${secret}`) {
    logger.warn('Unauthorized cron request', { authHeader: authHeader ? 'present' : 'missing' });
    res.status(401).json({ error: 'Unauthorized' });
    return false;
  }
  return true;
}
