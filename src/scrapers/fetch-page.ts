import fetch from 'node-fetch';
import { logger } from '../utils/logger';

export type PageFetcher = (url: string) => Promise<string | null>;

/**
 * Browser header profiles, tried in order until one gets a 200
 */
const HEADER_PROFILES: Array<Record<string, string>> = [
  {
    'User-Agent':
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.9',
    Referer: 'https://www.google.com/',
    Connection: 'keep-alive',
    'Upgrade-Insecure-Requests': '1',
  },
  {
    'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:122.0) Gecko/20100101 Firefox/122.0',
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.9',
    Connection: 'keep-alive',
  },
];

export function createPageFetcher(timeoutMs: number): PageFetcher {
  const log = logger.child('fetch');

  return async (url: string): Promise<string | null> => {
    for (const headers of HEADER_PROFILES) {
      try {
        const response = await fetch(url, { headers, timeout: timeoutMs, redirect: 'follow' });
        if (response.status === 200) {
          return await response.text();
        }
        log.warn(`${url} -> status ${response.status}, trying next user agent`);
      } catch (error) {
        log.warn(`Error fetching ${url}`, {
          userAgent: headers['User-Agent'],
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    log.error(`All header profiles failed for ${url}`);
    return null;
  };
}
