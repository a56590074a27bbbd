import type { JobScraper, ScrapeResult } from './base';
import type { PageFetcher } from './fetch-page';
import { extractJob, type ExtractOptions } from './extract';
import { todayIn } from '../utils/dates';
import { logger, type Logger } from '../utils/logger';

export type SiteOptions = Omit<ExtractOptions, 'today'>;

/**
 * Scraper for one WordPress job site
 */
export class SiteScraper implements JobScraper {
  private readonly log: Logger;

  constructor(
    readonly name: string,
    readonly domain: string,
    private readonly options: SiteOptions,
    private readonly fetchPage: PageFetcher,
    private readonly timeZone: string,
    private readonly now: () => Date = () => new Date()
  ) {
    this.log = logger.child(`scraper:${name}`);
  }

  async scrape(url: string): Promise<ScrapeResult> {
    this.log.info(`Fetching URL: ${url}`);

    const html = await this.fetchPage(url);
    if (html === null) {
      return { ok: false, reason: 'page could not be fetched' };
    }

    const job = extractJob(html, url, {
      ...this.options,
      today: todayIn(this.timeZone, this.now()),
    });

    this.log.debug('Extracted job', { job });
    return { ok: true, job };
  }
}
