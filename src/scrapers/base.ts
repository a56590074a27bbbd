import type { ScrapedJob } from '../types/job';

export type ScrapeResult =
  | { ok: true; job: ScrapedJob }
  | { ok: false; reason: string };

/**
 * Base interface for all job site scrapers
 * Each supported site must implement this interface
 */
export interface JobScraper {
  /**
   * Unique identifier for the site
   */
  readonly name: string;

  /**
   * Host the scraper handles (subdomains included)
   */
  readonly domain: string;

  /**
   * Fetches a posting page and extracts the job from it
   */
  scrape(url: string): Promise<ScrapeResult>;
}

export interface ScraperRegistry {
  forUrl(url: string): JobScraper | undefined;
}
