import type { JobScraper, ScraperRegistry } from './base';
import type { PageFetcher } from './fetch-page';
import { SiteScraper } from './site-scraper';
import { matchesDomain } from '../utils/urls';

/**
 * Builds the scrapers for the supported job sites
 */
export function createScrapers(fetchPage: PageFetcher, timeZone: string): JobScraper[] {
  return [
    new SiteScraper(
      'fresheropenings',
      'fresheropenings.com',
      { headerCells: false, applyPhrase: 'click here to apply', dateSource: 'today' },
      fetchPage,
      timeZone
    ),
    new SiteScraper(
      'freshersrecruitment',
      'freshersrecruitment.co.in',
      { headerCells: true, applyPhrase: 'click here', dateSource: 'page' },
      fetchPage,
      timeZone
    ),
  ];
}

export function createScraperRegistry(scrapers: JobScraper[]): ScraperRegistry {
  return {
    forUrl: (url: string) => scrapers.find(scraper => matchesDomain(url, scraper.domain)),
  };
}
