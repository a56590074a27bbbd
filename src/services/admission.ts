import type { JobStore, ScrapedJob } from '../types/job';
import type { JobScraper, ScraperRegistry, ScrapeResult } from '../scrapers/base';
import type { SeenSet } from './seen-set';
import type { ExistenceGate } from './existence-gate';
import type { Notifier } from './notification-dispatcher';
import { checkAdmission } from '../filters/admission-filter';
import { logger } from '../utils/logger';

export interface AdmissionStats {
  candidates: number;
  alreadySeen: number;
  existing: number;
  unsupported: number;
  scrapeFailed: number;
  rejected: number;
  inserted: number;
  insertFailed: number;
  notified: number;
  notifyFailed: number;
}

function emptyStats(candidates: number): AdmissionStats {
  return {
    candidates,
    alreadySeen: 0,
    existing: 0,
    unsupported: 0,
    scrapeFailed: 0,
    rejected: 0,
    inserted: 0,
    insertFailed: 0,
    notified: 0,
    notifyFailed: 0,
  };
}

/**
 * Turns candidate URLs into stored jobs, one URL at a time.
 *
 * A URL is marked seen only after its store write was attempted or it
 * failed terminally, so a crash can duplicate a job but never lose one.
 * Seen-set errors are not caught: they abort the run.
 */
export class AdmissionPipeline {
  private readonly log = logger.child('admission');

  constructor(
    private readonly seenSet: SeenSet,
    private readonly gate: ExistenceGate,
    private readonly scrapers: ScraperRegistry,
    private readonly store: JobStore,
    private readonly notifier: Notifier
  ) {}

  async run(urls: string[]): Promise<AdmissionStats> {
    const stats = emptyStats(urls.length);

    for (const url of urls) {
      await this.admit(url, stats);
    }

    this.log.info('Admission run completed', { ...stats });
    return stats;
  }

  private async admit(url: string, stats: AdmissionStats): Promise<void> {
    if (await this.seenSet.contains(url)) {
      stats.alreadySeen++;
      this.log.debug('Already processed, skipping', { url });
      return;
    }

    this.log.info(`Processing URL: ${url}`);

    if (await this.gate.exists(url)) {
      stats.existing++;
      this.log.info('Job for this URL already exists in the store, skipping', { url });
      await this.seenSet.add(url);
      return;
    }

    const scraper = this.scrapers.forUrl(url);
    if (!scraper) {
      stats.unsupported++;
      this.log.warn('Unsupported domain, skipping', { url });
      await this.seenSet.add(url);
      return;
    }

    const result = await this.scrape(scraper, url);
    if (!result.ok) {
      stats.scrapeFailed++;
      this.log.warn('Scraping failed for this URL', { url, reason: result.reason });
      await this.seenSet.add(url);
      return;
    }

    const verdict = checkAdmission(result.job);
    if (!verdict.admitted) {
      stats.rejected++;
      this.log.warn('Skipping posting', { url, reason: verdict.reason });
      await this.seenSet.add(url);
      return;
    }

    let id: string;
    try {
      id = await this.store.insert(result.job);
    } catch (error) {
      stats.insertFailed++;
      this.log.error('Failed to write job to the store', error, { url });
      await this.seenSet.add(url);
      return;
    }

    stats.inserted++;
    this.log.info('Job stored', { url, id, title: result.job.title });

    if (await this.notify(result.job)) {
      stats.notified++;
    } else {
      stats.notifyFailed++;
      this.log.warn('Notification failed', { url, id });
    }

    await this.seenSet.add(url);
  }

  private async scrape(scraper: JobScraper, url: string): Promise<ScrapeResult> {
    try {
      return await scraper.scrape(url);
    } catch (error) {
      this.log.error('Scraper threw', error, { url, scraper: scraper.name });
      return { ok: false, reason: error instanceof Error ? error.message : String(error) };
    }
  }

  private async notify(job: ScrapedJob): Promise<boolean> {
    try {
      return await this.notifier.notify(job);
    } catch (error) {
      this.log.error('Notifier threw', error, { url: job.sourceLink });
      return false;
    }
  }
}
