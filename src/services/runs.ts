import type { Config } from '../config';
import type { JobStore } from '../types/job';
import { getPool } from '../db/client';
import { JobsRepository } from '../db/jobs';
import { createPageFetcher } from '../scrapers/fetch-page';
import { createScraperRegistry, createScrapers } from '../scrapers';
import { AdmissionPipeline, type AdmissionStats } from './admission';
import { ExistenceGate } from './existence-gate';
import { FileSeenSet } from './seen-set';
import { NoopNotifier, OneSignalNotifier, type Notifier } from './notification-dispatcher';
import { PurgeService, type DeletionSummary, type PurgeSummary } from './purge';
import { TelegramChannelSource, type ChannelSource } from './telegram-channel';
import { logger } from '../utils/logger';

export interface IngestResult {
  expiry: DeletionSummary | null;
  admission: AdmissionStats;
}

export function createJobStore(config: Config): JobStore {
  return new JobsRepository(
    getPool({ databaseUrl: config.databaseUrl, statementTimeoutMs: config.dbStatementTimeoutMs })
  );
}

export function createPurgeService(config: Config, store: JobStore): PurgeService {
  return new PurgeService(store, {
    timeZone: config.cronExecutionTimezone,
    recentGraceDays: config.recentGraceDays,
    retentionDays: config.retentionDays,
    batchSize: config.purgeBatchSize,
  });
}

export function createNotifier(config: Config): Notifier {
  if (!config.oneSignal) {
    logger.warn('OneSignal is not configured, notifications disabled');
    return new NoopNotifier();
  }
  return new OneSignalNotifier(config.oneSignal.appId, config.oneSignal.restApiKey);
}

export function createAdmissionPipeline(config: Config, store: JobStore, notifier: Notifier): AdmissionPipeline {
  const scrapers = createScrapers(createPageFetcher(config.fetchTimeoutMs), config.cronExecutionTimezone);
  return new AdmissionPipeline(
    new FileSeenSet(config.seenSetPath),
    new ExistenceGate(store),
    createScraperRegistry(scrapers),
    store,
    notifier
  );
}

export function createChannelSource(config: Config): ChannelSource {
  return TelegramChannelSource.fromToken(config.telegram.botToken, {
    channelId: config.telegram.channelId,
    scanLimit: config.telegram.scanLimit,
    allowedDomains: config.targetDomains,
  });
}

/**
 * Daily ingest: expire old jobs, then admit new links from the channel.
 * A failed expiry is logged and does not block ingestion.
 */
export async function runIngest(config: Config): Promise<IngestResult> {
  const store = createJobStore(config);

  let expiry: DeletionSummary | null = null;
  try {
    expiry = await createPurgeService(config, store).expire();
  } catch (error) {
    logger.error('Expiry before ingest failed', error);
  }

  const urls = await createChannelSource(config).fetchCandidateUrls();
  const pipeline = createAdmissionPipeline(config, store, createNotifier(config));
  const admission = await pipeline.run(urls);

  return { expiry, admission };
}

export async function runPurge(config: Config): Promise<PurgeSummary> {
  return createPurgeService(config, createJobStore(config)).purge();
}

export async function runExpire(config: Config): Promise<DeletionSummary> {
  return createPurgeService(config, createJobStore(config)).expire();
}
