import type { JobStore, JobSummary } from '../types/job';
import { parseIsoDate, shiftDays, todayIn } from '../utils/dates';
import { logger } from '../utils/logger';

export interface DuplicateGroup {
  sourceLink: string;
  keep: string;
  remove: string[];
}

export interface PurgePlan {
  recentIds: Set<string>;
  duplicateIds: Set<string>;
  duplicateGroups: DuplicateGroup[];
  /** Union of both sets, recent first, each id once */
  deleteIds: string[];
}

export interface DeletionSummary {
  scanned: number;
  scheduled: number;
  deleted: number;
  missing: number;
  failed: number;
}

export interface PurgeSummary extends DeletionSummary {
  recent: number;
  duplicates: number;
}

export interface PurgeOptions {
  timeZone: string;
  /** Records posted on or after today minus this many days are removed */
  recentGraceDays: number;
  /** Records posted before today minus this many days are removed by expire() */
  retentionDays: number;
  batchSize: number;
}

const DIGITS = /^\d+$/;

/**
 * Orders store ids. Numeric ids compare by value, anything else as strings.
 */
export function compareIds(a: string, b: string): number {
  if (DIGITS.test(a) && DIGITS.test(b)) {
    const x = BigInt(a);
    const y = BigInt(b);
    return x < y ? -1 : x > y ? 1 : 0;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Oldest first by (datePosted, id); unknown dates after every known date
 */
export function compareForSurvival(a: JobSummary, b: JobSummary): number {
  const da = parseIsoDate(a.datePosted);
  const db = parseIsoDate(b.datePosted);

  if (da !== db) {
    if (da === null) return 1;
    if (db === null) return -1;
    return da < db ? -1 : 1;
  }
  return compareIds(a.id, b.id);
}

/**
 * Decides which records a purge cycle removes:
 * everything posted on or after `recentCutoff`, then all but the oldest
 * record of each group sharing a non-empty source link.
 */
export function planPurge(records: Iterable<JobSummary>, recentCutoff: string): PurgePlan {
  const recentIds = new Set<string>();
  const groups = new Map<string, JobSummary[]>();

  for (const record of records) {
    const date = parseIsoDate(record.datePosted);
    if (date !== null && date >= recentCutoff) {
      recentIds.add(record.id);
      continue;
    }

    const link = (record.sourceLink || '').trim();
    if (!link) continue;

    const group = groups.get(link);
    if (group) group.push(record);
    else groups.set(link, [record]);
  }

  const duplicateIds = new Set<string>();
  const duplicateGroups: DuplicateGroup[] = [];

  for (const [sourceLink, members] of groups) {
    if (members.length < 2) continue;

    const [keep, ...rest] = [...members].sort(compareForSurvival);
    const remove = rest.map(r => r.id);
    remove.forEach(id => duplicateIds.add(id));
    duplicateGroups.push({ sourceLink, keep: keep.id, remove });
  }

  const deleteIds = [...new Set([...recentIds, ...duplicateIds])];
  return { recentIds, duplicateIds, duplicateGroups, deleteIds };
}

/**
 * Batch cleanup of the jobs store.
 * Each delete stands alone; one failure never stops the rest.
 */
export class PurgeService {
  private readonly log = logger.child('purge');

  constructor(
    private readonly store: JobStore,
    private readonly options: PurgeOptions
  ) {}

  /**
   * Recency and duplicate purge
   */
  async purge(now: Date = new Date()): Promise<PurgeSummary> {
    const today = todayIn(this.options.timeZone, now);
    const cutoff = shiftDays(today, -this.options.recentGraceDays);
    this.log.info(`Starting purge, recent cutoff ${cutoff}`);

    const records = await this.scan();
    const plan = planPurge(records, cutoff);

    this.log.info('Purge planned', {
      scanned: records.length,
      recent: plan.recentIds.size,
      duplicates: plan.duplicateIds.size,
      scheduled: plan.deleteIds.length,
    });
    for (const group of plan.duplicateGroups) {
      this.log.info(`sourceLink has ${group.remove.length + 1} records, keeping ${group.keep}`, {
        sourceLink: group.sourceLink,
        remove: group.remove,
      });
    }

    const summary: PurgeSummary = {
      ...(await this.deleteEach(plan.deleteIds, records.length)),
      recent: plan.recentIds.size,
      duplicates: plan.duplicateIds.size,
    };
    this.log.info('Purge completed', { ...summary });
    return summary;
  }

  /**
   * Age-horizon cleanup. Records without a usable date are left alone.
   */
  async expire(now: Date = new Date()): Promise<DeletionSummary> {
    const today = todayIn(this.options.timeZone, now);
    const cutoff = shiftDays(today, -this.options.retentionDays);
    this.log.info(`Starting expiry of jobs posted before ${cutoff}`, {
      retentionDays: this.options.retentionDays,
    });

    const records = await this.scan();
    const expired: string[] = [];
    for (const record of records) {
      const date = parseIsoDate(record.datePosted);
      if (date === null) {
        this.log.debug(`Skipping ${record.id}: unparsable datePosted`, { datePosted: record.datePosted });
        continue;
      }
      if (date < cutoff) expired.push(record.id);
    }

    const summary = await this.deleteEach(expired, records.length);
    this.log.info('Expiry completed', { ...summary });
    return summary;
  }

  private async scan(): Promise<JobSummary[]> {
    const records: JobSummary[] = [];
    for await (const record of this.store.streamAll(this.options.batchSize)) {
      records.push(record);
    }
    return records;
  }

  private async deleteEach(ids: string[], scanned: number): Promise<DeletionSummary> {
    const summary: DeletionSummary = { scanned, scheduled: ids.length, deleted: 0, missing: 0, failed: 0 };

    for (const id of ids) {
      try {
        if (await this.store.delete(id)) {
          summary.deleted++;
          this.log.debug(`Deleted ${id}`);
        } else {
          summary.missing++;
          this.log.warn(`No record found for ${id}, skipping`);
        }
      } catch (error) {
        summary.failed++;
        this.log.error(`Failed to delete ${id}`, error);
      }
    }

    return summary;
  }
}
