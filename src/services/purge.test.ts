import { describe, expect, it } from 'vitest';
import { PurgeService, compareIds, planPurge, type PurgeOptions } from './purge';
import type { JobSummary } from '../types/job';
import { InMemoryJobStore } from '../test-utils/in-memory-store';

const LINK = 'https://fresheropenings.com/acme-hiring/';
const OTHER = 'https://freshersrecruitment.co.in/globex-recruitment/';
const NOW = new Date('2024-03-10T12:00:00Z');

const options: PurgeOptions = {
  timeZone: 'UTC',
  recentGraceDays: 2,
  retentionDays: 90,
  batchSize: 500,
};

function summary(id: string, sourceLink: string, datePosted: string | null): JobSummary {
  return { id, sourceLink, datePosted };
}

describe('compareIds', () => {
  it('compares digit ids by value', () => {
    expect(compareIds('9', '10')).toBe(-1);
    expect(compareIds('10', '10')).toBe(0);
  });

  it('falls back to string order for other ids', () => {
    expect(compareIds('b', 'a')).toBe(1);
  });
});

describe('planPurge', () => {
  it('keeps the oldest record of a duplicate group, ties broken by id', () => {
    const plan = planPurge(
      [
        summary('1', LINK, '2024-01-01'),
        summary('2', LINK, '2024-01-05'),
        summary('3', LINK, '2024-01-01'),
      ],
      '2024-03-08'
    );

    expect(plan.duplicateGroups).toEqual([{ sourceLink: LINK, keep: '1', remove: ['3', '2'] }]);
    expect(plan.deleteIds).toEqual(['3', '2']);
    expect(plan.recentIds.size).toBe(0);
  });

  it('sorts records without a usable date after every dated record', () => {
    const plan = planPurge(
      [
        summary('1', LINK, null),
        summary('2', LINK, 'not a date'),
        summary('3', LINK, '2024-02-01'),
      ],
      '2024-03-08'
    );

    expect(plan.duplicateGroups).toEqual([{ sourceLink: LINK, keep: '3', remove: ['1', '2'] }]);
  });

  it('treats the cutoff date itself as recent', () => {
    const plan = planPurge(
      [
        summary('5', OTHER, '2024-03-08'),
        summary('6', LINK, '2024-03-07'),
      ],
      '2024-03-08'
    );

    expect([...plan.recentIds]).toEqual(['5']);
    expect(plan.deleteIds).toEqual(['5']);
  });

  it('does not count a recent record as a duplicate of an older one', () => {
    const plan = planPurge(
      [
        summary('1', LINK, '2024-01-01'),
        summary('8', LINK, '2024-03-09'),
      ],
      '2024-03-08'
    );

    expect([...plan.recentIds]).toEqual(['8']);
    expect(plan.duplicateIds.size).toBe(0);
    expect(plan.deleteIds).toEqual(['8']);
  });

  it('orders numeric ids by value when dates tie', () => {
    const plan = planPurge(
      [
        summary('10', LINK, '2024-01-01'),
        summary('9', LINK, '2024-01-01'),
      ],
      '2024-03-08'
    );

    expect(plan.duplicateGroups[0].keep).toBe('9');
  });

  it('never groups records with an empty source link', () => {
    const plan = planPurge(
      [
        summary('1', '', '2024-01-01'),
        summary('2', '  ', '2024-01-02'),
      ],
      '2024-03-08'
    );

    expect(plan.deleteIds).toEqual([]);
  });

  it('groups links that differ only by surrounding whitespace', () => {
    const plan = planPurge(
      [
        summary('1', LINK, '2024-01-01'),
        summary('2', ` ${LINK} `, '2024-01-02'),
      ],
      '2024-03-08'
    );

    expect(plan.deleteIds).toEqual(['2']);
  });
});

describe('PurgeService.purge', () => {
  it('removes recent records and duplicates, leaving one record per link', async () => {
    const store = new InMemoryJobStore();
    store.seed('1', LINK, '2024-01-01');
    store.seed('2', LINK, '2024-01-05');
    store.seed('3', LINK, '2024-01-01');
    store.seed('4', OTHER, '2024-03-10');
    store.seed('6', OTHER, '2024-02-01');

    const result = await new PurgeService(store, options).purge(NOW);

    expect(store.ids()).toEqual(['1', '6']);
    expect(result).toEqual({
      scanned: 5,
      scheduled: 3,
      deleted: 3,
      missing: 0,
      failed: 0,
      recent: 1,
      duplicates: 2,
    });
  });

  it('deletes nothing on a second run over the same store', async () => {
    const store = new InMemoryJobStore();
    store.seed('1', LINK, '2024-01-01');
    store.seed('2', LINK, '2024-01-05');
    const service = new PurgeService(store, options);

    await service.purge(NOW);
    const second = await service.purge(NOW);

    expect(second.scheduled).toBe(0);
    expect(store.ids()).toEqual(['1']);
  });

  it('keeps going when a single delete fails', async () => {
    class FlakyStore extends InMemoryJobStore {
      async delete(id: string): Promise<boolean> {
        if (id === '3') throw new Error('statement timeout');
        return super.delete(id);
      }
    }
    const store = new FlakyStore();
    store.seed('1', LINK, '2024-01-01');
    store.seed('2', LINK, '2024-01-05');
    store.seed('3', LINK, '2024-01-06');
    store.seed('4', OTHER, '2024-01-01');
    store.seed('5', OTHER, '2024-01-02');

    const result = await new PurgeService(store, options).purge(NOW);

    expect(result.failed).toBe(1);
    expect(result.deleted).toBe(2);
    expect(store.ids()).toEqual(['1', '3', '4']);
  });

  it('counts records that vanished before their delete as missing', async () => {
    class VanishingStore extends InMemoryJobStore {
      async delete(): Promise<boolean> {
        return false;
      }
    }
    const store = new VanishingStore();
    store.seed('1', LINK, '2024-03-09');

    const result = await new PurgeService(store, options).purge(NOW);

    expect(result.missing).toBe(1);
    expect(result.deleted).toBe(0);
  });

  it('aborts before deleting anything when the scan fails', async () => {
    class BrokenScanStore extends InMemoryJobStore {
      async *streamAll(): AsyncIterable<JobSummary> {
        throw new Error('connection reset');
      }
    }
    const store = new BrokenScanStore();
    store.seed('1', LINK, '2024-03-09');

    await expect(new PurgeService(store, options).purge(NOW)).rejects.toThrow('connection reset');
    expect(store.deleted).toEqual([]);
  });

  it('computes today in the configured time zone', async () => {
    const store = new InMemoryJobStore();
    // 2024-03-10T20:00Z is already 2024-03-11 in Kolkata, so the cutoff is 2024-03-09
    store.seed('1', LINK, '2024-03-08');
    store.seed('2', OTHER, '2024-03-09');

    await new PurgeService(store, { ...options, timeZone: 'Asia/Kolkata' })
      .purge(new Date('2024-03-10T20:00:00Z'));

    expect(store.ids()).toEqual(['1']);
  });
});

describe('PurgeService.expire', () => {
  it('deletes records posted before the retention horizon and skips unknown dates', async () => {
    const store = new InMemoryJobStore();
    store.seed('1', LINK, '2023-12-10');
    store.seed('2', LINK, '2023-12-11');
    store.seed('3', OTHER, null);
    store.seed('4', OTHER, 'yesterday');

    const result = await new PurgeService(store, options).expire(NOW);

    expect(store.ids()).toEqual(['2', '3', '4']);
    expect(result).toEqual({ scanned: 4, scheduled: 1, deleted: 1, missing: 0, failed: 0 });
  });
});
