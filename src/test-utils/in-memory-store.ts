import type { JobRecord, JobStore, JobSummary, QueryableField, ScrapedJob } from '../types/job';
import { MISSING_FIELD } from '../types/job';

/**
 * JobStore kept in a Map, ids assigned from a counter
 */
export class InMemoryJobStore implements JobStore {
  readonly records = new Map<string, JobRecord>();
  readonly deleted: string[] = [];
  private nextId = 1;

  async query(field: QueryableField, value: string, limit = 100): Promise<JobRecord[]> {
    return [...this.records.values()].filter(r => r[field] === value).slice(0, limit);
  }

  async insert(job: ScrapedJob): Promise<string> {
    const id = String(this.nextId++);
    this.records.set(id, { ...job, id });
    return id;
  }

  async delete(id: string): Promise<boolean> {
    this.deleted.push(id);
    return this.records.delete(id);
  }

  async *streamAll(): AsyncIterable<JobSummary> {
    for (const { id, sourceLink, datePosted } of [...this.records.values()]) {
      yield { id, sourceLink, datePosted };
    }
  }

  seed(id: string, sourceLink: string, datePosted: string | null): void {
    this.records.set(id, { ...sampleJob({ sourceLink, datePosted }), id });
  }

  ids(): string[] {
    return [...this.records.keys()];
  }
}

export function sampleJob(overrides: Partial<ScrapedJob> = {}): ScrapedJob {
  const job: ScrapedJob = {
    company: 'Acme Corp',
    jobTitle: 'Software Engineer',
    experience: 'Freshers',
    location: 'Pune',
    applyLink: 'https://apply.example.com/acme',
    description: MISSING_FIELD,
    title: 'Acme Corp | Software Engineer',
    sourceLink: 'https://fresheropenings.com/acme-hiring/',
    datePosted: '2024-03-01',
    ...overrides,
  };
  return job;
}
