/**
 * Job record schema
 * Every scraper must produce this structure before admission
 */
export interface ScrapedJob {
  company: string;
  jobTitle: string;
  experience: string;
  location: string;
  applyLink: string;
  description: string;
  /** "<company> | <jobTitle>" */
  title: string;
  sourceLink: string;
  /** YYYY-MM-DD, or whatever the page gave us */
  datePosted: string | null;
}

/**
 * Stored job. Fields are write-once; the id is assigned by the store.
 */
export interface JobRecord extends ScrapedJob {
  id: string;
}

/**
 * The columns a full-table scan needs for purge decisions
 */
export type JobSummary = Pick<JobRecord, 'id' | 'sourceLink' | 'datePosted'>;

export type QueryableField = 'sourceLink' | 'datePosted';

/**
 * Shared document store. Only single-record operations are assumed.
 */
export interface JobStore {
  query(field: QueryableField, value: string, limit?: number): Promise<JobRecord[]>;
  insert(job: ScrapedJob): Promise<string>;
  /** Resolves false when no record had that id */
  delete(id: string): Promise<boolean>;
  streamAll(batchSize?: number): AsyncIterable<JobSummary>;
}

export const MISSING_FIELD = 'N/A';
