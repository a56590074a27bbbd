import type { Pool } from 'pg';
import type { JobRecord, JobStore, JobSummary, QueryableField, ScrapedJob } from '../types/job';
import { logger } from '../utils/logger';

const COLUMNS: Record<QueryableField, string> = {
  sourceLink: 'source_link',
  datePosted: 'date_posted',
};

const SELECT_JOB = `
  SELECT id::text AS id, source_link, date_posted, company, job_title,
         experience, location, apply_link, description, title
  FROM jobs`;

type JobRow = {
  id: string;
  source_link: string;
  date_posted: string | null;
  company: string;
  job_title: string;
  experience: string;
  location: string;
  apply_link: string;
  description: string;
  title: string;
};

type SummaryRow = Pick<JobRow, 'id' | 'source_link' | 'date_posted'>;

export type Queryable = Pick<Pool, 'query'>;

function toRecord(row: JobRow): JobRecord {
  return {
    id: row.id,
    sourceLink: row.source_link,
    datePosted: row.date_posted,
    company: row.company,
    jobTitle: row.job_title,
    experience: row.experience,
    location: row.location,
    applyLink: row.apply_link,
    description: row.description,
    title: row.title,
  };
}

/**
 * Database operations for jobs
 * Single-row reads, inserts and deletes only; no transactions
 */
export class JobsRepository implements JobStore {
  constructor(private readonly db: Queryable) {}

  async query(field: QueryableField, value: string, limit = 100): Promise<JobRecord[]> {
    const result = await this.db.query<JobRow>(
      `${SELECT_JOB} WHERE ${COLUMNS[field]} = $1 ORDER BY id LIMIT $2`,
      [value, limit]
    );
    return result.rows.map(toRecord);
  }

  async insert(job: ScrapedJob): Promise<string> {
    try {
      const result = await this.db.query<{ id: string }>(
        `INSERT INTO jobs (
          source_link, date_posted, company, job_title, experience,
          location, apply_link, description, title
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
        RETURNING id::text AS id`,
        [
          job.sourceLink,
          job.datePosted,
          job.company,
          job.jobTitle,
          job.experience,
          job.location,
          job.applyLink,
          job.description,
          job.title,
        ]
      );

      const row = result.rows[0];
      if (!row) {
        throw new Error('Insert returned no id');
      }
      return row.id;
    } catch (error) {
      logger.error(`Error inserting job`, error, { sourceLink: job.sourceLink });
      throw error;
    }
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.db.query('DELETE FROM jobs WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }

  /**
   * Keyset-paginated scan of the purge metadata, in id order
   */
  async *streamAll(batchSize = 500): AsyncIterable<JobSummary> {
    let lastId = '0';

    for (;;) {
      const result = await this.db.query<SummaryRow>(
        `SELECT id::text AS id, source_link, date_posted
         FROM jobs
         WHERE id > $1
         ORDER BY id
         LIMIT $2`,
        [lastId, batchSize]
      );

      for (const row of result.rows) {
        yield { id: row.id, sourceLink: row.source_link, datePosted: row.date_posted };
      }

      if (result.rows.length < batchSize) return;
      lastId = result.rows[result.rows.length - 1].id;
    }
  }
}
