import type { JobStore } from '../types/job';
import { logger } from '../utils/logger';

/**
 * Checks the shared store for a job already admitted from a URL.
 *
 * Store failures answer "not found" and never throw. Duplicates admitted
 * that way are collapsed by the next purge cycle.
 */
export class ExistenceGate {
  private readonly log = logger.child('existence-gate');

  constructor(private readonly store: JobStore) {}

  async exists(sourceLink: string): Promise<boolean> {
    try {
      const matches = await this.store.query('sourceLink', sourceLink, 1);
      return matches.length > 0;
    } catch (error) {
      this.log.error('Existence check failed, treating as new', error, { sourceLink });
      return false;
    }
  }
}
