import { MISSING_FIELD, type ScrapedJob } from '../types/job';

export type AdmissionVerdict =
  | { admitted: true }
  | { admitted: false; reason: string };

/**
 * Decides whether a scraped job is usable.
 * A job without a company name is never stored.
 */
export function checkAdmission(job: ScrapedJob): AdmissionVerdict {
  const company = (job.company || '').trim();
  if (!company || company.toUpperCase() === MISSING_FIELD) {
    return { admitted: false, reason: `company is missing or '${MISSING_FIELD}' (company='${company}')` };
  }

  if (!job.sourceLink.trim()) {
    return { admitted: false, reason: 'source link is empty' };
  }

  return { admitted: true };
}
