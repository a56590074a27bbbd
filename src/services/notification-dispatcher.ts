import fetch from 'node-fetch';
import { MISSING_FIELD, type ScrapedJob } from '../types/job';
import { logger } from '../utils/logger';

const ONESIGNAL_API_URL = 'https://onesignal.com/api/v1/notifications';

export interface Notifier {
  /**
   * Announces a newly stored job. Resolves false on failure, never rejects.
   */
  notify(job: ScrapedJob): Promise<boolean>;
}

export function formatNotificationMessage(job: ScrapedJob): string {
  const company = job.company || 'Unknown Company';
  const title = job.jobTitle || 'Job Opening';
  return `${company} has openings for ${title}. Click now to apply!`;
}

function notificationUrl(job: ScrapedJob): string {
  if (job.applyLink && job.applyLink !== MISSING_FIELD) return job.applyLink;
  return job.sourceLink || '#';
}

/**
 * Push notifications to every subscriber through OneSignal
 */
export class OneSignalNotifier implements Notifier {
  private readonly log = logger.child('onesignal');

  constructor(
    private readonly appId: string,
    private readonly restApiKey: string
  ) {}

  async notify(job: ScrapedJob): Promise<boolean> {
    const payload = {
      app_id: this.appId,
      included_segments: ['All'],
      headings: { en: 'Job Opening Notification' },
      contents: { en: formatNotificationMessage(job) },
      url: notificationUrl(job),
    };

    try {
      const response = await fetch(ONESIGNAL_API_URL, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json; charset=utf-8',
          Authorization: `Basic ${this.restApiKey}`,
        },
        body: JSON.stringify(payload),
        timeout: 20000,
      });

      if (response.status === 200 || response.status === 201 || response.status === 202) {
        this.log.info(`Notification sent for job: ${job.title}`);
        return true;
      }

      this.log.warn(`Failed to send notification (status=${response.status})`, {
        body: await response.text(),
        sourceLink: job.sourceLink,
      });
      return false;
    } catch (error) {
      this.log.error('Exception while sending notification', error, { sourceLink: job.sourceLink });
      return false;
    }
  }
}

/**
 * Used when no push provider is configured
 */
export class NoopNotifier implements Notifier {
  async notify(job: ScrapedJob): Promise<boolean> {
    logger.debug('Notifications disabled, skipping', { sourceLink: job.sourceLink });
    return true;
  }
}
