import TelegramBot from 'node-telegram-bot-api';
import { matchesDomain } from '../utils/urls';
import { logger } from '../utils/logger';

const URL_PATTERN = /https?:\/\/[^\s]+/g;
const TRAILING_PUNCTUATION = /[)\].,;!?'"»]+$/;
const ALLOWED_UPDATES = ['channel_post', 'message'];

export interface ChannelSource {
  /**
   * Finite, deduplicated list of job URLs on the allowed domains
   */
  fetchCandidateUrls(): Promise<string[]>;
}

/**
 * Finds job links in message texts, keeping only the allowed domains.
 * First-seen order, no repeats.
 */
export function extractCandidateUrls(texts: Iterable<string>, allowedDomains: string[]): string[] {
  const urls = new Set<string>();

  for (const text of texts) {
    for (const match of text.match(URL_PATTERN) ?? []) {
      const url = match.replace(TRAILING_PUNCTUATION, '');
      if (allowedDomains.some(domain => matchesDomain(url, domain))) {
        urls.add(url);
      }
    }
  }

  return [...urls];
}

function messageTexts(message: TelegramBot.Message): string[] {
  const texts: string[] = [];
  if (message.text) texts.push(message.text);
  if (message.caption) texts.push(message.caption);

  // Hyperlinked words carry their URL outside the text
  for (const entity of [...(message.entities ?? []), ...(message.caption_entities ?? [])]) {
    if (entity.type === 'text_link' && entity.url) texts.push(entity.url);
  }
  return texts;
}

export interface TelegramChannelOptions {
  channelId?: number;
  scanLimit: number;
  allowedDomains: string[];
}

/**
 * Reads recent posts the bot has received from the jobs channel
 */
export class TelegramChannelSource implements ChannelSource {
  private readonly log = logger.child('telegram');

  constructor(
    private readonly bot: Pick<TelegramBot, 'getUpdates'>,
    private readonly options: TelegramChannelOptions
  ) {}

  static fromToken(botToken: string, options: TelegramChannelOptions): TelegramChannelSource {
    return new TelegramChannelSource(new TelegramBot(botToken, { polling: false }), options);
  }

  /**
   * Pages through every pending update, confirming each batch by asking
   * for the next offset. A failed call keeps the texts read so far.
   */
  async fetchCandidateUrls(): Promise<string[]> {
    const texts: string[] = [];
    let scanned = 0;
    let offset: number | undefined;

    try {
      for (;;) {
        const updates = await this.bot.getUpdates({
          ...(offset === undefined ? {} : { offset }),
          limit: this.options.scanLimit,
          allowed_updates: ALLOWED_UPDATES,
        });
        if (updates.length === 0) break;
        scanned += updates.length;

        for (const update of updates) {
          const message = update.channel_post ?? update.message;
          if (!message) continue;
          if (this.options.channelId !== undefined && message.chat.id !== this.options.channelId) continue;

          texts.push(...messageTexts(message));
        }

        const next = updates[updates.length - 1].update_id + 1;
        if (offset !== undefined && next <= offset) break;
        offset = next;
      }
    } catch (error) {
      this.log.error('Error while reading channel updates', error, { scanned });
    }

    const urls = extractCandidateUrls(texts, this.options.allowedDomains);
    this.log.info(`Scanned ${scanned} updates, ${urls.length} candidate URLs`, {
      channelId: this.options.channelId,
    });
    return urls;
  }
}
