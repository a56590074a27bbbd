/**
 * Configuration management
 * All behavior is driven by environment variables
 */

export interface Config {
  // Telegram
  telegram: {
    botToken: string;
    channelId?: number;
    scanLimit: number;
  };

  // Database
  databaseUrl: string;
  dbStatementTimeoutMs: number;

  // Ingest
  targetDomains: string[];
  seenSetPath: string;
  fetchTimeoutMs: number;

  // Notifications (disabled when either value is missing)
  oneSignal?: {
    appId: string;
    restApiKey: string;
  };

  // Cleanup
  cronExecutionTimezone: string;
  recentGraceDays: number;
  retentionDays: number;
  purgeBatchSize: number;
}

export const DEFAULT_TARGET_DOMAINS = ['fresheropenings.com', 'freshersrecruitment.co.in'];

type Env = Record<string, string | undefined>;

function parseStringArray(value: string | undefined, defaultValue: string[] = []): string[] {
  if (!value) return defaultValue;
  return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseOptionalNumber(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

function requireEnv(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

export interface LoadConfigOptions {
  /** Cleanup-only runs do not talk to Telegram */
  requireTelegram?: boolean;
}

export function loadConfig(
  env: Env = process.env,
  { requireTelegram = true }: LoadConfigOptions = {}
): Config {
  const databaseUrl = requireEnv(env, 'DATABASE_URL');
  const botToken = requireTelegram ? requireEnv(env, 'TELEGRAM_BOT_TOKEN') : env.TELEGRAM_BOT_TOKEN || '';

  const appId = env.ONESIGNAL_APP_ID;
  const restApiKey = env.ONESIGNAL_REST_API_KEY;

  return {
    telegram: {
      botToken,
      channelId: parseOptionalNumber(env.TELEGRAM_CHANNEL_ID),
      // Bot API caps each getUpdates page at 100
      scanLimit: Math.min(parseNumber(env.CHANNEL_SCAN_LIMIT, 100), 100),
    },
    databaseUrl,
    dbStatementTimeoutMs: parseNumber(env.DB_STATEMENT_TIMEOUT_MS, 10000),
    targetDomains: parseStringArray(env.TARGET_DOMAINS, DEFAULT_TARGET_DOMAINS),
    seenSetPath: env.SEEN_SET_PATH || 'processed_urls.txt',
    fetchTimeoutMs: parseNumber(env.FETCH_TIMEOUT_MS, 25000),
    oneSignal: appId && restApiKey ? { appId, restApiKey } : undefined,
    cronExecutionTimezone: env.CRON_EXECUTION_TIMEZONE || 'UTC',
    recentGraceDays: parseNumber(env.RECENT_GRACE_DAYS, 2),
    retentionDays: parseNumber(env.RETENTION_DAYS, 90),
    purgeBatchSize: parseNumber(env.PURGE_BATCH_SIZE, 500),
  };
}
