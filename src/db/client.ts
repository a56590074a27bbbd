import { Pool } from 'pg';
import { logger } from '../utils/logger';

let pool: Pool | null = null;

export interface PoolSettings {
  databaseUrl: string;
  /** Upper bound for any single statement, so one stuck delete cannot stall a sweep */
  statementTimeoutMs: number;
}

/**
 * Removes SSL query params so the explicit ssl option below takes precedence.
 * Managed Postgres URLs often carry sslmode=require.
 */
export function stripSslParams(databaseUrl: string): string {
  try {
    const url = new URL(databaseUrl);
    const sslParams = ['sslmode', 'ssl', 'sslcert', 'sslkey', 'sslrootcert', 'sslcrl'];
    sslParams.forEach(param => url.searchParams.delete(param));
    return url.toString();
  } catch {
    return databaseUrl;
  }
}

function isProduction(): boolean {
  return (
    process.env.NODE_ENV === 'production' ||
    process.env.VERCEL === '1' ||
    process.env.VERCEL_ENV === 'production' ||
    !!process.env.VERCEL_URL ||
    !!process.env.AWS_LAMBDA_FUNCTION_NAME ||
    !!process.env.GITHUB_ACTIONS
  );
}

export function getPool(settings: PoolSettings): Pool {
  if (!pool) {
    // Production always uses SSL; development may opt out with DATABASE_SSL=false
    const sslDisabled = !isProduction() && process.env.DATABASE_SSL === 'false';

    pool = new Pool({
      connectionString: stripSslParams(settings.databaseUrl),
      ssl: sslDisabled ? false : { rejectUnauthorized: false },
      max: 5,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
      statement_timeout: settings.statementTimeoutMs,
    });

    pool.on('error', (err) => {
      logger.error('Unexpected error on idle database client', err);
    });
  }

  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
