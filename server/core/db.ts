import { Pool, type QueryResult, type QueryResultRow } from 'pg';
import { getErrorMessage, getErrorCode } from '../utils/errorUtils';
import { loadConfig } from './config';
import { logger } from './logger';

const config = loadConfig();

export const pool = new Pool({
  connectionString: config.databaseUrl,
  connectionTimeoutMillis: 10000,
  idleTimeoutMillis: 30000,
  max: config.dbPoolMax,
  ssl: config.isProduction ? { rejectUnauthorized: false } : undefined,
});

pool.on('error', (err) => {
  logger.error('[Database] Pool error:', { extra: { detail: err.message } });
});

// Connection drops worth another attempt; anything else is a real query failure.
const TRANSIENT_ERRORS = ['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE', 'Connection terminated', 'timeout expired'];

function isTransient(error: unknown): boolean {
  const message = getErrorMessage(error);
  const code = getErrorCode(error);
  return TRANSIENT_ERRORS.some(e => message.includes(e) || code === e);
}

/** Raw query with exponential backoff on transient connection errors. */
export async function queryWithRetry<T extends QueryResultRow = Record<string, unknown>>(
  queryText: string,
  params?: unknown[],
  maxRetries: number = 3
): Promise<QueryResult<T>> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await pool.query<T>(queryText, params);
    } catch (error: unknown) {
      if (!isTransient(error) || attempt >= maxRetries) {
        throw error;
      }
      const delay = Math.min(100 * 2 ** (attempt - 1), 2000);
      logger.warn(`[Database] Retrying query (attempt ${attempt}/${maxRetries}) after ${delay}ms`, { error });
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }
}

export function getPoolStatus() {
  return {
    total: pool.totalCount,
    idle: pool.idleCount,
    waiting: pool.waitingCount,
  };
}
