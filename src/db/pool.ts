import pg from 'pg';
import pino from 'pino';
import { config } from '../config/index.js';
import { ConfigurationError, getErrorMessage } from '../utils/errors.js';

const logger = pino({ name: 'db' });

export const pool = new pg.Pool({
  connectionString: config.DATABASE_URL,
  max: 10,
});

pool.on('error', (err) => {
  logger.error({ err }, 'Unexpected error on idle database client');
});

/**
 * Retry `SELECT 1` until the database answers. Gives up with a
 * ConfigurationError after `retries` attempts.
 */
export async function waitForDatabase(
  db: { query(sql: string): Promise<unknown> },
  retries: number,
  delayMs: number,
  sleep: (ms: number) => Promise<void> = (ms) => new Promise((r) => setTimeout(r, ms)),
): Promise<void> {
  let lastError: unknown;
  for (let attempt = 1; attempt <= retries; attempt++) {
    try {
      await db.query('SELECT 1');
      logger.info({ attempt }, 'Database connected');
      return;
    } catch (err) {
      lastError = err;
      logger.warn({ attempt, retries, error: getErrorMessage(err) }, 'Database not ready');
      if (attempt < retries) await sleep(delayMs);
    }
  }
  throw new ConfigurationError(`Database unreachable after ${retries} attempts`, {
    cause: lastError instanceof Error ? lastError : undefined,
  });
}
