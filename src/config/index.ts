import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envSchema = z.object({
  DATABASE_URL: z.string(),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(3000),

  MARKETPLACE_API_BASE_URL: z.string().url().default('https://api.arenaclub.com/v2'),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  // Loop pacing
  POLL_INTERVAL_MS: z.coerce.number().int().nonnegative().default(5_000),
  SERIES_DELAY_MS: z.coerce.number().int().nonnegative().default(2_000),
  SKIP_DELAY_MS: z.coerce.number().int().nonnegative().default(1_000),
  DISCOVERY_RETRY_MS: z.coerce.number().int().nonnegative().default(60_000),
  NO_TARGETS_RETRY_MS: z.coerce.number().int().nonnegative().default(300_000),

  HIT_FEED_LIMIT: z.coerce.number().int().positive().default(50),
  HIT_FEED_PAGES: z.coerce.number().int().positive().default(1),

  TRACKER_CONFIG_PATH: z.string().default('config/tracker.json'),

  DB_CONNECT_RETRIES: z.coerce.number().int().positive().default(30),
  DB_CONNECT_DELAY_MS: z.coerce.number().int().nonnegative().default(2_000),
});

export type AppConfig = z.infer<typeof envSchema>;

export const config: AppConfig = envSchema.parse(process.env);
