import Bottleneck from 'bottleneck';
import pino from 'pino';
import type { z } from 'zod';
import { FetchError, getErrorMessage } from '../../utils/errors.js';
import {
  rawCategoryListingSchema,
  rawHitFeedSchema,
  rawSeriesDetailSchema,
} from './schemas.js';
import {
  transformCategoryListing,
  transformHitFeedItem,
  transformSeriesDetail,
} from './transformers.js';
import type { CategoryListing, HitFeedItem, MarketplaceClient, SeriesDetail } from './types.js';

const logger = pino({ name: 'marketplace' });

export interface MarketplaceClientOptions {
  baseUrl: string;
  /** Hard budget for one HTTP call, including reading the body. */
  timeoutMs: number;
  /** Attempts per call for 429 and 5xx responses. */
  retries?: number;
  /** First backoff delay; doubles on each retry. */
  backoffMs?: number;
  limiter?: Bottleneck;
}

const DEFAULT_HEADERS = {
  accept: 'application/json, text/plain, */*',
  'user-agent': 'pack-tracker/1.0',
};

export function createMarketplaceClient(options: MarketplaceClientOptions): MarketplaceClient {
  const retries = options.retries ?? 3;
  const backoffMs = options.backoffMs ?? 1000;
  const limiter = options.limiter ?? new Bottleneck({ maxConcurrent: 1, minTime: 250 });
  const baseUrl = options.baseUrl.replace(/\/+$/, '');

  async function request(url: string): Promise<{ res: Response; body: unknown }> {
    try {
      const res = await fetch(url, {
        headers: DEFAULT_HEADERS,
        signal: AbortSignal.timeout(options.timeoutMs),
      });
      const body: unknown = res.ok ? await res.json() : null;
      return { res, body };
    } catch (err) {
      throw new FetchError(url, getErrorMessage(err), { cause: err instanceof Error ? err : undefined });
    }
  }

  async function marketplaceFetch<S extends z.ZodTypeAny>(url: string, schema: S): Promise<z.output<S>> {
    for (let attempt = 1; attempt <= retries; attempt++) {
      const { res, body } = await request(url);

      if (res.ok) {
        const parsed = schema.safeParse(body);
        if (!parsed.success) {
          throw new FetchError(url, 'unexpected response shape', { status: res.status });
        }
        return parsed.data;
      }

      if ((res.status === 429 || res.status >= 500) && attempt < retries) {
        const delay = Math.pow(2, attempt - 1) * backoffMs;
        logger.warn({ url, status: res.status, attempt, delay }, 'Retryable error, backing off');
        await new Promise((r) => setTimeout(r, delay));
        continue;
      }

      const text = await res.text().catch(() => '');
      throw new FetchError(url, `${res.status} ${res.statusText} ${text}`.trim(), { status: res.status });
    }

    throw new FetchError(url, 'max retries exhausted');
  }

  async function safeGet<S extends z.ZodTypeAny>(url: string, schema: S): Promise<z.output<S> | null> {
    try {
      return await limiter.schedule(() => marketplaceFetch(url, schema));
    } catch (err) {
      logger.error({ err, url }, 'Marketplace request failed');
      return null;
    }
  }

  return {
    async listCategories(): Promise<CategoryListing | null> {
      const raw = await safeGet(`${baseUrl}/slab-pack-categories`, rawCategoryListingSchema);
      return raw ? transformCategoryListing(raw) : null;
    },

    async getSeriesDetail(seriesId: string): Promise<SeriesDetail | null> {
      const url = `${baseUrl}/slab-pack-series/${encodeURIComponent(seriesId)}`;
      const raw = await safeGet(url, rawSeriesDetailSchema);
      if (!raw) return null;

      const detail = transformSeriesDetail(raw);
      if (!detail) {
        logger.warn({ seriesId }, 'Series detail payload has no id');
      }
      return detail;
    },

    async getHitFeed(limit: number, offset: number): Promise<HitFeedItem[] | null> {
      const params = new URLSearchParams({
        limit: String(limit),
        offset: String(offset),
        category: 'all',
      });
      const raw = await safeGet(`${baseUrl}/card-hit-feed?${params.toString()}`, rawHitFeedSchema);
      if (!raw) return null;

      logger.debug({ count: raw.items.length, limit, offset }, 'Fetched hit feed page');
      return raw.items.map(transformHitFeedItem);
    },
  };
}
