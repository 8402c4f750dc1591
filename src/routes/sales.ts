import { Router, Request, Response } from 'express';
import pino from 'pino';
import { z } from 'zod';
import { parseQuery } from '../middleware/validation.js';
import { getSoldEvents, getSuspectedSwaps } from '../services/dashboard/queries.js';
import { paginationSchema, toPagination } from '../utils/pagination.js';

const log = pino({ name: 'sales-route' });

const soldQuerySchema = paginationSchema.extend({
  seriesId: z.string().min(1).optional(),
  verified: z.enum(['true', 'false']).transform((v) => v === 'true').optional(),
});

const swapsQuerySchema = paginationSchema.extend({
  seriesId: z.string().min(1).optional(),
});

/**
 * GET /api/sold?seriesId=&verified=&page=&limit=N: Confirmed sales, newest first.
 */
export const soldRouter = Router();

soldRouter.get('/', async (req: Request, res: Response) => {
  const query = parseQuery(soldQuerySchema, req, res);
  if (!query) return;

  const { page, limit, offset } = toPagination(query);
  try {
    const result = await getSoldEvents({ seriesId: query.seriesId, verified: query.verified, limit, offset });
    res.json({ data: result.data, total: result.total, page, limit });
  } catch (err) {
    log.error({ err }, 'Failed to fetch sold events');
    res.status(500).json({ error: 'Failed to fetch sold events' });
  }
});

/**
 * GET /api/swaps?seriesId=&page=&limit=N: Suspected swaps, newest first.
 */
export const swapsRouter = Router();

swapsRouter.get('/', async (req: Request, res: Response) => {
  const query = parseQuery(swapsQuerySchema, req, res);
  if (!query) return;

  const { page, limit, offset } = toPagination(query);
  try {
    const result = await getSuspectedSwaps({ seriesId: query.seriesId, limit, offset });
    res.json({ data: result.data, total: result.total, page, limit });
  } catch (err) {
    log.error({ err }, 'Failed to fetch suspected swaps');
    res.status(500).json({ error: 'Failed to fetch suspected swaps' });
  }
});
