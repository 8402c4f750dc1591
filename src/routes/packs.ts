import { Router, Request, Response } from 'express';
import pino from 'pino';
import { z } from 'zod';
import { parseParams, parseQuery } from '../middleware/validation.js';
import {
  getEvHistory,
  getLatestTierContributions,
  getPackOverviews,
  getValueHistory,
  seriesExists,
} from '../services/dashboard/queries.js';

const log = pino({ name: 'packs-route' });
const router = Router();

const seriesParamsSchema = z.object({ seriesId: z.string().min(1) });

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(200),
});

/**
 * GET /api/packs: Overview of every tracked series.
 */
router.get('/', async (_req: Request, res: Response) => {
  try {
    const packs = await getPackOverviews();
    res.json({ data: packs });
  } catch (err) {
    log.error({ err }, 'Failed to fetch pack overviews');
    res.status(500).json({ error: 'Failed to fetch packs' });
  }
});

/**
 * GET /api/packs/:seriesId/value-history?limit=N: Total estimated value over time.
 */
router.get('/:seriesId/value-history', async (req: Request, res: Response) => {
  const params = parseParams(seriesParamsSchema, req, res);
  const query = params && parseQuery(historyQuerySchema, req, res);
  if (!params || !query) return;

  try {
    if (!(await seriesExists(params.seriesId))) {
      res.status(404).json({ error: 'Series not found' });
      return;
    }
    const points = await getValueHistory(params.seriesId, query.limit);
    res.json({ seriesId: params.seriesId, data: points });
  } catch (err) {
    log.error({ err, seriesId: params.seriesId }, 'Failed to fetch value history');
    res.status(500).json({ error: 'Failed to fetch value history' });
  }
});

/**
 * GET /api/packs/:seriesId/ev-history?limit=N: EV and ROI over time.
 */
router.get('/:seriesId/ev-history', async (req: Request, res: Response) => {
  const params = parseParams(seriesParamsSchema, req, res);
  const query = params && parseQuery(historyQuerySchema, req, res);
  if (!params || !query) return;

  try {
    if (!(await seriesExists(params.seriesId))) {
      res.status(404).json({ error: 'Series not found' });
      return;
    }
    const points = await getEvHistory(params.seriesId, query.limit);
    res.json({ seriesId: params.seriesId, data: points });
  } catch (err) {
    log.error({ err, seriesId: params.seriesId }, 'Failed to fetch EV history');
    res.status(500).json({ error: 'Failed to fetch EV history' });
  }
});

/**
 * GET /api/packs/:seriesId/tiers: Tier breakdown of the latest EV snapshot.
 */
router.get('/:seriesId/tiers', async (req: Request, res: Response) => {
  const params = parseParams(seriesParamsSchema, req, res);
  if (!params) return;

  try {
    if (!(await seriesExists(params.seriesId))) {
      res.status(404).json({ error: 'Series not found' });
      return;
    }
    const tiers = await getLatestTierContributions(params.seriesId);
    res.json({ seriesId: params.seriesId, data: tiers });
  } catch (err) {
    log.error({ err, seriesId: params.seriesId }, 'Failed to fetch tier contributions');
    res.status(500).json({ error: 'Failed to fetch tiers' });
  }
});

export default router;
