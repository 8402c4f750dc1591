import { Router, Request, Response } from 'express';
import pino from 'pino';
import { getRecentSweeps } from '../services/dashboard/queries.js';
import type { LoopStatus } from '../services/tracker/tracker-loop.js';

const log = pino({ name: 'status' });

/**
 * GET /api/status: Tracker loop state and the most recent sweeps.
 */
export function createStatusRouter(getLoopStatus: () => LoopStatus): Router {
  const router = Router();

  router.get('/', async (_req: Request, res: Response) => {
    try {
      const sweeps = await getRecentSweeps(10);
      res.json({ tracker: getLoopStatus(), recentSweeps: sweeps });
    } catch (err) {
      log.error({ err }, 'Failed to fetch status');
      res.status(500).json({ error: 'Failed to fetch status' });
    }
  });

  return router;
}
