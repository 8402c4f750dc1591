import express from 'express';
import helmet from 'helmet';
import pino from 'pino';
import healthRouter from './routes/health.js';
import packsRouter from './routes/packs.js';
import { soldRouter, swapsRouter } from './routes/sales.js';
import { createStatusRouter } from './routes/status.js';
import type { LoopStatus } from './services/tracker/tracker-loop.js';

const logger = pino({ name: 'http' });

export interface AppDeps {
  getLoopStatus: () => LoopStatus;
}

/** Read-only dashboard API. */
export function createApp(deps: AppDeps): express.Express {
  const app = express();

  app.set('trust proxy', 1);
  app.use(helmet());
  app.use(express.json());

  app.use((req, _res, next) => {
    logger.info({ method: req.method, url: req.url }, 'request');
    next();
  });

  app.use(healthRouter);
  app.use('/api/packs', packsRouter);
  app.use('/api/sold', soldRouter);
  app.use('/api/swaps', swapsRouter);
  app.use('/api/status', createStatusRouter(deps.getLoopStatus));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
