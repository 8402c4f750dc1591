import pino from 'pino';
import { getErrorMessage } from '../../utils/errors.js';
import type { ReconcilerDeps } from './reconciler.js';
import { runSweep } from './sweep.js';
import type { SweepStatus } from './types.js';

const log = pino({ name: 'tracker-loop' });

export interface TrackerLoopOptions {
  pollIntervalMs: number;
  seriesDelayMs: number;
  skipDelayMs: number;
  discoveryRetryMs: number;
  noTargetsRetryMs: number;
}

export interface LoopStatus {
  running: boolean;
  sweeping: boolean;
  sweepCount: number;
  lastSweepAt: string | null;
  lastSweepStatus: SweepStatus | null;
  lastError: string | null;
}

export interface TrackerLoop {
  /** Resolves once the in-flight series (if any) has finished. */
  stop(): Promise<void>;
  getStatus(): LoopStatus;
}

/**
 * Start the sweep loop. The first sweep runs immediately; the next one starts
 * after a pause chosen by how the last one ended. Sweeps never overlap.
 */
export function startTrackerLoop(deps: ReconcilerDeps, options: TrackerLoopOptions): TrackerLoop {
  const status: LoopStatus = {
    running: true,
    sweeping: false,
    sweepCount: 0,
    lastSweepAt: null,
    lastSweepStatus: null,
    lastError: null,
  };

  let wake: (() => void) | null = null;
  let timer: NodeJS.Timeout | null = null;

  const sleep = (ms: number): Promise<void> => {
    if (!status.running) return Promise.resolve();
    return new Promise<void>((resolve) => {
      wake = resolve;
      timer = setTimeout(() => {
        wake = null;
        timer = null;
        resolve();
      }, ms);
    });
  };

  const pauseAfter = (sweepStatus: SweepStatus): number => {
    switch (sweepStatus) {
      case 'no_categories':
        return options.discoveryRetryMs;
      case 'no_targets':
        return options.noTargetsRetryMs;
      case 'completed':
        return options.pollIntervalMs;
    }
  };

  async function run(): Promise<void> {
    log.info({ pollIntervalMs: options.pollIntervalMs }, 'Starting tracker loop');

    while (status.running) {
      status.sweeping = true;
      let pause = options.pollIntervalMs;

      try {
        const result = await runSweep(deps, {
          seriesDelayMs: options.seriesDelayMs,
          skipDelayMs: options.skipDelayMs,
          sleep,
          shouldStop: () => !status.running,
        });
        status.lastSweepStatus = result.status;
        status.lastError = null;
        pause = pauseAfter(result.status);
      } catch (err) {
        status.lastError = getErrorMessage(err);
        log.error({ err }, 'Sweep failed unexpectedly');
      } finally {
        status.sweeping = false;
        status.sweepCount++;
        status.lastSweepAt = new Date().toISOString();
      }

      await sleep(pause);
    }

    log.info({ sweepCount: status.sweepCount }, 'Tracker loop stopped');
  }

  const done = run();

  return {
    async stop() {
      status.running = false;
      if (timer) clearTimeout(timer);
      timer = null;
      const resolve = wake;
      wake = null;
      resolve?.();
      await done;
    },
    getStatus() {
      return { ...status };
    },
  };
}
