import pino from 'pino';
import type { SeriesTarget } from '../../config/tracker-config.js';
import type { CategoryListing } from '../marketplace/types.js';
import { reconcileSeries, type ReconcilerDeps, type SeriesCycleResult } from './reconciler.js';
import type { SweepRecord, SweepStatus } from './types.js';

const log = pino({ name: 'sweep' });

export interface ResolvedTarget {
  target: SeriesTarget;
  seriesId: string;
}

export interface SweepOptions {
  /** Pause after a series that was fetched. */
  seriesDelayMs: number;
  /** Pause after a series that was skipped. */
  skipDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
  /** Checked between series; a true result ends the sweep early. */
  shouldStop?: () => boolean;
}

export interface SweepResult extends SweepRecord {
  results: SeriesCycleResult[];
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Map configured (category, series) names onto upstream series ids. Names
 * compare case-insensitively; targets that do not resolve are left out.
 */
export function resolveTargets(listing: CategoryListing, targets: readonly SeriesTarget[]): ResolvedTarget[] {
  const index = new Map<string, Map<string, string>>();
  for (const category of listing.items) {
    const key = category.name.toLowerCase();
    const seriesByName = index.get(key) ?? new Map<string, string>();
    for (const s of category.series) {
      if (s.id) seriesByName.set(s.name.toLowerCase(), s.id);
    }
    index.set(key, seriesByName);
  }

  const resolved: ResolvedTarget[] = [];
  for (const target of targets) {
    const seriesId = index.get(target.categoryName.toLowerCase())?.get(target.seriesName.toLowerCase());
    if (seriesId) {
      resolved.push({ target, seriesId });
    } else {
      log.warn({ ...target }, 'Target series not found in category listing');
    }
  }
  return resolved;
}

/**
 * One pass over every tracked series, in configured order. Series never
 * affect each other; a failure is counted and the sweep moves on. Every
 * sweep is recorded in the run log, whatever its outcome.
 */
export async function runSweep(deps: ReconcilerDeps, options: SweepOptions): Promise<SweepResult> {
  const now = deps.now ?? (() => new Date());
  const sleep = options.sleep ?? defaultSleep;
  const startedAt = now();
  const results: SeriesCycleResult[] = [];

  const finish = async (status: SweepStatus, metadata: Record<string, unknown>): Promise<SweepResult> => {
    const record: SweepRecord = {
      status,
      startedAt,
      completedAt: now(),
      seriesAttempted: results.length,
      seriesCompleted: 0,
      seriesSkipped: 0,
      seriesFailed: 0,
      soldConfirmed: 0,
      swapsSuspected: 0,
      errorMessage: null,
      metadata,
    };
    const failures: string[] = [];
    for (const r of results) {
      if (r.status === 'completed') {
        record.seriesCompleted++;
        record.soldConfirmed += r.soldConfirmed;
        record.swapsSuspected += r.swapsSuspected;
      } else if (r.status === 'skipped') {
        record.seriesSkipped++;
      } else {
        record.seriesFailed++;
        failures.push(`${r.seriesId} [${r.step}]: ${r.error}`);
      }
    }
    if (failures.length > 0) record.errorMessage = failures.join('; ');

    try {
      await deps.store.recordSweep(record);
    } catch (err) {
      log.error({ err, status }, 'Failed to record sweep');
    }
    return { ...record, results };
  };

  const listing = await deps.client.listCategories();
  if (!listing) {
    log.warn('Category listing unavailable');
    return finish('no_categories', {});
  }

  const targets = resolveTargets(listing, deps.config.targets);
  if (targets.length === 0) {
    log.warn({ configured: deps.config.targets.length }, 'No target series resolved');
    return finish('no_targets', { configured: deps.config.targets.length });
  }

  log.info({ targets: targets.length, configured: deps.config.targets.length }, 'Starting sweep');

  for (const { target, seriesId } of targets) {
    if (options.shouldStop?.()) {
      log.info('Stop requested, ending sweep early');
      break;
    }

    const result = await reconcileSeries(deps, seriesId, startedAt);
    results.push(result);
    if (result.status === 'failed') {
      log.warn({ ...target, seriesId, step: result.step }, 'Series failed, continuing with next');
    }

    await sleep(result.status === 'skipped' ? options.skipDelayMs : options.seriesDelayMs);
  }

  const summary = await finish('completed', {
    resolved: targets.length,
    unresolved: deps.config.targets.length - targets.length,
  });
  log.info(
    {
      completed: summary.seriesCompleted,
      skipped: summary.seriesSkipped,
      failed: summary.seriesFailed,
      soldConfirmed: summary.soldConfirmed,
      swapsSuspected: summary.swapsSuspected,
      durationMs: summary.completedAt.getTime() - startedAt.getTime(),
    },
    'Sweep complete',
  );
  return summary;
}
