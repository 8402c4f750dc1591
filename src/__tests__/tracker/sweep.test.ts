import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest';

vi.mock('pino', () => ({
  default: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn().mockReturnThis(),
  }),
}));

import { resolveTargets, runSweep } from '../../services/tracker/sweep.js';
import type { ReconcilerDeps } from '../../services/tracker/reconciler.js';
import type { CategoryListing } from '../../services/marketplace/types.js';
import { flattenPackCards } from '../../services/tracker/pack-contents.js';
import {
  createStubClient,
  makeCard,
  makeDetail,
  makeTier,
  makeTrackerConfig,
  type StubClientData,
} from '../helpers/fixtures.js';
import { MemorySnapshotStore } from '../helpers/memory-store.js';

const START = new Date('2024-05-01T09:00:00Z');

const listing: CategoryListing = {
  items: [
    {
      name: 'Gold',
      series: [
        { id: 'gold-bb', name: 'Baseball' },
        { id: 'gold-fb', name: 'Football' },
        { id: null, name: 'Hockey' },
      ],
    },
    { name: 'Misc.', series: [{ id: 'misc-ms', name: 'Multi-Sport' }] },
  ],
};

const targets = [
  { categoryName: 'gold', seriesName: 'BASEBALL' },
  { categoryName: 'Gold', seriesName: 'Football' },
  { categoryName: 'Gold', seriesName: 'Hockey' },
  { categoryName: 'Silver', seriesName: 'Baseball' },
];

let store: MemorySnapshotStore;
let sleep: Mock<(ms: number) => Promise<void>>;

function deps(data: StubClientData): ReconcilerDeps {
  return {
    client: createStubClient(data),
    store,
    config: makeTrackerConfig({ targets }),
    hitFeed: { limit: 50, pages: 1 },
    now: () => START,
  };
}

beforeEach(() => {
  store = new MemorySnapshotStore();
  sleep = vi.fn(async (_ms: number): Promise<void> => {});
});

describe('resolveTargets', () => {
  it('matches category and series names case-insensitively, in configured order', () => {
    const resolved = resolveTargets(listing, targets);
    expect(resolved.map((r) => r.seriesId)).toEqual(['gold-bb', 'gold-fb']);
  });

  it('leaves out series without an id and unknown categories', () => {
    const resolved = resolveTargets(listing, [
      { categoryName: 'Gold', seriesName: 'Hockey' },
      { categoryName: 'Silver', seriesName: 'Baseball' },
    ]);
    expect(resolved).toEqual([]);
  });
});

describe('runSweep', () => {
  it('records a no_categories sweep when the listing is unavailable', async () => {
    const result = await runSweep(deps({ categories: null }), { seriesDelayMs: 2000, skipDelayMs: 1000, sleep });

    expect(result.status).toBe('no_categories');
    expect(result.seriesAttempted).toBe(0);
    expect(store.sweeps.map((s) => s.status)).toEqual(['no_categories']);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('records a no_targets sweep when nothing resolves', async () => {
    const result = await runSweep(deps({ categories: { items: [] } }), { seriesDelayMs: 2000, skipDelayMs: 1000, sleep });

    expect(result.status).toBe('no_targets');
    expect(store.sweeps[0].metadata).toEqual({ configured: 4 });
  });

  it('processes every resolved series and paces by outcome', async () => {
    const result = await runSweep(
      deps({
        categories: listing,
        details: {
          'gold-bb': makeDetail('gold-bb', [makeTier('Common', [makeCard('a')])]),
          'gold-fb': null,
        },
      }),
      { seriesDelayMs: 2000, skipDelayMs: 1000, sleep },
    );

    expect(result.results.map((r) => [r.seriesId, r.status])).toEqual([
      ['gold-bb', 'completed'],
      ['gold-fb', 'skipped'],
    ]);
    expect(sleep.mock.calls).toEqual([[2000], [1000]]);
    expect(result).toMatchObject({
      status: 'completed',
      seriesAttempted: 2,
      seriesCompleted: 1,
      seriesSkipped: 1,
      seriesFailed: 0,
      errorMessage: null,
      metadata: { resolved: 2, unresolved: 2 },
    });
    expect(store.watermarks.get('gold-bb')).toEqual(START);
  });

  it('keeps going after a series fails and counts its outcome', async () => {
    store.failOn('recordSeriesObservation', 'gold-bb');
    store.seedSnapshot('gold-fb', flattenPackCards(makeDetail('gold-fb', [makeTier('Common', [makeCard('x'), makeCard('y')])])));

    const result = await runSweep(
      deps({
        categories: listing,
        details: {
          'gold-bb': makeDetail('gold-bb', [makeTier('Common', [makeCard('a')])]),
          'gold-fb': makeDetail('gold-fb', [makeTier('Common', [makeCard('y')])]),
        },
      }),
      { seriesDelayMs: 0, skipDelayMs: 0, sleep },
    );

    expect(result.results[0]).toMatchObject({ seriesId: 'gold-bb', status: 'failed', step: 'observation' });
    expect(result.results[1]).toMatchObject({ seriesId: 'gold-fb', status: 'completed', soldConfirmed: 1 });
    expect(result.seriesFailed).toBe(1);
    expect(result.soldConfirmed).toBe(1);
    expect(store.sweeps[0].errorMessage).toBe(
      'gold-bb [observation]: Persistence observation failed for series gold-bb: recordSeriesObservation failed',
    );
    expect(store.watermarks.has('gold-bb')).toBe(false);
    expect(store.watermarks.get('gold-fb')).toEqual(START);
  });

  it('stops between series when asked', async () => {
    let calls = 0;
    const result = await runSweep(
      deps({ categories: listing, details: {} }),
      { seriesDelayMs: 0, skipDelayMs: 0, sleep, shouldStop: () => calls++ > 0 },
    );

    expect(result.results.map((r) => r.seriesId)).toEqual(['gold-bb']);
    expect(store.sweeps).toHaveLength(1);
  });

  it('still returns the sweep when the run log write fails', async () => {
    store.failOn('recordSweep');

    const result = await runSweep(deps({ categories: null }), { seriesDelayMs: 0, skipDelayMs: 0, sleep });

    expect(result.status).toBe('no_categories');
    expect(store.sweeps).toEqual([]);
  });
});
