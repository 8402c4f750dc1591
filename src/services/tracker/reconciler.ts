import pino from 'pino';
import type { TrackerConfig } from '../../config/tracker-config.js';
import type { HitFeedItem, MarketplaceClient, SeriesDetail } from '../marketplace/types.js';
import type { SnapshotStore } from '../store/snapshot-store.js';
import { FetchError, PersistenceError, getErrorMessage } from '../../utils/errors.js';
import { flattenPackCards, sumKnownValues } from './pack-contents.js';
import { verifySale } from './sale-verifier.js';
import { diffSnapshots } from './snapshot-diff.js';
import type { SeriesObservation, SnapshotCard, SoldCardEvent, SuspectedSwap } from './types.js';
import { calculateValuation, resolveSeriesCost, resolveStaticPackCost } from './valuation.js';

const log = pino({ name: 'reconciler' });

export interface ReconcilerDeps {
  client: MarketplaceClient;
  store: SnapshotStore;
  config: TrackerConfig;
  hitFeed: { limit: number; pages: number };
  now?: () => Date;
}

export type CycleStep =
  | 'watermark'
  | 'observation'
  | 'hit_feed'
  | 'diff'
  | 'valuation'
  | 'advance_watermark'
  | 'max_sold';

export type SeriesCycleResult =
  | { status: 'skipped'; seriesId: string }
  | { status: 'failed'; seriesId: string; step: CycleStep; error: string }
  | {
      status: 'completed';
      seriesId: string;
      soldConfirmed: number;
      swapsSuspected: number;
      arrived: number;
      unchanged: number;
      maxSold: number;
    };

export interface Classification {
  sold: SoldCardEvent[];
  swaps: SuspectedSwap[];
}

/**
 * Decide what each disappeared card became. Cards in a verification tier need
 * a hit-feed match to count as sold, otherwise they are logged as suspected
 * swaps. Cards in any other tier are taken as sold at `at`.
 */
export function classifyDisappearances(
  seriesId: string,
  disappeared: readonly SnapshotCard[],
  verificationTiers: ReadonlySet<string>,
  hitFeedItems: readonly HitFeedItem[],
  watermark: Date | null,
  at: Date,
): Classification {
  const sold: SoldCardEvent[] = [];
  const swaps: SuspectedSwap[] = [];

  for (const card of disappeared) {
    if (!verificationTiers.has(card.tier)) {
      sold.push({ seriesId, cardId: card.cardId, snapshot: card, verification: { kind: 'assumed' }, soldAt: at });
      continue;
    }

    const match = verifySale(card, hitFeedItems, watermark);
    if (match) {
      sold.push({
        seriesId,
        cardId: card.cardId,
        snapshot: card,
        verification: { kind: 'hit_feed', match },
        soldAt: match.hitAt,
      });
    } else {
      log.info({ seriesId, cardId: card.cardId, tier: card.tier }, 'No hit-feed match, logging suspected swap');
      swaps.push({ seriesId, cardId: card.cardId, snapshot: card, disappearedAt: at });
    }
  }

  return { sold, swaps };
}

/**
 * Read up to `pages` pages of the hit feed. A page shorter than `limit` ends
 * the feed. Any failed page fails the whole read.
 */
export async function loadHitFeed(
  client: MarketplaceClient,
  limit: number,
  pages: number,
): Promise<HitFeedItem[]> {
  const items: HitFeedItem[] = [];
  for (let page = 0; page < pages; page++) {
    const offset = page * limit;
    const batch = await client.getHitFeed(limit, offset);
    if (batch === null) {
      throw new FetchError('card-hit-feed', `hit feed unavailable at offset ${offset}`);
    }
    items.push(...batch);
    if (batch.length < limit) break;
  }
  return items;
}

/** Diff the stored card set against the current one, keeping the stored record of each disappeared card. */
function compareSnapshots(previous: readonly SnapshotCard[], current: readonly SnapshotCard[]) {
  const previousById = new Map(previous.map((c) => [c.cardId, c]));
  const diff = diffSnapshots(
    previous.map((c) => c.cardId),
    current.map((c) => c.cardId),
  );

  const disappeared: SnapshotCard[] = [];
  for (const cardId of diff.disappeared) {
    const card = previousById.get(cardId);
    if (card) disappeared.push(card);
  }
  return { diff, disappeared };
}

function observationFrom(detail: SeriesDetail, cards: readonly SnapshotCard[], config: TrackerConfig, at: Date): SeriesObservation {
  return {
    series: {
      seriesId: detail.id,
      name: detail.name,
      category: detail.category.name,
      costCents: resolveSeriesCost(detail, config.staticPackCostsCents),
      status: detail.isActive ? 'active' : 'inactive',
    },
    packsSold: detail.packsSold,
    packsTotal: detail.packsTotal,
    totalValueCents: sumKnownValues(cards),
    observedAt: at,
  };
}

/**
 * Run one reconciliation cycle for a series.
 *
 * The diff, the sold-event and swap inserts, the total_sold increment and the
 * snapshot replacement commit together under the series lock. The other
 * writes commit on their own. The first failing step ends the cycle, so the
 * watermark only moves once everything before it has committed.
 *
 * `sweepStartedAt` becomes the new watermark; it is shared by every series
 * of the sweep.
 */
export async function reconcileSeries(
  deps: ReconcilerDeps,
  seriesId: string,
  sweepStartedAt: Date,
): Promise<SeriesCycleResult> {
  const now = deps.now ?? (() => new Date());
  const { client, store, config } = deps;

  const detail = await client.getSeriesDetail(seriesId);
  if (!detail) {
    log.warn({ seriesId }, 'Series detail unavailable, skipping this cycle');
    return { status: 'skipped', seriesId };
  }

  const id = detail.id;
  const cycleAt = now();
  const current = flattenPackCards(detail);
  const verificationTiers = new Set(config.verificationTiers);
  let step: CycleStep = 'watermark';

  try {
    const watermark = await store.getWatermark(id);

    step = 'observation';
    await store.recordSeriesObservation(observationFrom(detail, current, config, cycleAt));

    // Hit feed is read before the series lock; no transaction spans HTTP calls.
    step = 'diff';
    const needsHitFeed = (cards: readonly SnapshotCard[]) => cards.some((c) => verificationTiers.has(c.tier));
    let hits: HitFeedItem[] | null = null;
    if (needsHitFeed(compareSnapshots(await store.getSnapshot(id), current).disappeared)) {
      step = 'hit_feed';
      hits = await loadHitFeed(client, deps.hitFeed.limit, deps.hitFeed.pages);
      step = 'diff';
    }

    const outcome = await store.withSeriesTransaction(id, async (tx) => {
      const { diff, disappeared } = compareSnapshots(await tx.loadSnapshot(), current);
      if (hits === null && needsHitFeed(disappeared)) {
        throw new Error('card snapshot changed while the series was unlocked');
      }

      const { sold, swaps } = classifyDisappearances(
        id,
        disappeared,
        verificationTiers,
        hits ?? [],
        watermark,
        now(),
      );

      const inserted = await tx.insertSoldEvents(sold);
      if (inserted < sold.length) {
        log.info({ seriesId: id, inserted, confirmed: sold.length }, 'Some sold events were already recorded');
      }
      await tx.logSuspectedSwaps(swaps);
      await tx.incrementTotalSold(inserted, cycleAt);
      await tx.replaceSnapshot(current, cycleAt);

      return {
        soldConfirmed: inserted,
        swapsSuspected: swaps.length,
        arrived: diff.arrived.length,
        unchanged: diff.unchanged.length,
      };
    });

    step = 'valuation';
    const staticCost = resolveStaticPackCost(detail.category.name, config.staticPackCostsCents);
    const valuation = calculateValuation(detail, staticCost, config.buyback);
    await store.recordValuation(id, valuation, cycleAt);

    step = 'advance_watermark';
    await store.advanceWatermark(id, sweepStartedAt);

    step = 'max_sold';
    const maxSold = await store.ratchetMaxSold(id, detail.packsSold, cycleAt);

    log.info(
      {
        seriesId: id,
        ...outcome,
        expectedValueCents: valuation.expectedValueCents,
        roi: valuation.roi,
        maxSold,
      },
      'Series reconciled',
    );

    return { status: 'completed', seriesId: id, ...outcome, maxSold };
  } catch (err) {
    const error =
      err instanceof FetchError
        ? err
        : new PersistenceError(step, id, err instanceof Error ? err : undefined);
    log.error({ err: error, seriesId: id, step }, 'Series cycle aborted');
    return { status: 'failed', seriesId: id, step, error: getErrorMessage(error) };
  }
}
