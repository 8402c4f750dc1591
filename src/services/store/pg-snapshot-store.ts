import type pg from 'pg';
import pino from 'pino';
import { UNKNOWN_TIER } from '../marketplace/transformers.js';
import type { Valuation } from '../tracker/valuation.js';
import type {
  SeriesObservation,
  SnapshotCard,
  SoldCardEvent,
  SuspectedSwap,
  SweepRecord,
} from '../tracker/types.js';
import { batchInsert } from './batch-insert.js';
import type { SeriesTransaction, SnapshotStore } from './snapshot-store.js';

const log = pino({ name: 'pg-store' });

// --- Row shapes ---

type SnapshotRow = {
  card_id: string;
  tier: string | null;
  player_name: string | null;
  overall: number | null;
  insert_name: string | null;
  set_number: string | null;
  set_name: string | null;
  holo: string | null;
  rarity: string | null;
  parallel_number: string | null;
  parallel_total: string | null;
  parallel_name: string | null;
  front_image: string | null;
  back_image: string | null;
  slab_kind: string | null;
  grading_company: string | null;
  estimated_value_cents: number | null;
};

const SNAPSHOT_COLUMNS = [
  'series_id', 'card_id', 'tier', 'player_name', 'overall', 'insert_name', 'set_number', 'set_name',
  'holo', 'rarity', 'parallel_number', 'parallel_total', 'parallel_name', 'front_image',
  'back_image', 'slab_kind', 'grading_company', 'estimated_value_cents', 'snapshot_time',
] as const;

const SOLD_EVENT_COLUMNS = [
  'series_id', 'card_id',
  'snapshot_tier', 'snapshot_estimated_value_cents', 'snapshot_player_name', 'snapshot_set_name',
  'snapshot_set_number', 'snapshot_insert_name', 'snapshot_parallel_name', 'snapshot_parallel_number',
  'snapshot_parallel_total', 'snapshot_grading_company', 'snapshot_overall',
  'snapshot_front_image', 'snapshot_back_image',
  'hit_feed_event_id', 'hit_rate', 'hit_feed_username', 'hit_feed_avatar_url',
  'hit_feed_number', 'hit_feed_tag', 'hit_feed_player_name', 'hit_feed_set_name',
  'hit_feed_set_number', 'hit_feed_parallel_name', 'hit_feed_parallel_number',
  'hit_feed_parallel_total', 'hit_feed_front_image_url', 'hit_feed_back_image_url',
  'hit_feed_grading_company', 'hit_feed_overall', 'hit_feed_insert_name',
  'hit_feed_offer_status', 'hit_feed_series_name', 'hit_feed_category_name',
  'hit_feed_estimated_value_cents',
  'sold_at', 'is_hit_feed_verified',
] as const;

const SWAP_COLUMNS = [
  'series_id', 'card_id', 'snapshot_tier', 'snapshot_player_name', 'snapshot_set_name',
  'snapshot_insert_name', 'snapshot_grading_company', 'snapshot_overall',
  'snapshot_estimated_value_cents', 'disappeared_at',
] as const;

const TIER_CONTRIBUTION_COLUMNS = [
  'series_id', 'ev_roi_snapshot_id', 'tier_api_id', 'tier_name', 'is_premium', 'hit_rate',
  'num_cards_in_tier', 'num_valued_cards_in_tier', 'avg_value_in_tier_cents',
  'tier_contribution_to_ev_cents', 'avg_value_in_tier_bb_cents', 'tier_contribution_to_ev_bb_cents',
  'snapshot_time',
] as const;

const SELECT_SNAPSHOT = `
  SELECT card_id, tier, player_name, overall, insert_name, set_number, set_name,
         holo, rarity, parallel_number, parallel_total, parallel_name,
         front_image, back_image, slab_kind, grading_company, estimated_value_cents
  FROM pack_card_snapshots
  WHERE series_id = $1`;

// --- Row mappers ---

function fromSnapshotRow(row: SnapshotRow): SnapshotCard {
  return {
    cardId: row.card_id,
    tier: row.tier ?? UNKNOWN_TIER,
    playerName: row.player_name,
    overall: row.overall,
    insertName: row.insert_name,
    setNumber: row.set_number,
    setName: row.set_name,
    holo: row.holo,
    rarity: row.rarity,
    parallelName: row.parallel_name,
    parallelNumber: row.parallel_number,
    parallelTotal: row.parallel_total,
    frontImageUrl: row.front_image,
    backImageUrl: row.back_image,
    slabKind: row.slab_kind,
    gradingCompany: row.grading_company,
    estimatedValueCents: row.estimated_value_cents,
  };
}

function toSnapshotRow(seriesId: string, c: SnapshotCard, snapshotAt: Date): unknown[] {
  return [
    seriesId, c.cardId, c.tier, c.playerName, c.overall, c.insertName, c.setNumber, c.setName,
    c.holo, c.rarity, c.parallelNumber, c.parallelTotal, c.parallelName, c.frontImageUrl,
    c.backImageUrl, c.slabKind, c.gradingCompany, c.estimatedValueCents, snapshotAt,
  ];
}

/** Flatten the event into the dual snapshot_* / hit_feed_* storage row. */
export function toSoldEventRow(e: SoldCardEvent): unknown[] {
  const s = e.snapshot;
  const hit = e.verification.kind === 'hit_feed' ? e.verification.match.hit : null;
  return [
    e.seriesId, e.cardId,
    s.tier, s.estimatedValueCents, s.playerName, s.setName,
    s.setNumber, s.insertName, s.parallelName, s.parallelNumber,
    s.parallelTotal, s.gradingCompany, s.overall,
    s.frontImageUrl, s.backImageUrl,
    hit?.id ?? null, hit?.hitRate ?? null, hit?.username ?? null, hit?.avatarUrl ?? null,
    hit?.number ?? null, hit?.tag ?? null, hit?.playerName ?? null, hit?.setName ?? null,
    hit?.setNumber ?? null, hit?.parallelName ?? null, hit?.parallelNumber ?? null,
    hit?.parallelTotal ?? null, hit?.frontImageUrl ?? null, hit?.backImageUrl ?? null,
    hit?.gradingCompany ?? null, hit?.overall ?? null, hit?.insertName ?? null,
    hit?.offerStatus ?? null, hit?.seriesName ?? null, hit?.categoryName ?? null,
    hit?.estimatedValueCents ?? null,
    e.soldAt, hit !== null,
  ];
}

function toSwapRow(w: SuspectedSwap): unknown[] {
  const s = w.snapshot;
  return [
    w.seriesId, w.cardId, s.tier, s.playerName, s.setName,
    s.insertName, s.gradingCompany, s.overall,
    s.estimatedValueCents, w.disappearedAt,
  ];
}

/**
 * SnapshotStore on PostgreSQL. Each method is its own transaction; the
 * per-series diff unit also takes a transaction-scoped advisory lock keyed by
 * series id, so concurrent trackers serialise on the same series.
 */
export function createPgSnapshotStore(pool: pg.Pool): SnapshotStore {
  async function inTransaction<T>(fn: (client: pg.PoolClient) => Promise<T>): Promise<T> {
    const client = await pool.connect();
    try {
      await client.query('BEGIN');
      const result = await fn(client);
      await client.query('COMMIT');
      return result;
    } catch (err) {
      await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
        log.error({ err: rollbackErr }, 'Rollback failed');
      });
      throw err;
    } finally {
      client.release();
    }
  }

  function seriesTransaction(client: pg.PoolClient, seriesId: string): SeriesTransaction {
    return {
      seriesId,

      async loadSnapshot() {
        const { rows } = await client.query<SnapshotRow>(SELECT_SNAPSHOT, [seriesId]);
        return rows.map(fromSnapshotRow);
      },

      async insertSoldEvents(events) {
        if (events.length === 0) return 0;
        return batchInsert(
          client,
          'sold_card_events',
          SOLD_EVENT_COLUMNS,
          events.map(toSoldEventRow),
          'ON CONFLICT (hit_feed_event_id) WHERE hit_feed_event_id IS NOT NULL DO NOTHING',
        );
      },

      async logSuspectedSwaps(swaps) {
        if (swaps.length === 0) return;
        await batchInsert(client, 'suspected_swapped_cards', SWAP_COLUMNS, swaps.map(toSwapRow));
      },

      async incrementTotalSold(count, at) {
        if (count <= 0) return;
        await client.query(
          `INSERT INTO pack_sales_tracker (series_id, total_sold, last_checked)
           VALUES ($1, $2, $3)
           ON CONFLICT (series_id) DO UPDATE SET
             total_sold = pack_sales_tracker.total_sold + EXCLUDED.total_sold,
             last_checked = EXCLUDED.last_checked`,
          [seriesId, count, at],
        );
      },

      async replaceSnapshot(cards, snapshotAt) {
        await client.query('DELETE FROM pack_card_snapshots WHERE series_id = $1', [seriesId]);
        if (cards.length === 0) return;
        await batchInsert(
          client,
          'pack_card_snapshots',
          SNAPSHOT_COLUMNS,
          cards.map((c) => toSnapshotRow(seriesId, c, snapshotAt)),
        );
      },
    };
  }

  return {
    async getWatermark(seriesId) {
      const { rows } = await pool.query<{ last_snapshot_cards_processed_at: Date | null }>(
        'SELECT last_snapshot_cards_processed_at FROM series_processing_state WHERE series_id = $1',
        [seriesId],
      );
      return rows[0]?.last_snapshot_cards_processed_at ?? null;
    },

    async getSnapshot(seriesId) {
      const { rows } = await pool.query<SnapshotRow>(SELECT_SNAPSHOT, [seriesId]);
      return rows.map(fromSnapshotRow);
    },

    async recordSeriesObservation(o: SeriesObservation) {
      await inTransaction(async (client) => {
        await client.query(
          `INSERT INTO pack_series_metadata (series_id, name, category, cost_cents, status, last_seen)
           VALUES ($1, $2, $3, $4, $5, $6)
           ON CONFLICT (series_id) DO UPDATE SET
             name = EXCLUDED.name,
             category = EXCLUDED.category,
             cost_cents = EXCLUDED.cost_cents,
             status = EXCLUDED.status,
             last_seen = EXCLUDED.last_seen`,
          [o.series.seriesId, o.series.name, o.series.category, o.series.costCents, o.series.status, o.observedAt],
        );
        await client.query(
          'INSERT INTO pack_snapshots (series_id, packs_sold, packs_total, snapshot_time) VALUES ($1, $2, $3, $4)',
          [o.series.seriesId, o.packsSold, o.packsTotal, o.observedAt],
        );
        await client.query(
          'INSERT INTO pack_total_value_snapshots (series_id, total_estimated_value_cents, snapshot_time) VALUES ($1, $2, $3)',
          [o.series.seriesId, o.totalValueCents, o.observedAt],
        );
      });
    },

    async withSeriesTransaction(seriesId, fn) {
      return inTransaction(async (client) => {
        await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [seriesId]);
        return fn(seriesTransaction(client, seriesId));
      });
    },

    async recordValuation(seriesId: string, v: Valuation, at: Date) {
      await inTransaction(async (client) => {
        const { rows } = await client.query<{ snapshot_id: number }>(
          `INSERT INTO pack_ev_roi_snapshots (
             series_id, expected_value_cents, static_pack_cost_cents, roi,
             num_premium_cards_per_pack, num_non_premium_cards_per_pack,
             expected_value_bb_cents, pack_cost_bb_cents, roi_bb, snapshot_time
           ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
           RETURNING snapshot_id`,
          [
            seriesId, v.expectedValueCents, v.staticPackCostCents, v.roi,
            v.numPremiumCardsPerPack, v.numNonPremiumCardsPerPack,
            v.expectedValueBbCents, v.packCostBbCents, v.roiBb, at,
          ],
        );
        const snapshotId = rows[0]?.snapshot_id;
        if (snapshotId === undefined || v.tiers.length === 0) return;

        await batchInsert(
          client,
          'pack_tier_ev_contribution_snapshots',
          TIER_CONTRIBUTION_COLUMNS,
          v.tiers.map((t) => [
            seriesId, snapshotId, t.tierApiId, t.tierName, t.isPremium, t.hitRate,
            t.numCards, t.numValuedCards, t.avgValueCents,
            t.contributionCents, t.avgValueBbCents, t.contributionBbCents,
            at,
          ]),
        );
      });
    },

    async advanceWatermark(seriesId, at) {
      await pool.query(
        `INSERT INTO series_processing_state (series_id, last_snapshot_cards_processed_at)
         VALUES ($1, $2)
         ON CONFLICT (series_id) DO UPDATE SET
           last_snapshot_cards_processed_at = EXCLUDED.last_snapshot_cards_processed_at`,
        [seriesId, at],
      );
    },

    async ratchetMaxSold(seriesId, packsSold, at) {
      return inTransaction(async (client) => {
        const { rows } = await client.query<{ max_sold: number }>(
          'SELECT max_sold FROM pack_max_sold WHERE series_id = $1 FOR UPDATE',
          [seriesId],
        );
        const current = rows[0]?.max_sold;

        if (current === undefined) {
          // Two first-time writers can race past the FOR UPDATE; keep the larger value.
          await client.query(
            `INSERT INTO pack_max_sold (series_id, max_sold, last_updated) VALUES ($1, $2, $3)
             ON CONFLICT (series_id) DO UPDATE SET
               max_sold = GREATEST(pack_max_sold.max_sold, EXCLUDED.max_sold),
               last_updated = EXCLUDED.last_updated`,
            [seriesId, packsSold, at],
          );
          return packsSold;
        }

        if (packsSold > current) {
          await client.query(
            'UPDATE pack_max_sold SET max_sold = $1, last_updated = $2 WHERE series_id = $3',
            [packsSold, at, seriesId],
          );
          return packsSold;
        }

        return current;
      });
    },

    async recordSweep(r: SweepRecord) {
      await pool.query(
        `INSERT INTO tracker_runs (
           status, started_at, completed_at, series_attempted, series_completed,
           series_skipped, series_failed, sold_confirmed, swaps_suspected, error_message, metadata
         ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)`,
        [
          r.status, r.startedAt, r.completedAt, r.seriesAttempted, r.seriesCompleted,
          r.seriesSkipped, r.seriesFailed, r.soldConfirmed, r.swapsSuspected, r.errorMessage,
          r.metadata ? JSON.stringify(r.metadata) : null,
        ],
      );
    },
  };
}
