import { pool } from '../../db/pool.js';

// ── Types ──────────────────────────────────────────────────────────

/** ROI as sent to the dashboard. JSON has no Infinity, so a free pack reports the string. */
export type RoiValue = number | 'Infinity' | null;

export interface PackOverview {
  seriesId: string;
  name: string;
  category: string | null;
  costCents: number;
  status: string;
  lastSeen: string;
  packsSold: number | null;
  packsTotal: number | null;
  maxSold: number | null;
  totalSold: number | null;
  lastProcessedAt: string | null;
  ev: {
    expectedValueCents: number;
    staticPackCostCents: number | null;
    roi: RoiValue;
    minRoi: RoiValue;
    maxRoi: RoiValue;
    expectedValueBbCents: number | null;
    roiBb: RoiValue;
    snapshotTime: string;
  } | null;
  totalValue: {
    currentCents: number;
    minCents: number;
    maxCents: number;
    snapshotTime: string;
  } | null;
}

export interface ValuePoint {
  totalEstimatedValueCents: number;
  snapshotTime: string;
}

export interface EvPoint {
  expectedValueCents: number;
  roi: RoiValue;
  expectedValueBbCents: number | null;
  roiBb: RoiValue;
  snapshotTime: string;
}

export interface TierContributionRow {
  tierApiId: string | null;
  tierName: string;
  isPremium: boolean;
  hitRate: number;
  numCards: number;
  numValuedCards: number;
  avgValueCents: number | null;
  contributionCents: number;
  avgValueBbCents: number | null;
  contributionBbCents: number | null;
}

export interface SoldEventRow {
  eventId: number;
  seriesId: string;
  cardId: string;
  tier: string | null;
  playerName: string | null;
  setName: string | null;
  gradingCompany: string | null;
  estimatedValueCents: number | null;
  frontImage: string | null;
  verified: boolean;
  hitFeedEventId: string | null;
  hitFeedUsername: string | null;
  soldAt: string;
}

export interface SwapRow {
  swapId: number;
  seriesId: string;
  cardId: string;
  tier: string | null;
  playerName: string | null;
  setName: string | null;
  gradingCompany: string | null;
  estimatedValueCents: number | null;
  disappearedAt: string;
}

export interface SweepRow {
  status: string;
  startedAt: string;
  completedAt: string;
  seriesAttempted: number;
  seriesCompleted: number;
  seriesSkipped: number;
  seriesFailed: number;
  soldConfirmed: number;
  swapsSuspected: number;
  errorMessage: string | null;
}

export interface Page<T> {
  data: T[];
  total: number;
}

// ── Helpers ────────────────────────────────────────────────────────

type Numeric = number | string | null;

/** BIGINT and COUNT arrive as strings from pg. */
function toNumber(value: Numeric): number | null {
  if (value === null) return null;
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isNaN(n) ? null : n;
}

export function toRoi(value: Numeric): RoiValue {
  const n = toNumber(value);
  if (n === null) return null;
  if (n === Number.POSITIVE_INFINITY) return 'Infinity';
  return Number.isFinite(n) ? n : null;
}

function iso(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

// ── Queries ────────────────────────────────────────────────────────

export type OverviewRow = {
  series_id: string;
  name: string;
  category: string | null;
  cost_cents: number;
  status: string;
  last_seen: Date;
  packs_sold: number | null;
  packs_total: number | null;
  max_sold: number | null;
  total_sold: number | null;
  last_snapshot_cards_processed_at: Date | null;
  expected_value_cents: Numeric;
  static_pack_cost_cents: number | null;
  roi: Numeric;
  min_roi: Numeric;
  max_roi: Numeric;
  expected_value_bb_cents: Numeric;
  roi_bb: Numeric;
  ev_time: Date | null;
  current_value_cents: Numeric;
  min_value_cents: Numeric;
  max_value_cents: Numeric;
  value_time: Date | null;
};

export function mapOverviewRow(r: OverviewRow): PackOverview {
  const expectedValueCents = toNumber(r.expected_value_cents);
  const currentValueCents = toNumber(r.current_value_cents);

  return {
    seriesId: r.series_id,
    name: r.name,
    category: r.category,
    costCents: r.cost_cents,
    status: r.status,
    lastSeen: r.last_seen.toISOString(),
    packsSold: r.packs_sold,
    packsTotal: r.packs_total,
    maxSold: r.max_sold,
    totalSold: r.total_sold,
    lastProcessedAt: iso(r.last_snapshot_cards_processed_at),
    ev:
      expectedValueCents !== null && r.ev_time
        ? {
            expectedValueCents,
            staticPackCostCents: r.static_pack_cost_cents,
            roi: toRoi(r.roi),
            minRoi: toRoi(r.min_roi),
            maxRoi: toRoi(r.max_roi),
            expectedValueBbCents: toNumber(r.expected_value_bb_cents),
            roiBb: toRoi(r.roi_bb),
            snapshotTime: r.ev_time.toISOString(),
          }
        : null,
    totalValue:
      currentValueCents !== null && r.value_time
        ? {
            currentCents: currentValueCents,
            minCents: toNumber(r.min_value_cents) ?? currentValueCents,
            maxCents: toNumber(r.max_value_cents) ?? currentValueCents,
            snapshotTime: r.value_time.toISOString(),
          }
        : null,
  };
}

/**
 * One row per tracked series: metadata, latest counters, latest EV/ROI with
 * its historical range, latest total value with its range. Aggregates a
 * series has never produced are null.
 */
export async function getPackOverviews(): Promise<PackOverview[]> {
  const { rows } = await pool.query<OverviewRow>(`
    WITH latest_counts AS (
      SELECT DISTINCT ON (series_id) series_id, packs_sold, packs_total
      FROM pack_snapshots
      ORDER BY series_id, snapshot_time DESC, snapshot_id DESC
    ),
    latest_ev AS (
      SELECT DISTINCT ON (series_id)
        series_id, expected_value_cents, static_pack_cost_cents, roi,
        expected_value_bb_cents, roi_bb, snapshot_time
      FROM pack_ev_roi_snapshots
      ORDER BY series_id, snapshot_time DESC, snapshot_id DESC
    ),
    ev_range AS (
      SELECT series_id, MIN(roi) AS min_roi, MAX(roi) AS max_roi
      FROM pack_ev_roi_snapshots
      GROUP BY series_id
    ),
    latest_value AS (
      SELECT DISTINCT ON (series_id) series_id, total_estimated_value_cents, snapshot_time
      FROM pack_total_value_snapshots
      ORDER BY series_id, snapshot_time DESC, snapshot_id DESC
    ),
    value_range AS (
      SELECT series_id,
        MIN(total_estimated_value_cents) AS min_value_cents,
        MAX(total_estimated_value_cents) AS max_value_cents
      FROM pack_total_value_snapshots
      GROUP BY series_id
    )
    SELECT
      m.series_id, m.name, m.category, m.cost_cents, m.status, m.last_seen,
      lc.packs_sold, lc.packs_total,
      ms.max_sold, st.total_sold,
      ps.last_snapshot_cards_processed_at,
      le.expected_value_cents, le.static_pack_cost_cents, le.roi,
      er.min_roi, er.max_roi,
      le.expected_value_bb_cents, le.roi_bb, le.snapshot_time AS ev_time,
      lv.total_estimated_value_cents AS current_value_cents,
      vr.min_value_cents, vr.max_value_cents, lv.snapshot_time AS value_time
    FROM pack_series_metadata m
    LEFT JOIN latest_counts lc ON lc.series_id = m.series_id
    LEFT JOIN pack_max_sold ms ON ms.series_id = m.series_id
    LEFT JOIN pack_sales_tracker st ON st.series_id = m.series_id
    LEFT JOIN series_processing_state ps ON ps.series_id = m.series_id
    LEFT JOIN latest_ev le ON le.series_id = m.series_id
    LEFT JOIN ev_range er ON er.series_id = m.series_id
    LEFT JOIN latest_value lv ON lv.series_id = m.series_id
    LEFT JOIN value_range vr ON vr.series_id = m.series_id
    ORDER BY m.category NULLS LAST, m.name
  `);

  return rows.map(mapOverviewRow);
}

export async function seriesExists(seriesId: string): Promise<boolean> {
  const { rows } = await pool.query<{ exists: boolean }>(
    'SELECT EXISTS (SELECT 1 FROM pack_series_metadata WHERE series_id = $1) AS exists',
    [seriesId],
  );
  return rows[0]?.exists ?? false;
}

export async function getValueHistory(seriesId: string, limit: number): Promise<ValuePoint[]> {
  const { rows } = await pool.query<{ total_estimated_value_cents: Numeric; snapshot_time: Date }>(
    `SELECT total_estimated_value_cents, snapshot_time FROM (
       SELECT total_estimated_value_cents, snapshot_time, snapshot_id
       FROM pack_total_value_snapshots
       WHERE series_id = $1
       ORDER BY snapshot_time DESC, snapshot_id DESC
       LIMIT $2
     ) recent
     ORDER BY snapshot_time ASC, snapshot_id ASC`,
    [seriesId, limit],
  );

  return rows.map((r) => ({
    totalEstimatedValueCents: toNumber(r.total_estimated_value_cents) ?? 0,
    snapshotTime: r.snapshot_time.toISOString(),
  }));
}

export async function getEvHistory(seriesId: string, limit: number): Promise<EvPoint[]> {
  const { rows } = await pool.query<{
    expected_value_cents: Numeric;
    roi: Numeric;
    expected_value_bb_cents: Numeric;
    roi_bb: Numeric;
    snapshot_time: Date;
  }>(
    `SELECT expected_value_cents, roi, expected_value_bb_cents, roi_bb, snapshot_time FROM (
       SELECT expected_value_cents, roi, expected_value_bb_cents, roi_bb, snapshot_time, snapshot_id
       FROM pack_ev_roi_snapshots
       WHERE series_id = $1
       ORDER BY snapshot_time DESC, snapshot_id DESC
       LIMIT $2
     ) recent
     ORDER BY snapshot_time ASC, snapshot_id ASC`,
    [seriesId, limit],
  );

  return rows.map((r) => ({
    expectedValueCents: toNumber(r.expected_value_cents) ?? 0,
    roi: toRoi(r.roi),
    expectedValueBbCents: toNumber(r.expected_value_bb_cents),
    roiBb: toRoi(r.roi_bb),
    snapshotTime: r.snapshot_time.toISOString(),
  }));
}

/** Tier breakdown of the most recent EV snapshot; empty when there is none. */
export async function getLatestTierContributions(seriesId: string): Promise<TierContributionRow[]> {
  const { rows } = await pool.query<{
    tier_api_id: string | null;
    tier_name: string;
    is_premium: boolean;
    hit_rate: number;
    num_cards_in_tier: number;
    num_valued_cards_in_tier: number;
    avg_value_in_tier_cents: number | null;
    tier_contribution_to_ev_cents: number;
    avg_value_in_tier_bb_cents: number | null;
    tier_contribution_to_ev_bb_cents: number | null;
  }>(
    `SELECT t.tier_api_id, t.tier_name, t.is_premium, t.hit_rate,
            t.num_cards_in_tier, t.num_valued_cards_in_tier,
            t.avg_value_in_tier_cents, t.tier_contribution_to_ev_cents,
            t.avg_value_in_tier_bb_cents, t.tier_contribution_to_ev_bb_cents
     FROM pack_tier_ev_contribution_snapshots t
     WHERE t.ev_roi_snapshot_id = (
       SELECT snapshot_id FROM pack_ev_roi_snapshots
       WHERE series_id = $1
       ORDER BY snapshot_time DESC, snapshot_id DESC
       LIMIT 1
     )
     ORDER BY t.is_premium DESC, t.tier_contribution_to_ev_cents DESC`,
    [seriesId],
  );

  return rows.map((r) => ({
    tierApiId: r.tier_api_id,
    tierName: r.tier_name,
    isPremium: r.is_premium,
    hitRate: r.hit_rate,
    numCards: r.num_cards_in_tier,
    numValuedCards: r.num_valued_cards_in_tier,
    avgValueCents: r.avg_value_in_tier_cents,
    contributionCents: r.tier_contribution_to_ev_cents,
    avgValueBbCents: r.avg_value_in_tier_bb_cents,
    contributionBbCents: r.tier_contribution_to_ev_bb_cents,
  }));
}

export interface SoldEventFilter {
  seriesId?: string;
  verified?: boolean;
  limit: number;
  offset: number;
}

/** Newest sales first. */
export async function getSoldEvents(filter: SoldEventFilter): Promise<Page<SoldEventRow>> {
  const conditions: string[] = [];
  const params: unknown[] = [];

  if (filter.seriesId !== undefined) {
    params.push(filter.seriesId);
    conditions.push(`series_id = $${params.length}`);
  }
  if (filter.verified !== undefined) {
    params.push(filter.verified);
    conditions.push(`is_hit_feed_verified = $${params.length}`);
  }
  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

  const [countResult, dataResult] = await Promise.all([
    pool.query<{ total: string }>(`SELECT COUNT(*) AS total FROM sold_card_events ${where}`, params),
    pool.query<{
      event_id: number;
      series_id: string;
      card_id: string;
      snapshot_tier: string | null;
      snapshot_player_name: string | null;
      snapshot_set_name: string | null;
      snapshot_grading_company: string | null;
      snapshot_estimated_value_cents: number | null;
      snapshot_front_image: string | null;
      is_hit_feed_verified: boolean;
      hit_feed_event_id: string | null;
      hit_feed_username: string | null;
      sold_at: Date;
    }>(
      `SELECT event_id, series_id, card_id, snapshot_tier, snapshot_player_name, snapshot_set_name,
              snapshot_grading_company, snapshot_estimated_value_cents, snapshot_front_image,
              is_hit_feed_verified, hit_feed_event_id, hit_feed_username, sold_at
       FROM sold_card_events ${where}
       ORDER BY sold_at DESC, event_id DESC
       LIMIT $${params.length + 1} OFFSET $${params.length + 2}`,
      [...params, filter.limit, filter.offset],
    ),
  ]);

  return {
    total: toNumber(countResult.rows[0]?.total ?? null) ?? 0,
    data: dataResult.rows.map((r) => ({
      eventId: r.event_id,
      seriesId: r.series_id,
      cardId: r.card_id,
      tier: r.snapshot_tier,
      playerName: r.snapshot_player_name,
      setName: r.snapshot_set_name,
      gradingCompany: r.snapshot_grading_company,
      estimatedValueCents: r.snapshot_estimated_value_cents,
      frontImage: r.snapshot_front_image,
      verified: r.is_hit_feed_verified,
      hitFeedEventId: r.hit_feed_event_id,
      hitFeedUsername: r.hit_feed_username,
      soldAt: r.sold_at.toISOString(),
    })),
  };
}

export async function getSuspectedSwaps(filter: {
  seriesId?: string;
  limit: number;
  offset: number;
}): Promise<Page<SwapRow>> {
  const where = filter.seriesId !== undefined ? 'WHERE series_id = $1' : '';
  const params: unknown[] = filter.seriesId !== undefined ? [filter.seriesId] : [];

  const [countResult, dataResult] = await Promise.all([
    pool.query<{ total: string }>(`SELECT COUNT(*) AS total FROM suspected_swapped_cards ${where}`, params),
    pool.query<{
      swap_id: number;
      series_id: string;
      card_id: string;
      snapshot_tier: string | null;
      snapshot_player_name: string | null;
      snapshot_set_name: string | null;
      snapshot_grading_company: string | null;
      snapshot_estimated_value_cents: number | null;
      disappeared_at: Date;
    }>(
      `SELECT swap_id, series_id, card_id, snapshot_tier, snapshot_player_name, snapshot_set_name,
              snapshot_grading_company, snapshot_estimated_value_cents, disappeared_at
       FROM suspected_swapped_cards ${where}
       ORDER BY disappeared_at DESC, swap_id DESC
       LIMIT $${params.length + 1} OFFSET $${params.length + 2}`,
      [...params, filter.limit, filter.offset],
    ),
  ]);

  return {
    total: toNumber(countResult.rows[0]?.total ?? null) ?? 0,
    data: dataResult.rows.map((r) => ({
      swapId: r.swap_id,
      seriesId: r.series_id,
      cardId: r.card_id,
      tier: r.snapshot_tier,
      playerName: r.snapshot_player_name,
      setName: r.snapshot_set_name,
      gradingCompany: r.snapshot_grading_company,
      estimatedValueCents: r.snapshot_estimated_value_cents,
      disappearedAt: r.disappeared_at.toISOString(),
    })),
  };
}

export async function getRecentSweeps(limit: number): Promise<SweepRow[]> {
  const { rows } = await pool.query<{
    status: string;
    started_at: Date;
    completed_at: Date;
    series_attempted: number;
    series_completed: number;
    series_skipped: number;
    series_failed: number;
    sold_confirmed: number;
    swaps_suspected: number;
    error_message: string | null;
  }>(
    `SELECT status, started_at, completed_at, series_attempted, series_completed,
            series_skipped, series_failed, sold_confirmed, swaps_suspected, error_message
     FROM tracker_runs
     ORDER BY started_at DESC, run_id DESC
     LIMIT $1`,
    [limit],
  );

  return rows.map((r) => ({
    status: r.status,
    startedAt: r.started_at.toISOString(),
    completedAt: r.completed_at.toISOString(),
    seriesAttempted: r.series_attempted,
    seriesCompleted: r.series_completed,
    seriesSkipped: r.series_skipped,
    seriesFailed: r.series_failed,
    soldConfirmed: r.sold_confirmed,
    swapsSuspected: r.swaps_suspected,
    errorMessage: r.error_message,
  }));
}
