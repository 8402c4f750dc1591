import type { Valuation } from '../tracker/valuation.js';
import type {
  SeriesObservation,
  SnapshotCard,
  SoldCardEvent,
  SuspectedSwap,
  SweepRecord,
} from '../tracker/types.js';

/**
 * Writes bound to one series inside one transaction. Everything done through
 * it commits together or not at all.
 */
export interface SeriesTransaction {
  readonly seriesId: string;
  loadSnapshot(): Promise<SnapshotCard[]>;
  /** Returns the number of events actually stored; repeats of a hit-feed event id are ignored. */
  insertSoldEvents(events: readonly SoldCardEvent[]): Promise<number>;
  logSuspectedSwaps(swaps: readonly SuspectedSwap[]): Promise<void>;
  incrementTotalSold(count: number, at: Date): Promise<void>;
  /** Replace the whole card set of the series. */
  replaceSnapshot(cards: readonly SnapshotCard[], snapshotAt: Date): Promise<void>;
}

/**
 * Persistence for the tracker. Every method commits on its own; the
 * diff-and-replace unit runs through withSeriesTransaction, which also holds
 * the per-series lock so at most one diff per series is in flight.
 */
export interface SnapshotStore {
  getWatermark(seriesId: string): Promise<Date | null>;
  /** Unlocked read of the stored card set. */
  getSnapshot(seriesId: string): Promise<SnapshotCard[]>;
  recordSeriesObservation(observation: SeriesObservation): Promise<void>;
  withSeriesTransaction<T>(seriesId: string, fn: (tx: SeriesTransaction) => Promise<T>): Promise<T>;
  recordValuation(seriesId: string, valuation: Valuation, at: Date): Promise<void>;
  advanceWatermark(seriesId: string, at: Date): Promise<void>;
  /** Raise max_sold to packsSold if higher. Returns the stored maximum. */
  ratchetMaxSold(seriesId: string, packsSold: number, at: Date): Promise<number>;
  recordSweep(record: SweepRecord): Promise<void>;
}
