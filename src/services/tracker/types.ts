import type { HitFeedItem } from '../marketplace/types.js';

/**
 * Last-known attributes of a card in a pack, as recorded in the snapshot.
 */
export interface CardAttributes {
  tier: string;
  playerName: string | null;
  overall: number | null;
  insertName: string | null;
  setNumber: string | null;
  setName: string | null;
  holo: string | null;
  rarity: string | null;
  parallelName: string | null;
  parallelNumber: string | null;
  parallelTotal: string | null;
  frontImageUrl: string | null;
  backImageUrl: string | null;
  slabKind: string | null;
  gradingCompany: string | null;
  estimatedValueCents: number | null;
}

export interface SnapshotCard extends CardAttributes {
  cardId: string;
}

export interface PackSeriesRecord {
  seriesId: string;
  name: string;
  category: string | null;
  /** Static cost for the category, else API cost, else 0. */
  costCents: number;
  status: 'active' | 'inactive';
}

export interface SeriesObservation {
  series: PackSeriesRecord;
  packsSold: number;
  packsTotal: number;
  totalValueCents: number;
  observedAt: Date;
}

export interface HitFeedMatch {
  hit: HitFeedItem;
  hitAt: Date;
}

export type SaleVerification =
  | { kind: 'hit_feed'; match: HitFeedMatch }
  | { kind: 'assumed' };

export interface SoldCardEvent {
  seriesId: string;
  cardId: string;
  snapshot: SnapshotCard;
  verification: SaleVerification;
  soldAt: Date;
}

export interface SuspectedSwap {
  seriesId: string;
  cardId: string;
  snapshot: SnapshotCard;
  disappearedAt: Date;
}

export type SweepStatus = 'completed' | 'no_categories' | 'no_targets';

export interface SweepRecord {
  status: SweepStatus;
  startedAt: Date;
  completedAt: Date;
  seriesAttempted: number;
  seriesCompleted: number;
  seriesSkipped: number;
  seriesFailed: number;
  soldConfirmed: number;
  swapsSuspected: number;
  /** One `seriesId [step]: message` entry per failed series, `; `-joined. */
  errorMessage: string | null;
  metadata?: Record<string, unknown>;
}
