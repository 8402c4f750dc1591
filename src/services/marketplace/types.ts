// --- Normalised marketplace payloads ---
//
// Every upstream field is optional. Counts default to 0, flags to false,
// descriptive and monetary fields to null.

export interface MarketplaceCard {
  id: string | null;
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

export interface MarketplaceTier {
  id: string | null;
  name: string;
  isPremium: boolean;
  hitRate: number;
  cards: MarketplaceCard[];
}

export interface SeriesDetail {
  id: string;
  name: string;
  category: {
    name: string | null;
    priceCents: number | null;
  };
  costCents: number | null;
  packsSold: number;
  packsTotal: number;
  isActive: boolean;
  numPremiumCardsPerPack: number;
  numNonPremiumCardsPerPack: number;
  tiers: MarketplaceTier[];
}

export interface CategorySeries {
  id: string | null;
  name: string;
}

export interface CategoryListing {
  items: Array<{
    name: string;
    series: CategorySeries[];
  }>;
}

export interface HitFeedItem {
  id: string | null;
  cardId: string | null;
  createdAt: string | null;
  hitRate: number | null;
  username: string | null;
  avatarUrl: string | null;
  number: string | null;
  tag: string | null;
  playerName: string | null;
  overall: number | null;
  insertName: string | null;
  setName: string | null;
  setNumber: string | null;
  parallelName: string | null;
  parallelNumber: string | null;
  parallelTotal: string | null;
  frontImageUrl: string | null;
  backImageUrl: string | null;
  gradingCompany: string | null;
  offerStatus: string | null;
  seriesName: string | null;
  categoryName: string | null;
  estimatedValueCents: number | null;
}

/**
 * Marketplace boundary. Each call resolves to the parsed payload, or to null
 * on any failure (network, timeout, non-2xx, malformed body). Never rejects.
 */
export interface MarketplaceClient {
  listCategories(): Promise<CategoryListing | null>;
  getSeriesDetail(seriesId: string): Promise<SeriesDetail | null>;
  getHitFeed(limit: number, offset: number): Promise<HitFeedItem[] | null>;
}
