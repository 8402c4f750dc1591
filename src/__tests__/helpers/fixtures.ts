import { vi } from 'vitest';
import type {
  CategoryListing,
  HitFeedItem,
  MarketplaceCard,
  MarketplaceTier,
  SeriesDetail,
} from '../../services/marketplace/types.js';
import type { TrackerConfig } from '../../config/tracker-config.js';

export function makeCard(id: string | null, overrides: Partial<MarketplaceCard> = {}): MarketplaceCard {
  return {
    id,
    playerName: `Player ${id ?? 'unknown'}`,
    overall: null,
    insertName: null,
    setNumber: null,
    setName: 'Base Set',
    holo: null,
    rarity: null,
    parallelName: null,
    parallelNumber: null,
    parallelTotal: null,
    frontImageUrl: null,
    backImageUrl: null,
    slabKind: null,
    gradingCompany: 'PSA',
    estimatedValueCents: null,
    ...overrides,
  };
}

export function makeTier(
  name: string,
  cards: MarketplaceCard[],
  overrides: Partial<Omit<MarketplaceTier, 'name' | 'cards'>> = {},
): MarketplaceTier {
  return { id: `tier-${name}`, name, isPremium: false, hitRate: 0, cards, ...overrides };
}

export function makeDetail(id: string, tiers: MarketplaceTier[], overrides: Partial<SeriesDetail> = {}): SeriesDetail {
  return {
    id,
    name: `Series ${id}`,
    category: { name: 'Gold', priceCents: 9900 },
    costCents: null,
    packsSold: 0,
    packsTotal: 100,
    isActive: true,
    numPremiumCardsPerPack: 1,
    numNonPremiumCardsPerPack: 0,
    tiers,
    ...overrides,
  };
}

export function makeHit(id: string, cardId: string, createdAt: string | null): HitFeedItem {
  return {
    id,
    cardId,
    createdAt,
    hitRate: 0.01,
    username: 'collector',
    avatarUrl: null,
    number: null,
    tag: null,
    playerName: `Player ${cardId}`,
    overall: null,
    insertName: null,
    setName: 'Base Set',
    setNumber: null,
    parallelName: null,
    parallelNumber: null,
    parallelTotal: null,
    frontImageUrl: null,
    backImageUrl: null,
    gradingCompany: 'PSA',
    offerStatus: null,
    seriesName: null,
    categoryName: null,
    estimatedValueCents: null,
  };
}

export function makeTrackerConfig(overrides: Partial<TrackerConfig> = {}): TrackerConfig {
  return {
    targets: [{ categoryName: 'Gold', seriesName: 'Series S1' }],
    verificationTiers: ['Grail', 'Chase'],
    staticPackCostsCents: { Gold: 10000 },
    buyback: { floorRatio: 0.8, costMarkupRatio: 1.1 },
    ...overrides,
  };
}

export interface StubClientData {
  categories?: CategoryListing | null;
  details?: Record<string, SeriesDetail | null>;
  /** null makes every hit-feed call fail. */
  hitFeed?: HitFeedItem[] | null;
}

/** MarketplaceClient serving fixed data; each method is a vi.fn for call assertions. */
export function createStubClient(data: StubClientData = {}) {
  return {
    listCategories: vi.fn(async (): Promise<CategoryListing | null> => data.categories ?? null),
    getSeriesDetail: vi.fn(async (seriesId: string): Promise<SeriesDetail | null> => data.details?.[seriesId] ?? null),
    getHitFeed: vi.fn(async (limit: number, offset: number): Promise<HitFeedItem[] | null> => {
      if (data.hitFeed === null) return null;
      return (data.hitFeed ?? []).slice(offset, offset + limit);
    }),
  };
}
