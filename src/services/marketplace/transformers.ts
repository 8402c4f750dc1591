import type {
  RawCard,
  RawCategoryListing,
  RawHitFeedItem,
  RawSeriesDetail,
  RawTier,
} from './schemas.js';
import type {
  CategoryListing,
  HitFeedItem,
  MarketplaceCard,
  MarketplaceTier,
  SeriesDetail,
} from './types.js';

export const UNKNOWN_TIER = 'Unknown Tier';

// The upstream has served both the short key names and the slabPack* ones.
// Prefer the short name, fall back to the long one.

export function transformCard(c: RawCard): MarketplaceCard {
  return {
    id: c.id,
    playerName: c.playerName,
    overall: c.overall,
    insertName: c.insertName ?? c.insert,
    setNumber: c.setNumber,
    setName: c.setName,
    holo: c.holo,
    rarity: c.rarity,
    parallelName: c.parallelName,
    parallelNumber: c.parallelNumber,
    parallelTotal: c.parallelTotal,
    frontImageUrl: c.frontImageUrl ?? c.frontSlabPictureUrl,
    backImageUrl: c.backImageUrl ?? c.backSlabPictureUrl,
    slabKind: c.slabKind,
    gradingCompany: c.gradingCompany,
    estimatedValueCents: c.estimatedValueCents,
  };
}

export function transformTier(t: RawTier): MarketplaceTier {
  return {
    id: t.id,
    name: t.name ?? UNKNOWN_TIER,
    isPremium: t.isPremium ?? false,
    hitRate: t.hitRate ?? 0,
    cards: t.cards.map(transformCard),
  };
}

/**
 * Normalise a series detail payload. Returns null when the payload carries
 * no id, since the id is what every stored row is keyed by.
 */
export function transformSeriesDetail(d: RawSeriesDetail): SeriesDetail | null {
  if (!d.id) return null;

  const category = d.category ?? d.slabPackCategory;
  const tiers = d.tiers.length > 0 ? d.tiers : d.slabPackTiers;

  return {
    id: d.id,
    name: d.name ?? 'Unknown Name',
    category: {
      name: category?.name ?? d.tier,
      priceCents: category?.priceCents ?? null,
    },
    costCents: d.costCents,
    packsSold: d.packsSold ?? 0,
    packsTotal: d.packsTotal ?? 0,
    isActive: d.isActive ?? false,
    numPremiumCardsPerPack: d.numPremiumCardsPerPack ?? 0,
    numNonPremiumCardsPerPack: d.numNonPremiumCardsPerPack ?? 0,
    tiers: tiers.map(transformTier),
  };
}

export function transformCategoryListing(l: RawCategoryListing): CategoryListing {
  return {
    items: l.items.map((item) => ({
      name: item.name ?? '',
      series: (item.series.length > 0 ? item.series : item.slabPackSeries).map((s) => ({
        id: s.id,
        name: s.name ?? '',
      })),
    })),
  };
}

export function transformHitFeedItem(h: RawHitFeedItem): HitFeedItem {
  return {
    id: h.id,
    cardId: h.cardId,
    createdAt: h.createdAt,
    hitRate: h.hitRate,
    username: h.username,
    avatarUrl: h.avatarUrl,
    number: h.number,
    tag: h.tag,
    playerName: h.playerName,
    overall: h.overall,
    insertName: h.insertName ?? h.insert,
    setName: h.setName,
    setNumber: h.setNumber,
    parallelName: h.parallelName,
    parallelNumber: h.parallelNumber,
    parallelTotal: h.parallelTotal,
    frontImageUrl: h.frontImageUrl ?? h.frontSlabPictureUrl,
    backImageUrl: h.backImageUrl ?? h.backSlabPictureUrl,
    gradingCompany: h.gradingCompany,
    offerStatus: h.offerStatus ?? h.arenaClubOfferStatus,
    seriesName: h.seriesName ?? h.slabPackSeriesName,
    categoryName: h.categoryName ?? h.slabPackCategoryName,
    estimatedValueCents: h.estimatedValueCents,
  };
}
