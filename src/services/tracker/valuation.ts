import type { MarketplaceTier, SeriesDetail } from '../marketplace/types.js';

export interface BuybackRatios {
  /** Guaranteed resale value per card, as a share of pack cost. */
  floorRatio: number;
  /** Nominal cost of a pack bought for buyback, as a share of pack cost. */
  costMarkupRatio: number;
}

export const DEFAULT_BUYBACK_RATIOS: BuybackRatios = {
  floorRatio: 0.8,
  costMarkupRatio: 1.1,
};

export interface TierContribution {
  tierApiId: string | null;
  tierName: string;
  isPremium: boolean;
  hitRate: number;
  numCards: number;
  numValuedCards: number;
  /** null when the tier has cards but none of them carries a value. */
  avgValueCents: number | null;
  contributionCents: number;
  avgValueBbCents: number | null;
  contributionBbCents: number | null;
}

export interface Valuation {
  expectedValueCents: number;
  staticPackCostCents: number | null;
  roi: number | null;
  numPremiumCardsPerPack: number;
  numNonPremiumCardsPerPack: number;
  expectedValueBbCents: number | null;
  packCostBbCents: number | null;
  roiBb: number | null;
  tiers: TierContribution[];
}

export type ValuationInput = Pick<
  SeriesDetail,
  'tiers' | 'numPremiumCardsPerPack' | 'numNonPremiumCardsPerPack'
>;

/**
 * Look up the static pack cost for a category. Category names are matched
 * with and without a trailing "." ("Misc" and "Misc." are the same category).
 */
export function resolveStaticPackCost(
  categoryName: string | null,
  costTable: Readonly<Record<string, number>>,
): number | null {
  if (!categoryName) return null;

  const direct = costTable[categoryName];
  if (direct !== undefined) return direct;

  const alternate = categoryName.endsWith('.') ? categoryName.slice(0, -1) : `${categoryName}.`;
  return costTable[alternate] ?? null;
}

/**
 * Cost recorded on the series metadata row: static table first, then the
 * API-reported pack cost, then the category price, then 0.
 */
export function resolveSeriesCost(
  detail: Pick<SeriesDetail, 'category' | 'costCents'>,
  costTable: Readonly<Record<string, number>>,
): number {
  return (
    resolveStaticPackCost(detail.category.name, costTable) ??
    detail.costCents ??
    detail.category.priceCents ??
    0
  );
}

function knownValues(tier: MarketplaceTier): number[] {
  const values: number[] = [];
  for (const card of tier.cards) {
    if (card.estimatedValueCents != null) values.push(card.estimatedValueCents);
  }
  return values;
}

function mean(values: number[]): number {
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/**
 * Average value of a tier. Empty tier is 0; a tier whose cards are all
 * unvalued is null and contributes nothing.
 */
function tierAverage(tier: MarketplaceTier, floorCents?: number): number | null {
  if (tier.cards.length === 0) return 0;
  const values = knownValues(tier);
  if (values.length === 0) return null;
  return mean(floorCents === undefined ? values : values.map((v) => Math.max(v, floorCents)));
}

function roiFor(expectedValueCents: number, costCents: number | null): number | null {
  if (costCents === null) return null;
  if (costCents === 0) return Number.POSITIVE_INFINITY;
  return expectedValueCents / costCents - 1;
}

function packExpectedValue(
  input: ValuationInput,
  contributions: Array<{ isPremium: boolean; contribution: number }>,
): number {
  let premium = 0;
  let nonPremium = 0;
  for (const c of contributions) {
    if (c.isPremium) premium += c.contribution;
    else nonPremium += c.contribution;
  }
  return Math.round(
    premium * input.numPremiumCardsPerPack + nonPremium * input.numNonPremiumCardsPerPack,
  );
}

/**
 * Expected value and ROI of buying one pack, from the tier hit rates and the
 * estimated values of the cards currently in each tier.
 *
 * The buyback variant values every card at no less than
 * `floorRatio × cost` and measures the return against
 * `costMarkupRatio × cost`. It is only computed when the static cost is known.
 */
export function calculateValuation(
  input: ValuationInput,
  staticPackCostCents: number | null,
  ratios: BuybackRatios = DEFAULT_BUYBACK_RATIOS,
): Valuation {
  const floorCents =
    staticPackCostCents === null ? null : Math.round(staticPackCostCents * ratios.floorRatio);
  const packCostBbCents =
    staticPackCostCents === null ? null : Math.round(staticPackCostCents * ratios.costMarkupRatio);

  const standard: Array<{ isPremium: boolean; contribution: number }> = [];
  const buyback: Array<{ isPremium: boolean; contribution: number }> = [];
  const tiers: TierContribution[] = [];

  for (const tier of input.tiers) {
    const avg = tierAverage(tier);
    const contribution = (avg ?? 0) * tier.hitRate;
    standard.push({ isPremium: tier.isPremium, contribution });

    let avgBb: number | null = null;
    let contributionBb: number | null = null;
    if (floorCents !== null) {
      avgBb = tierAverage(tier, floorCents);
      contributionBb = (avgBb ?? 0) * tier.hitRate;
      buyback.push({ isPremium: tier.isPremium, contribution: contributionBb });
    }

    tiers.push({
      tierApiId: tier.id,
      tierName: tier.name,
      isPremium: tier.isPremium,
      hitRate: tier.hitRate,
      numCards: tier.cards.length,
      numValuedCards: knownValues(tier).length,
      avgValueCents: avg === null ? null : Math.round(avg),
      contributionCents: Math.round(contribution),
      avgValueBbCents: avgBb === null ? null : Math.round(avgBb),
      contributionBbCents: contributionBb === null ? null : Math.round(contributionBb),
    });
  }

  const expectedValueCents = packExpectedValue(input, standard);
  const expectedValueBbCents = floorCents === null ? null : packExpectedValue(input, buyback);

  return {
    expectedValueCents,
    staticPackCostCents,
    roi: roiFor(expectedValueCents, staticPackCostCents),
    numPremiumCardsPerPack: input.numPremiumCardsPerPack,
    numNonPremiumCardsPerPack: input.numNonPremiumCardsPerPack,
    expectedValueBbCents,
    packCostBbCents,
    roiBb: expectedValueBbCents === null ? null : roiFor(expectedValueBbCents, packCostBbCents),
    tiers,
  };
}
