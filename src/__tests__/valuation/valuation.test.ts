import { describe, expect, it } from 'vitest';
import {
  calculateValuation,
  resolveSeriesCost,
  resolveStaticPackCost,
} from '../../services/tracker/valuation.js';
import { makeCard, makeDetail, makeTier } from '../helpers/fixtures.js';

const COSTS = { Gold: 10000, 'Misc.': 2500 };

function singleTierPack(valueCents: number | null, hitRate = 1) {
  return makeDetail('S1', [makeTier('Grail', [makeCard('a', { estimatedValueCents: valueCents })], { isPremium: true, hitRate })], {
    numPremiumCardsPerPack: 1,
    numNonPremiumCardsPerPack: 0,
  });
}

describe('resolveStaticPackCost', () => {
  it('matches a category with or without a trailing dot', () => {
    expect(resolveStaticPackCost('Misc', COSTS)).toBe(2500);
    expect(resolveStaticPackCost('Misc.', COSTS)).toBe(2500);
    expect(resolveStaticPackCost('Gold.', COSTS)).toBe(10000);
  });

  it('returns null for a missing or unknown category', () => {
    expect(resolveStaticPackCost(null, COSTS)).toBeNull();
    expect(resolveStaticPackCost('Platinum', COSTS)).toBeNull();
  });
});

describe('resolveSeriesCost', () => {
  it('prefers the static cost, then the API cost, then the category price, then 0', () => {
    expect(resolveSeriesCost({ category: { name: 'Gold', priceCents: 1 }, costCents: 2 }, COSTS)).toBe(10000);
    expect(resolveSeriesCost({ category: { name: 'Other', priceCents: 3100 }, costCents: 4200 }, COSTS)).toBe(4200);
    expect(resolveSeriesCost({ category: { name: 'Other', priceCents: 3100 }, costCents: null }, COSTS)).toBe(3100);
    expect(resolveSeriesCost({ category: { name: null, priceCents: null }, costCents: null }, COSTS)).toBe(0);
  });
});

describe('calculateValuation', () => {
  it('gives ROI -0.10 for EV 9000 against cost 10000', () => {
    const v = calculateValuation(singleTierPack(9000), 10000);
    expect(v.expectedValueCents).toBe(9000);
    expect(v.roi).toBeCloseTo(-0.1, 10);
  });

  it('gives ROI 0.10 for EV 11000 against cost 10000', () => {
    const v = calculateValuation(singleTierPack(11000), 10000);
    expect(v.expectedValueCents).toBe(11000);
    expect(v.roi).toBeCloseTo(0.1, 10);
  });

  it('values cards at the buyback floor when they are worth less', () => {
    const v = calculateValuation(singleTierPack(500), 10000);

    expect(v.tiers[0].avgValueCents).toBe(500);
    expect(v.tiers[0].avgValueBbCents).toBe(8000);
    expect(v.expectedValueCents).toBe(500);
    expect(v.expectedValueBbCents).toBe(8000);
    expect(v.packCostBbCents).toBe(11000);
    expect(v.roiBb).toBeCloseTo(8000 / 11000 - 1, 10);
    expect(v.expectedValueBbCents ?? 0).toBeGreaterThanOrEqual(v.expectedValueCents);
  });

  it('weights premium and non-premium tiers by their slot counts', () => {
    const detail = makeDetail(
      'S1',
      [
        makeTier('Grail', [makeCard('a', { estimatedValueCents: 10000 })], { isPremium: true, hitRate: 0.1 }),
        makeTier('Chase', [makeCard('b', { estimatedValueCents: 2000 })], { isPremium: true, hitRate: 0.9 }),
        makeTier('Common', [makeCard('c', { estimatedValueCents: 500 })], { isPremium: false, hitRate: 1 }),
      ],
      { numPremiumCardsPerPack: 1, numNonPremiumCardsPerPack: 3 },
    );

    const v = calculateValuation(detail, 10000);
    expect(v.tiers.map((t) => t.contributionCents)).toEqual([1000, 1800, 500]);
    expect(v.expectedValueCents).toBe(4300);
  });

  it('leaves unvalued cards out of the tier average', () => {
    const detail = makeDetail(
      'S1',
      [
        makeTier(
          'Common',
          [
            makeCard('a', { estimatedValueCents: 1000 }),
            makeCard('b'),
            makeCard('c', { estimatedValueCents: 3000 }),
          ],
          { isPremium: true, hitRate: 0.5 },
        ),
      ],
      { numPremiumCardsPerPack: 1 },
    );

    const tier = calculateValuation(detail, 10000).tiers[0];
    expect(tier.numCards).toBe(3);
    expect(tier.numValuedCards).toBe(2);
    expect(tier.avgValueCents).toBe(2000);
    expect(tier.contributionCents).toBe(1000);
  });

  it('reports a null average for a tier whose cards are all unvalued', () => {
    const v = calculateValuation(singleTierPack(null, 0.5), 10000);

    expect(v.tiers[0].avgValueCents).toBeNull();
    expect(v.tiers[0].contributionCents).toBe(0);
    expect(v.tiers[0].avgValueBbCents).toBeNull();
    expect(v.tiers[0].contributionBbCents).toBe(0);
    expect(v.expectedValueCents).toBe(0);
  });

  it('averages an empty tier as 0', () => {
    const detail = makeDetail('S1', [makeTier('Grail', [], { isPremium: true, hitRate: 0.2 })]);
    const v = calculateValuation(detail, 10000);

    expect(v.tiers[0].avgValueCents).toBe(0);
    expect(v.tiers[0].numCards).toBe(0);
    expect(v.expectedValueCents).toBe(0);
  });

  it('reports ROI as null and skips buyback when the cost is unknown', () => {
    const v = calculateValuation(singleTierPack(9000), null);

    expect(v.expectedValueCents).toBe(9000);
    expect(v.staticPackCostCents).toBeNull();
    expect(v.roi).toBeNull();
    expect(v.expectedValueBbCents).toBeNull();
    expect(v.packCostBbCents).toBeNull();
    expect(v.roiBb).toBeNull();
    expect(v.tiers[0].avgValueBbCents).toBeNull();
    expect(v.tiers[0].contributionBbCents).toBeNull();
  });

  it('reports an infinite ROI for a free pack', () => {
    const v = calculateValuation(singleTierPack(9000), 0);
    expect(v.roi).toBe(Number.POSITIVE_INFINITY);
    expect(v.roiBb).toBe(Number.POSITIVE_INFINITY);
  });

  it('takes the buyback ratios from configuration', () => {
    const v = calculateValuation(singleTierPack(500), 10000, { floorRatio: 0.5, costMarkupRatio: 1 });
    expect(v.tiers[0].avgValueBbCents).toBe(5000);
    expect(v.packCostBbCents).toBe(10000);
    expect(v.roiBb).toBeCloseTo(-0.5, 10);
  });
});
