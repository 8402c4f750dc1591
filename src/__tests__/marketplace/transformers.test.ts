import { describe, expect, it, vi } from 'vitest';

vi.mock('pino', () => ({
  default: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn().mockReturnThis(),
  }),
}));

import {
  rawCategoryListingSchema,
  rawHitFeedSchema,
  rawSeriesDetailSchema,
} from '../../services/marketplace/schemas.js';
import {
  transformCategoryListing,
  transformHitFeedItem,
  transformSeriesDetail,
} from '../../services/marketplace/transformers.js';

function parseDetail(body: unknown) {
  return transformSeriesDetail(rawSeriesDetailSchema.parse(body));
}

describe('transformSeriesDetail', () => {
  it('normalises a complete payload', () => {
    const detail = parseDetail({
      id: 42,
      name: 'Gold Baseball',
      category: { name: 'Gold', priceCents: 9900 },
      costCents: 10000,
      packsSold: 12,
      packsTotal: 500,
      isActive: true,
      numPremiumCardsPerPack: 1,
      numNonPremiumCardsPerPack: 2,
      tiers: [
        {
          id: 't1',
          name: 'Grail',
          isPremium: true,
          hitRate: 0.01,
          cards: [{ id: 7, playerName: 'Pitcher', estimatedValueCents: 250000, overall: 9.5 }],
        },
      ],
    });

    expect(detail).toMatchObject({
      id: '42',
      name: 'Gold Baseball',
      category: { name: 'Gold', priceCents: 9900 },
      costCents: 10000,
      packsSold: 12,
      packsTotal: 500,
      isActive: true,
      numPremiumCardsPerPack: 1,
      numNonPremiumCardsPerPack: 2,
    });
    expect(detail?.tiers[0]).toMatchObject({ id: 't1', name: 'Grail', isPremium: true, hitRate: 0.01 });
    expect(detail?.tiers[0].cards[0]).toMatchObject({
      id: '7',
      playerName: 'Pitcher',
      estimatedValueCents: 250000,
      overall: 9.5,
      gradingCompany: null,
    });
  });

  it('falls back to the slabPack* key names', () => {
    const detail = parseDetail({
      id: 'S1',
      slabPackCategory: { name: 'Ruby', priceCents: 2500 },
      slabPackTiers: [
        {
          name: 'Chase',
          cards: [{ id: 'c1', insert: 'Refractor', frontSlabPictureUrl: 'front.png', backSlabPictureUrl: 'back.png' }],
        },
      ],
    });

    expect(detail?.category).toEqual({ name: 'Ruby', priceCents: 2500 });
    expect(detail?.tiers[0].cards[0]).toMatchObject({
      insertName: 'Refractor',
      frontImageUrl: 'front.png',
      backImageUrl: 'back.png',
    });
  });

  it('uses the tier field as the category name when there is no category object', () => {
    expect(parseDetail({ id: 'S1', tier: 'Silver' })?.category).toEqual({ name: 'Silver', priceCents: null });
  });

  it('applies defaults for missing fields', () => {
    const detail = parseDetail({ id: 'S1', tiers: [{ cards: [{ id: 'c1' }] }] });

    expect(detail).toMatchObject({
      name: 'Unknown Name',
      costCents: null,
      packsSold: 0,
      packsTotal: 0,
      isActive: false,
      numPremiumCardsPerPack: 0,
      numNonPremiumCardsPerPack: 0,
    });
    expect(detail?.tiers[0]).toMatchObject({ id: null, name: 'Unknown Tier', isPremium: false, hitRate: 0 });
    expect(detail?.tiers[0].cards[0].estimatedValueCents).toBeNull();
  });

  it('keeps an unknown card value null rather than 0', () => {
    const detail = parseDetail({ id: 'S1', tiers: [{ cards: [{ id: 'c1', estimatedValueCents: 'n/a' }] }] });
    expect(detail?.tiers[0].cards[0].estimatedValueCents).toBeNull();
  });

  it('rounds fractional cents and counts to whole numbers', () => {
    const detail = parseDetail({
      id: 'S1',
      category: { name: 'Gold', priceCents: 9899.6 },
      costCents: '9999.5',
      packsSold: 12.2,
      tiers: [{ name: 'Grail', cards: [{ id: 'c1', estimatedValueCents: '1999.5' }, { id: 'c2', estimatedValueCents: 1234.4 }] }],
    });

    expect(detail?.category.priceCents).toBe(9900);
    expect(detail?.costCents).toBe(10000);
    expect(detail?.packsSold).toBe(12);
    expect(detail?.tiers[0].cards.map((c) => c.estimatedValueCents)).toEqual([2000, 1234]);
  });

  it('rejects the payload when a card entry is not an object', () => {
    const parsed = rawSeriesDetailSchema.safeParse({
      id: 'S1',
      tiers: [{ name: 'Common', cards: [null, { id: 'A' }, { id: 'B' }] }],
    });

    expect(parsed.success).toBe(false);
  });

  it('rejects the payload when a tier entry or card list is malformed', () => {
    expect(rawSeriesDetailSchema.safeParse({ id: 'S1', tiers: ['Common', { name: 'Grail', cards: [] }] }).success).toBe(false);
    expect(rawSeriesDetailSchema.safeParse({ id: 'S1', tiers: [{ name: 'Common', cards: 'none' }] }).success).toBe(false);
  });

  it('treats missing tier and card lists as empty', () => {
    expect(parseDetail({ id: 'S1', tiers: [{ name: 'Common' }] })?.tiers).toEqual([
      { id: null, name: 'Common', isPremium: false, hitRate: 0, cards: [] },
    ]);
  });

  it('returns null without an id', () => {
    expect(parseDetail({ name: 'No id' })).toBeNull();
  });
});

describe('transformCategoryListing', () => {
  it('reads series under either key', () => {
    const listing = transformCategoryListing(
      rawCategoryListingSchema.parse({
        items: [
          { name: 'Gold', series: [{ id: 1, name: 'Baseball' }] },
          { name: 'Misc.', slabPackSeries: [{ id: 'm1', name: 'Multi-Sport' }] },
          { series: [{ name: 'Nameless' }] },
        ],
      }),
    );

    expect(listing.items).toEqual([
      { name: 'Gold', series: [{ id: '1', name: 'Baseball' }] },
      { name: 'Misc.', series: [{ id: 'm1', name: 'Multi-Sport' }] },
      { name: '', series: [{ id: null, name: 'Nameless' }] },
    ]);
  });

  it('drops only the malformed category and series entries', () => {
    const listing = transformCategoryListing(
      rawCategoryListingSchema.parse({
        items: [null, { name: 'Gold', series: [42, { id: 's1', name: 'Baseball' }] }],
      }),
    );

    expect(listing.items).toEqual([{ name: 'Gold', series: [{ id: 's1', name: 'Baseball' }] }]);
  });

  it('treats a missing items list as empty', () => {
    expect(transformCategoryListing(rawCategoryListingSchema.parse({}))).toEqual({ items: [] });
  });
});

describe('transformHitFeedItem', () => {
  it('maps the alternate key names', () => {
    const feed = rawHitFeedSchema.parse({
      items: [
        {
          id: 'h1',
          cardId: 99,
          createdAt: '2024-05-01T06:00:00',
          arenaClubOfferStatus: 'accepted',
          slabPackSeriesName: 'Baseball',
          slabPackCategoryName: 'Gold',
          insert: 'Auto',
        },
      ],
    });

    expect(transformHitFeedItem(feed.items[0])).toMatchObject({
      id: 'h1',
      cardId: '99',
      createdAt: '2024-05-01T06:00:00',
      offerStatus: 'accepted',
      seriesName: 'Baseball',
      categoryName: 'Gold',
      insertName: 'Auto',
      estimatedValueCents: null,
    });
  });
});

describe('rawHitFeedSchema', () => {
  it('keeps the well-formed items when one entry is malformed', () => {
    const feed = rawHitFeedSchema.parse({ items: [null, { id: 'h2', cardId: 'B' }, 'junk'] });

    expect(feed.items.map(transformHitFeedItem).map((h) => [h.id, h.cardId])).toEqual([['h2', 'B']]);
  });
});
