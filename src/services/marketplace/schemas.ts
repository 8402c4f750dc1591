import pino from 'pino';
import { z } from 'zod';

const logger = pino({ name: 'marketplace-schemas' });

// Scalar fields fall back to null. A tier or card entry that is not an object
// fails the whole series payload; the card set is never partial.

const optionalString = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => (v == null ? null : String(v)))
  .catch(null);

const optionalNumber = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((v) => {
    if (v == null || v === '') return null;
    const n = typeof v === 'number' ? v : Number(v);
    return Number.isFinite(n) ? n : null;
  })
  .catch(null);

/** Money and counts land in INTEGER columns. */
const optionalInteger = optionalNumber.transform((n) => (n === null ? null : Math.round(n)));

const optionalBoolean = z
  .boolean()
  .nullish()
  .transform((v) => v ?? null)
  .catch(null);

/** Every element must parse; a missing list is empty. */
function strictList<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(item)
    .nullish()
    .transform((v): z.output<T>[] => v ?? []);
}

/** Elements that do not parse are dropped and counted. */
function lenientList<O>(item: z.ZodType<O, z.ZodTypeDef, unknown>, label: string) {
  return z
    .array(z.unknown())
    .nullish()
    .catch(null)
    .transform((v): O[] => {
      const parsed: O[] = [];
      let dropped = 0;
      for (const element of v ?? []) {
        const result = item.safeParse(element);
        if (result.success) parsed.push(result.data);
        else dropped++;
      }
      if (dropped > 0) logger.warn({ list: label, dropped }, 'Dropped malformed list entries');
      return parsed;
    });
}

const rawCategoryRef = z
  .object({
    name: optionalString,
    priceCents: optionalInteger,
  })
  .nullish()
  .catch(null);

export const rawCardSchema = z.object({
  id: optionalString,
  playerName: optionalString,
  overall: optionalNumber,
  insertName: optionalString,
  insert: optionalString,
  setNumber: optionalString,
  setName: optionalString,
  holo: optionalString,
  rarity: optionalString,
  parallelName: optionalString,
  parallelNumber: optionalString,
  parallelTotal: optionalString,
  frontImageUrl: optionalString,
  frontSlabPictureUrl: optionalString,
  backImageUrl: optionalString,
  backSlabPictureUrl: optionalString,
  slabKind: optionalString,
  gradingCompany: optionalString,
  estimatedValueCents: optionalInteger,
});

export const rawTierSchema = z.object({
  id: optionalString,
  name: optionalString,
  isPremium: optionalBoolean,
  hitRate: optionalNumber,
  cards: strictList(rawCardSchema),
});

export const rawSeriesDetailSchema = z.object({
  id: optionalString,
  name: optionalString,
  category: rawCategoryRef,
  slabPackCategory: rawCategoryRef,
  tier: optionalString,
  costCents: optionalInteger,
  packsSold: optionalInteger,
  packsTotal: optionalInteger,
  isActive: optionalBoolean,
  numPremiumCardsPerPack: optionalInteger,
  numNonPremiumCardsPerPack: optionalInteger,
  tiers: strictList(rawTierSchema),
  slabPackTiers: strictList(rawTierSchema),
});

const rawSeriesRefSchema = z.object({
  id: optionalString,
  name: optionalString,
});

export const rawCategoryListingSchema = z.object({
  items: lenientList(
    z.object({
      name: optionalString,
      series: lenientList(rawSeriesRefSchema, 'series'),
      slabPackSeries: lenientList(rawSeriesRefSchema, 'slabPackSeries'),
    }),
    'categories',
  ),
});

export const rawHitFeedItemSchema = z.object({
  id: optionalString,
  cardId: optionalString,
  createdAt: optionalString,
  hitRate: optionalNumber,
  username: optionalString,
  avatarUrl: optionalString,
  number: optionalString,
  tag: optionalString,
  playerName: optionalString,
  overall: optionalNumber,
  insertName: optionalString,
  insert: optionalString,
  setName: optionalString,
  setNumber: optionalString,
  parallelName: optionalString,
  parallelNumber: optionalString,
  parallelTotal: optionalString,
  frontImageUrl: optionalString,
  frontSlabPictureUrl: optionalString,
  backImageUrl: optionalString,
  backSlabPictureUrl: optionalString,
  gradingCompany: optionalString,
  offerStatus: optionalString,
  arenaClubOfferStatus: optionalString,
  seriesName: optionalString,
  slabPackSeriesName: optionalString,
  categoryName: optionalString,
  slabPackCategoryName: optionalString,
  estimatedValueCents: optionalInteger,
});

export const rawHitFeedSchema = z.object({
  items: lenientList(rawHitFeedItemSchema, 'hit feed'),
});

export type RawCard = z.infer<typeof rawCardSchema>;
export type RawTier = z.infer<typeof rawTierSchema>;
export type RawSeriesDetail = z.infer<typeof rawSeriesDetailSchema>;
export type RawCategoryListing = z.infer<typeof rawCategoryListingSchema>;
export type RawHitFeedItem = z.infer<typeof rawHitFeedItemSchema>;
