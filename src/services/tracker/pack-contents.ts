import pino from 'pino';
import type { SeriesDetail } from '../marketplace/types.js';
import type { SnapshotCard } from './types.js';

const log = pino({ name: 'pack-contents' });

/**
 * Flatten the tiered card list of a pack into one card set, each card tagged
 * with the name of the tier it sits in. Cards without an id are dropped.
 * A card id listed twice keeps its last occurrence.
 */
export function flattenPackCards(detail: Pick<SeriesDetail, 'id' | 'tiers'>): SnapshotCard[] {
  const byId = new Map<string, SnapshotCard>();
  let missingId = 0;

  for (const tier of detail.tiers) {
    for (const card of tier.cards) {
      if (!card.id) {
        missingId++;
        continue;
      }
      byId.set(card.id, {
        cardId: card.id,
        tier: tier.name,
        playerName: card.playerName,
        overall: card.overall,
        insertName: card.insertName,
        setNumber: card.setNumber,
        setName: card.setName,
        holo: card.holo,
        rarity: card.rarity,
        parallelName: card.parallelName,
        parallelNumber: card.parallelNumber,
        parallelTotal: card.parallelTotal,
        frontImageUrl: card.frontImageUrl,
        backImageUrl: card.backImageUrl,
        slabKind: card.slabKind,
        gradingCompany: card.gradingCompany,
        estimatedValueCents: card.estimatedValueCents,
      });
    }
  }

  if (missingId > 0) {
    log.warn({ seriesId: detail.id, missingId }, 'Dropped cards without an id');
  }

  return Array.from(byId.values());
}

/** Sum of the known estimated values; unvalued cards are left out. */
export function sumKnownValues(cards: readonly SnapshotCard[]): number {
  let total = 0;
  for (const card of cards) {
    if (card.estimatedValueCents != null) total += card.estimatedValueCents;
  }
  return total;
}
