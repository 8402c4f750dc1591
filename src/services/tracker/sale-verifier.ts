import pino from 'pino';
import type { HitFeedItem } from '../marketplace/types.js';
import type { HitFeedMatch } from './types.js';

const log = pino({ name: 'sale-verifier' });

/** Parse an ISO-8601 hit timestamp. Offset-less values are taken as UTC. */
export function parseHitTimestamp(value: string | null): Date | null {
  if (!value) return null;
  const hasZone = /(Z|[+-]\d{2}:?\d{2})$/i.test(value.trim());
  const parsed = new Date(hasZone ? value : `${value}Z`);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * Look for a hit-feed entry corroborating the sale of a card that left a pack.
 *
 * Candidates are scanned in feed order and matched on card id. With a
 * watermark, the first candidate strictly after it wins. Without one, the
 * first candidate with a usable timestamp wins regardless of age, which can
 * accept a stale hit if the feed still carries one.
 *
 * Candidates with a missing or unparseable timestamp are skipped.
 */
export function verifySale(
  card: { cardId: string | null },
  hitFeedItems: readonly HitFeedItem[],
  watermark: Date | null,
): HitFeedMatch | null {
  if (hitFeedItems.length === 0) return null;

  if (card.cardId == null || card.cardId === '') {
    log.warn({ card }, 'Cannot verify sale, card has no id');
    return null;
  }
  const cardId = String(card.cardId);

  for (const hit of hitFeedItems) {
    if (hit.cardId == null || String(hit.cardId) !== cardId) continue;

    if (!hit.createdAt) {
      log.warn({ cardId, hitId: hit.id }, 'Hit has no createdAt timestamp, skipping');
      continue;
    }

    const hitAt = parseHitTimestamp(hit.createdAt);
    if (!hitAt) {
      log.warn({ cardId, hitId: hit.id, createdAt: hit.createdAt }, 'Unparseable hit timestamp, skipping');
      continue;
    }

    if (watermark === null) {
      log.info({ cardId, hitId: hit.id, hitAt }, 'Hit found with no watermark, accepting first match');
      return { hit, hitAt };
    }

    if (hitAt.getTime() > watermark.getTime()) {
      log.info({ cardId, hitId: hit.id, hitAt, watermark }, 'Sale verified on hit feed');
      return { hit, hitAt };
    }
  }

  return null;
}
