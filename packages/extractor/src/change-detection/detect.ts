// Main change detection function
import type {
  ChangeResult,
  ExtractedOffer,
  HistoricalRecord,
  HistoryLookup,
  OfferChanges,
} from '@offerscope/shared';
import type { CompareOptions } from './types';
import { detectPriceChange, formatPriceChange } from './price';
import { detectDetailsChange } from './details';

export const NEW_OFFER_REMARK = 'New Offer';
export const DEFAULT_SAME_LABEL = 'Same';
export const DETAILS_UPDATED = 'Details Updated';

/**
 * Compare an offer with the latest recorded observation of the same key.
 * `previous` is whatever the ledger lookup returned for (operator, name).
 */
export function compareOffer(
  offer: ExtractedOffer,
  previous: HistoricalRecord | null | undefined,
  options: CompareOptions = {}
): ChangeResult {
  if (!previous) {
    return { status: 'new', remark: NEW_OFFER_REMARK, changes: {} };
  }

  const mode = options.mode ?? 'price_and_details';
  const changes: OfferChanges = {};
  const fragments: string[] = [];

  const price = detectPriceChange(previous.price, offer.price);
  if (price) {
    changes.price = price;
    fragments.push(formatPriceChange(price));
  }

  if (mode === 'price_and_details') {
    const details = detectDetailsChange(previous.details, offer.details);
    if (details) {
      changes.details = details;
      fragments.push(DETAILS_UPDATED);
    }
  }

  if (fragments.length === 0) {
    return { status: 'same', remark: options.sameLabel ?? DEFAULT_SAME_LABEL, changes };
  }

  return {
    status: 'changed',
    remark: `Changed: ${fragments.join(', ')}`,
    changes,
  };
}

/**
 * Match on exact (operator, name). A renamed offer has no history and is
 * reported as new.
 */
export function compareToHistory(
  offer: ExtractedOffer,
  lookup: HistoryLookup,
  options: CompareOptions = {}
): ChangeResult {
  return compareOffer(offer, lookup(offer.operator, offer.name), options);
}
