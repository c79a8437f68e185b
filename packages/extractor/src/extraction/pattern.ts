import type { ExtractedOffer, RawBlock, Validity } from '@offerscope/shared';
import { classifyContent, classifyLine, isNameCandidate } from '../classification/classify';
import type { LineClassification } from '../classification/classify';
import { NO_DETAILS, NO_PRICE, UNKNOWN_BUNDLE } from '../classification/rules';
import { normalizeLines } from './blocks';

/**
 * Build one offer from one block of text lines using the classification rules.
 *
 * Single pass over the lines:
 * 1. The first price line supplies the price and is consumed. At most one line
 *    is consumed even if several qualify; later price-marked lines go through
 *    the remaining checks like any other line.
 * 2. Allowance lines (data, minutes, SMS) go to details once each.
 * 3. Validity: the last line carrying a validity keyword wins.
 * 4. Name: the first remaining plain line that passes `isNameCandidate`.
 *
 * Never throws. A block with no usable name yields the `Unknown Bundle`
 * placeholder, which callers drop (see `isUsableOffer`).
 */
export function extractOffer(operator: string, block: RawBlock): ExtractedOffer {
  let price: string | null = null;
  let validity: Validity = 'N/A';
  let name: string | null = null;
  const details: string[] = [];

  for (const line of normalizeLines(block)) {
    const classified: LineClassification = price === null ? classifyLine(line) : classifyContent(line);

    if (classified.kind === 'price') {
      price = classified.price;
      continue;
    }

    if (classified.validity !== null) {
      validity = classified.validity;
    }

    if (classified.kind === 'detail') {
      details.push(line);
      continue;
    }

    if (name === null && isNameCandidate(line)) {
      name = line;
    }
  }

  return {
    operator,
    name: name ?? UNKNOWN_BUNDLE,
    price: price ?? NO_PRICE,
    validity,
    details: details.length > 0 ? details.join(', ') : NO_DETAILS,
  };
}

/**
 * False-positive filter: page chrome that flows through the classifier ends up
 * with the placeholder name.
 */
export function isUsableOffer(offer: ExtractedOffer): boolean {
  return offer.name !== UNKNOWN_BUNDLE;
}

/**
 * Extract every usable offer from a list of blocks, in block order.
 */
export function extractOffers(operator: string, blocks: readonly RawBlock[]): ExtractedOffer[] {
  return blocks.map(block => extractOffer(operator, block)).filter(isUsableOffer);
}
