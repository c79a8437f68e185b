import { z } from 'zod';
import type { ExtractedOffer } from '@offerscope/shared';
import { classifyValidity } from '../classification/classify';

const MISSING = 'N/A';

// Strings and numbers are kept, anything else counts as missing
const fieldSchema = z.unknown().transform(value => {
  if (typeof value !== 'string' && typeof value !== 'number') return MISSING;
  const text = String(value).trim();
  return text === '' ? MISSING : text;
});

const offerItemSchema = z.object({
  name: fieldSchema,
  price: fieldSchema,
  validity: fieldSchema,
  details: fieldSchema,
});

/**
 * Strip markdown code fences and any preamble around the JSON list.
 */
export function cleanResponse(raw: string): string {
  let text = raw.trim();

  text = text.replace(/^```[a-zA-Z]*\s*/, '').replace(/\s*```$/, '').trim();

  if (!text.startsWith('[')) {
    const start = text.indexOf('[');
    const end = text.lastIndexOf(']');
    if (start !== -1 && end > start) {
      text = text.substring(start, end + 1);
    }
  }

  return text;
}

/**
 * Parse a service response into offers.
 *
 * Returns null when the payload is not a JSON list even after cleaning.
 * Items that are not objects are skipped; missing fields become "N/A".
 */
export function parseOfferResponse(operator: string, raw: string): ExtractedOffer[] | null {
  let payload: unknown;
  try {
    payload = JSON.parse(cleanResponse(raw));
  } catch {
    return null;
  }

  if (!Array.isArray(payload)) {
    return null;
  }

  const offers: ExtractedOffer[] = [];
  for (const item of payload) {
    const parsed = offerItemSchema.safeParse(item);
    if (!parsed.success) {
      continue;
    }
    offers.push({
      operator,
      name: parsed.data.name,
      price: parsed.data.price,
      validity: classifyValidity(parsed.data.validity) ?? 'N/A',
      details: parsed.data.details,
    });
  }

  return offers;
}
