import type { Validity } from '@offerscope/shared';
import {
  type DetailKind,
  DETAIL_RULES,
  NAME_BLOCKLIST,
  NAME_MIN_LENGTH,
  PRICE_MARKERS,
  PRICE_TOKEN_PATTERN,
  VALIDITY_RULES,
} from './rules';

/**
 * Classification of a single line.
 *
 * - `price`: the line is a price line, nothing else is checked
 * - `detail`: the line carries at least one allowance (data, minutes, SMS)
 * - `text`: plain text, a possible name
 *
 * `validity` is set independently for detail and text lines.
 */
export type ContentClassification =
  | { kind: 'detail'; line: string; details: DetailKind[]; validity: Validity | null }
  | { kind: 'text'; line: string; validity: Validity | null };

export type LineClassification =
  | { kind: 'price'; line: string; price: string }
  | ContentClassification;

/**
 * Normalized price token if the line is a price line, otherwise null.
 * Without a numeric token the whole line is the price.
 */
export function classifyPrice(line: string): string | null {
  const lower = line.toLowerCase();
  const isPrice = PRICE_MARKERS.some(marker => lower.includes(marker.toLowerCase()));
  if (!isPrice) {
    return null;
  }

  const match = line.match(PRICE_TOKEN_PATTERN);
  return match ? match[0] : line;
}

export function classifyDetails(line: string): DetailKind[] {
  const kinds: DetailKind[] = [];
  for (const rule of DETAIL_RULES) {
    if (rule.pattern.test(line)) {
      kinds.push(rule.kind);
    }
  }
  return kinds;
}

export function classifyValidity(line: string): Validity | null {
  const lower = line.toLowerCase();
  const rule = VALIDITY_RULES.find(r => lower.includes(r.keyword));
  return rule ? rule.validity : null;
}

export function isNameCandidate(line: string): boolean {
  if (line.length < NAME_MIN_LENGTH) {
    return false;
  }
  const lower = line.toLowerCase();
  return !NAME_BLOCKLIST.some(blocked => lower.includes(blocked));
}

/**
 * Classify one trimmed line. Never throws; unmatched lines are plain text.
 */
export function classifyLine(line: string): LineClassification {
  const price = classifyPrice(line);
  if (price !== null) {
    return { kind: 'price', line, price };
  }
  return classifyContent(line);
}

/**
 * Detail and validity checks only, for lines once the price is already taken.
 */
export function classifyContent(line: string): ContentClassification {
  const validity = classifyValidity(line);
  const details = classifyDetails(line);
  if (details.length > 0) {
    return { kind: 'detail', line, details, validity };
  }

  return { kind: 'text', line, validity };
}
