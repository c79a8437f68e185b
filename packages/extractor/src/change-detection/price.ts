// Price change detection
import type { PriceChange } from '@offerscope/shared';

/**
 * Prices are compared as trimmed strings, so "1,250" and "1250" differ.
 */
export function detectPriceChange(prev: string, curr: string): PriceChange | null {
  const from = prev.trim();
  const to = curr.trim();

  if (from === to) {
    return null;
  }

  return { from, to };
}

export function formatPriceChange(change: PriceChange): string {
  return `Price: ${change.from}->${change.to}`;
}
