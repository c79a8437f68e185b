// Details change detection with an item-level diff
import * as Diff from 'diff';
import type { DetailsChange } from '@offerscope/shared';

export function splitDetails(details: string): string[] {
  return details
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

/**
 * Detect a details change.
 *
 * Equality is on the trimmed string; `added` / `removed` list the allowance
 * items that differ, and can both be empty when only spacing changed.
 */
export function detectDetailsChange(prev: string, curr: string): DetailsChange | null {
  const from = prev.trim();
  const to = curr.trim();

  if (from === to) {
    return null;
  }

  const added: string[] = [];
  const removed: string[] = [];

  for (const part of Diff.diffArrays(splitDetails(from), splitDetails(to))) {
    if (part.added) {
      added.push(...part.value);
    } else if (part.removed) {
      removed.push(...part.value);
    }
  }

  return { from, to, added, removed };
}
