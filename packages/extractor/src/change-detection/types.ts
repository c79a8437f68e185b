// Local types for change detection module

import type { ComparisonMode } from '@offerscope/shared';

export interface CompareOptions {
  /**
   * `price_and_details` (default): unchanged only when both fields match.
   * `price_only`: details differences are ignored.
   */
  mode?: ComparisonMode;
  /** Remark for an unchanged offer, e.g. "Same as yesterday" */
  sameLabel?: string;
}
