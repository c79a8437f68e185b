import type { ExtractedOffer, RawBlock } from '@offerscope/shared';

export type ExtractionInput = RawBlock | string;

/**
 * Common contract of the pattern and inference extractors:
 * operator label and raw text in, zero or more offers out.
 *
 * Implementations never reject on malformed or sparse input; they return
 * fewer offers instead.
 */
export interface ExtractionStrategy {
  readonly name: string;
  extract(operator: string, input: ExtractionInput): Promise<ExtractedOffer[]>;
}
