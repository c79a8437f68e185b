import type { ExtractedOffer, RawBlock } from '@offerscope/shared';
import { getErrorMessage } from '@offerscope/shared';
import { InvalidInputError } from '../utils/errors';
import { ExtractorLogger, extractionLogger } from '../utils/logger';
import { splitIntoBlocks } from './blocks';
import { extractOffers } from './pattern';
import type { ExtractionInput, ExtractionStrategy } from './types';

/**
 * Boundary check for the operator label, done once before any extraction
 */
export function validateOperator(operator: unknown): string {
  if (typeof operator !== 'string' || operator.trim() === '') {
    throw new InvalidInputError('Operator label must be a non-empty string');
  }
  return operator.trim();
}

export function isRawBlock(input: ExtractionInput): input is RawBlock {
  return typeof input !== 'string';
}

export function inputToText(input: ExtractionInput): string {
  return isRawBlock(input) ? input.join('\n') : input;
}

/**
 * Deterministic rule-based strategy.
 * A RawBlock yields at most one offer; page text is split into blocks on blank lines.
 */
export class PatternStrategy implements ExtractionStrategy {
  readonly name = 'pattern';

  private readonly logger: ExtractorLogger;

  constructor(options: { logger?: ExtractorLogger } = {}) {
    this.logger = options.logger ?? extractionLogger;
  }

  async extract(operator: string, input: ExtractionInput): Promise<ExtractedOffer[]> {
    const label = validateOperator(operator);
    const blocks = isRawBlock(input) ? [input] : splitIntoBlocks(input);
    const offers = extractOffers(label, blocks);

    const dropped = blocks.length - offers.length;
    if (dropped > 0) {
      this.logger.debug(
        `${label}: ${getErrorMessage('EXTRACT_NO_OFFER')} (${dropped} of ${blocks.length} blocks)`
      );
    }
    return offers;
  }
}

/**
 * Compose two strategies: the fallback runs only when the primary finds nothing.
 */
export function withFallback(
  primary: ExtractionStrategy,
  fallback: ExtractionStrategy
): ExtractionStrategy {
  return {
    name: `${primary.name}>${fallback.name}`,
    async extract(operator: string, input: ExtractionInput): Promise<ExtractedOffer[]> {
      const offers = await primary.extract(operator, input);
      if (offers.length > 0) {
        return offers;
      }
      return fallback.extract(operator, input);
    },
  };
}
