import type { ErrorCode, ExtractedOffer, RetryPolicy } from '@offerscope/shared';
import { getErrorMessage } from '@offerscope/shared';
import { inputToText, validateOperator } from '../extraction/strategy';
import type { ExtractionInput, ExtractionStrategy } from '../extraction/types';
import { RateLimitError, toError } from '../utils/errors';
import { ExtractorLogger, inferenceLogger } from '../utils/logger';
import type { InferenceClient } from './client';
import { resolveModel } from './models';
import { buildOfferPrompt, DEFAULT_MAX_TEXT_LENGTH } from './prompt';
import { parseOfferResponse } from './response';
import { createRetryPolicy, sleep as defaultSleep, type Sleep } from './retry';

export const DEFAULT_MIN_TEXT_LENGTH = 100;

export interface InferenceExtractorOptions {
  client: InferenceClient;
  retryPolicy?: Partial<RetryPolicy>;
  /** Injected for tests; defaults to a real timer */
  sleep?: Sleep;
  /** Shorter page text means the page likely failed to render */
  minTextLength?: number;
  maxTextLength?: number;
  /** Fixed model name; takes precedence over `modelPreferences` */
  model?: string;
  /** Ordered substrings resolved against the client's models on each call */
  modelPreferences?: string[];
  logger?: ExtractorLogger;
}

export interface InferenceOutcome {
  offers: ExtractedOffer[];
  /** Calls made to the service */
  attempts: number;
  /** null on success, including a successful empty list */
  errorCode: ErrorCode | null;
}

/**
 * Extraction strategy that delegates field recognition to an external
 * text-to-structure service.
 *
 * Rate limits are retried with a fixed delay up to `maxAttempts` calls.
 * A malformed payload or any other client error ends the call with no offers.
 * Nothing here rejects except an invalid operator label.
 */
export class InferenceExtractor implements ExtractionStrategy {
  readonly name = 'inference';

  private readonly client: InferenceClient;
  private readonly policy: RetryPolicy;
  private readonly sleep: Sleep;
  private readonly minTextLength: number;
  private readonly maxTextLength: number;
  private readonly model?: string;
  private readonly modelPreferences: string[];
  private readonly logger: ExtractorLogger;

  constructor(options: InferenceExtractorOptions) {
    this.client = options.client;
    this.policy = createRetryPolicy(options.retryPolicy);
    this.sleep = options.sleep ?? defaultSleep;
    this.minTextLength = options.minTextLength ?? DEFAULT_MIN_TEXT_LENGTH;
    this.maxTextLength = options.maxTextLength ?? DEFAULT_MAX_TEXT_LENGTH;
    this.model = options.model;
    this.modelPreferences = options.modelPreferences ?? [];
    this.logger = options.logger ?? inferenceLogger;
  }

  async extract(operator: string, input: ExtractionInput): Promise<ExtractedOffer[]> {
    const outcome = await this.extractDetailed(operator, input);
    return outcome.offers;
  }

  async extractDetailed(operator: string, input: ExtractionInput): Promise<InferenceOutcome> {
    const label = validateOperator(operator);
    const text = inputToText(input).trim();

    if (text.length < this.minTextLength) {
      this.logger.warn(`${label}: page text too short (${text.length} chars), skipping inference`);
      return this.fail('INFERENCE_SKIPPED', 0);
    }

    const prompt = buildOfferPrompt(label, text, this.maxTextLength);
    const { maxAttempts, delayMs } = this.policy;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      let raw: string;
      try {
        const model = await this.pickModel();
        raw = await this.client.generate(prompt, model);
      } catch (error) {
        if (!(error instanceof RateLimitError)) {
          this.logger.error(`${label}: inference call failed`, toError(error));
          return this.fail('INFERENCE_FAILED', attempt);
        }
        if (attempt >= maxAttempts) {
          break;
        }
        this.logger.warn(
          `${label}: rate limited (attempt ${attempt}/${maxAttempts}), waiting ${delayMs}ms`
        );
        await this.sleep(delayMs);
        continue;
      }

      const offers = parseOfferResponse(label, raw);
      if (offers === null) {
        this.logger.warn(`${label}: ${getErrorMessage('INFERENCE_PARSE_ERROR')}`);
        this.logger.debug(`${label}: raw response: ${raw.substring(0, 500)}`);
        return this.fail('INFERENCE_PARSE_ERROR', attempt);
      }

      this.logger.info(`${label}: inference returned ${offers.length} offers`);
      return { offers, attempts: attempt, errorCode: null };
    }

    this.logger.warn(`${label}: still rate limited after ${maxAttempts} attempts`);
    return this.fail('INFERENCE_RATE_LIMITED', maxAttempts);
  }

  private async pickModel(): Promise<string | undefined> {
    if (this.model !== undefined || this.modelPreferences.length === 0) {
      return this.model;
    }
    return resolveModel(this.client, this.modelPreferences);
  }

  private fail(errorCode: ErrorCode, attempts: number): InferenceOutcome {
    return { offers: [], attempts, errorCode };
  }
}
