import type { CompareOptions } from './change-detection/types';
import { loadExtractorConfig, type ExtractorConfig } from './config/env';
import { PatternStrategy, withFallback } from './extraction/strategy';
import type { ExtractionStrategy } from './extraction/types';
import { ClaudeCliClient } from './inference/claude-cli';
import type { InferenceClient } from './inference/client';
import { InferenceExtractor } from './inference/extractor';
import type { Sleep } from './inference/retry';
import { createLogger, ExtractorLogger } from './utils/logger';

export interface TrackingSetup {
  pattern: PatternStrategy;
  inference: InferenceExtractor;
  /** Pattern rules first, inference when they find nothing */
  strategy: ExtractionStrategy;
  compare: CompareOptions;
  /** For `trackOffers`, at the configured level */
  logger: ExtractorLogger;
}

export interface TrackingSetupOptions {
  config?: ExtractorConfig;
  /** Defaults to the Claude CLI client built from config */
  client?: InferenceClient;
  sleep?: Sleep;
}

/**
 * Wire strategies and comparison options from configuration.
 */
export function createTrackingSetup(options: TrackingSetupOptions = {}): TrackingSetup {
  const config = options.config ?? loadExtractorConfig();
  const enabled = config.nodeEnv !== 'test';
  const logger = (prefix: string) => createLogger(prefix, enabled, config.logLevel);

  const client = options.client ?? new ClaudeCliClient({
    command: config.claudeCli.path,
    timeoutMs: config.claudeCli.timeoutMs,
    logger: logger('[ClaudeCli]'),
  });

  const pattern = new PatternStrategy({ logger: logger('[Extraction]') });
  const inference = new InferenceExtractor({
    client,
    retryPolicy: config.retryPolicy,
    sleep: options.sleep,
    minTextLength: config.inference.minTextLength,
    maxTextLength: config.inference.maxTextLength,
    modelPreferences: config.inference.modelPreferences,
    logger: logger('[Inference]'),
  });

  return {
    pattern,
    inference,
    strategy: withFallback(pattern, inference),
    compare: {
      mode: config.comparison.mode,
      sameLabel: config.comparison.sameLabel,
    },
    logger: logger('[Pipeline]'),
  };
}
