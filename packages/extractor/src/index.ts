// @offerscope/extractor - offer extraction and change detection

export * from './classification';
export * from './extraction';
export * from './inference';
export * from './change-detection';
export * from './ledger';
export { trackOffers } from './pipeline/track';
export type { OfferSource, TrackOptions, TrackSummary, TrackedOffer } from './pipeline/track';
export { createTrackingSetup } from './factory';
export type { TrackingSetup, TrackingSetupOptions } from './factory';
export { loadExtractorConfig, validateEnv, envSchema } from './config/env';
export type { ExtractorConfig, EnvConfig } from './config/env';
export { ExtractorError, RateLimitError, InvalidInputError, ConfigError } from './utils/errors';
export { createLogger, ExtractorLogger } from './utils/logger';
export type { LogLevel } from './utils/logger';
