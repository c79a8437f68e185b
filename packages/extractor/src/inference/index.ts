export { InferenceExtractor, DEFAULT_MIN_TEXT_LENGTH } from './extractor';
export type { InferenceExtractorOptions, InferenceOutcome } from './extractor';
export type { InferenceClient } from './client';
export { ClaudeCliClient, isRateLimitOutput } from './claude-cli';
export type { ClaudeCliOptions } from './claude-cli';
export { buildOfferPrompt, DEFAULT_MAX_TEXT_LENGTH } from './prompt';
export { cleanResponse, parseOfferResponse } from './response';
export { selectModel, resolveModel } from './models';
export { createRetryPolicy, DEFAULT_RETRY_POLICY, sleep } from './retry';
export type { Sleep } from './retry';
