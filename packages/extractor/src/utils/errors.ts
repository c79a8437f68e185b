import type { ErrorCode } from '@offerscope/shared';

/**
 * Base class for errors the extractor raises on purpose.
 * `code` points into the shared error taxonomy.
 */
export class ExtractorError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Thrown by inference clients when the service asks us to slow down.
 * Any other error from a client is treated as terminal.
 */
export class RateLimitError extends ExtractorError {
  constructor(message = 'Inference service rate limit reached') {
    super('INFERENCE_RATE_LIMITED', message);
  }
}

/**
 * Contract violation at a public boundary (e.g. a blank operator label).
 */
export class InvalidInputError extends ExtractorError {
  constructor(message: string) {
    super('INVALID_INPUT', message);
  }
}

export class ConfigError extends ExtractorError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
