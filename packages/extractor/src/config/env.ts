import { z } from 'zod';
import type { ComparisonMode, RetryPolicy } from '@offerscope/shared';
import { ConfigError } from '../utils/errors';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Inference retry policy
  INFERENCE_MAX_ATTEMPTS: positiveInt(3),
  INFERENCE_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(30000),

  // Inference input bounds
  INFERENCE_MIN_TEXT_LENGTH: z.coerce.number().int().nonnegative().default(100),
  INFERENCE_MAX_TEXT_LENGTH: positiveInt(15000),

  // Ordered substrings, first available model wins
  INFERENCE_MODEL_PREFERENCES: z.string().default('sonnet,haiku'),

  // Claude CLI client
  CLAUDE_CLI_PATH: z.string().min(1).default('claude'),
  CLAUDE_CLI_TIMEOUT_MS: positiveInt(90000),

  // Change detection
  CHANGE_COMPARISON_MODE: z.enum(['price_and_details', 'price_only']).default('price_and_details'),
  REMARK_SAME_LABEL: z.string().min(1).default('Same'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export interface ExtractorConfig {
  nodeEnv: EnvConfig['NODE_ENV'];
  logLevel: EnvConfig['LOG_LEVEL'];
  retryPolicy: RetryPolicy;
  inference: {
    minTextLength: number;
    maxTextLength: number;
    modelPreferences: string[];
  };
  claudeCli: {
    path: string;
    timeoutMs: number;
  };
  comparison: {
    mode: ComparisonMode;
    sameLabel: string;
  };
}

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors.map(err =>
      `${err.path.join('.')}: ${err.message}`
    ).join('\n');

    throw new ConfigError(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}

/**
 * Load extractor settings from the environment (defaults to `process.env`).
 */
export function loadExtractorConfig(
  env: Record<string, string | undefined> = process.env
): ExtractorConfig {
  const parsed = validateEnv(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    retryPolicy: {
      maxAttempts: parsed.INFERENCE_MAX_ATTEMPTS,
      delayMs: parsed.INFERENCE_RETRY_DELAY_MS,
    },
    inference: {
      minTextLength: parsed.INFERENCE_MIN_TEXT_LENGTH,
      maxTextLength: parsed.INFERENCE_MAX_TEXT_LENGTH,
      modelPreferences: parsed.INFERENCE_MODEL_PREFERENCES
        .split(',')
        .map(s => s.trim())
        .filter(s => s.length > 0),
    },
    claudeCli: {
      path: parsed.CLAUDE_CLI_PATH,
      timeoutMs: parsed.CLAUDE_CLI_TIMEOUT_MS,
    },
    comparison: {
      mode: parsed.CHANGE_COMPARISON_MODE,
      sameLabel: parsed.REMARK_SAME_LABEL,
    },
  };
}
