import { ConfigError } from '../utils/errors';
import { loadExtractorConfig, validateEnv } from './env';

describe('loadExtractorConfig', () => {
  it('should apply defaults to an empty environment', () => {
    expect(loadExtractorConfig({})).toEqual({
      nodeEnv: 'development',
      logLevel: 'info',
      retryPolicy: { maxAttempts: 3, delayMs: 30000 },
      inference: {
        minTextLength: 100,
        maxTextLength: 15000,
        modelPreferences: ['sonnet', 'haiku'],
      },
      claudeCli: { path: 'claude', timeoutMs: 90000 },
      comparison: { mode: 'price_and_details', sameLabel: 'Same' },
    });
  });

  it('should coerce numeric variables and split model preferences', () => {
    const config = loadExtractorConfig({
      INFERENCE_MAX_ATTEMPTS: '5',
      INFERENCE_RETRY_DELAY_MS: '0',
      INFERENCE_MODEL_PREFERENCES: ' opus , ,haiku ',
      CHANGE_COMPARISON_MODE: 'price_only',
      REMARK_SAME_LABEL: 'Same as yesterday',
    });

    expect(config.retryPolicy).toEqual({ maxAttempts: 5, delayMs: 0 });
    expect(config.inference.modelPreferences).toEqual(['opus', 'haiku']);
    expect(config.comparison).toEqual({ mode: 'price_only', sameLabel: 'Same as yesterday' });
  });
});

describe('validateEnv', () => {
  it('should list every invalid variable', () => {
    let caught: unknown;
    try {
      validateEnv({ INFERENCE_MAX_ATTEMPTS: '0', CHANGE_COMPARISON_MODE: 'fuzzy' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const message = caught instanceof Error ? caught.message : '';
    expect(message).toContain('Environment validation failed:');
    expect(message).toContain('INFERENCE_MAX_ATTEMPTS:');
    expect(message).toContain('CHANGE_COMPARISON_MODE:');
  });
});
