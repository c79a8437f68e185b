import { RateLimitError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import type { InferenceClient } from './client';
import { InferenceExtractor } from './extractor';

const PAGE_TEXT = [
  'Jazz Prepaid Bundles',
  'Weekly Super Card',
  '10GB Data',
  '500 Mins',
  'Rs. 250 Incl. Tax',
  'Monthly Mega',
  '30GB Data',
  'Rs. 1,000 Incl. Tax',
].join('\n');

const RESPONSE = JSON.stringify([
  { name: 'Weekly Super Card', price: '250', validity: 'Weekly', details: '10GB Data, 500 Mins' },
]);

const silent = createLogger('[Test]', false);

function createClient(): InferenceClient & { generate: jest.Mock } {
  return { generate: jest.fn() };
}

function createExtractor(client: InferenceClient, sleep: jest.Mock) {
  return new InferenceExtractor({
    client,
    sleep,
    retryPolicy: { maxAttempts: 3, delayMs: 60000 },
    minTextLength: 50,
    logger: silent,
  });
}

describe('InferenceExtractor', () => {
  let sleep: jest.Mock;

  beforeEach(() => {
    sleep = jest.fn().mockResolvedValue(undefined);
  });

  it('should return parsed offers on the first attempt', async () => {
    const client = createClient();
    client.generate.mockResolvedValue(RESPONSE);

    const outcome = await createExtractor(client, sleep).extractDetailed('Jazz', PAGE_TEXT);

    expect(outcome).toEqual({
      offers: [
        {
          operator: 'Jazz',
          name: 'Weekly Super Card',
          price: '250',
          validity: 'Weekly',
          details: '10GB Data, 500 Mins',
        },
      ],
      attempts: 1,
      errorCode: null,
    });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should retry the same prompt after rate limits and wait the fixed delay each time', async () => {
    const client = createClient();
    client.generate
      .mockRejectedValueOnce(new RateLimitError())
      .mockRejectedValueOnce(new RateLimitError())
      .mockResolvedValueOnce(RESPONSE);

    const outcome = await createExtractor(client, sleep).extractDetailed('Jazz', PAGE_TEXT);

    expect(outcome.attempts).toBe(3);
    expect(outcome.errorCode).toBeNull();
    expect(outcome.offers.map(o => o.name)).toEqual(['Weekly Super Card']);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls).toEqual([[60000], [60000]]);

    const prompts = client.generate.mock.calls.map(call => call[0]);
    expect(new Set(prompts).size).toBe(1);
  });

  it('should give up with no offers once attempts are exhausted', async () => {
    const client = createClient();
    client.generate.mockRejectedValue(new RateLimitError());

    const outcome = await createExtractor(client, sleep).extractDetailed('Jazz', PAGE_TEXT);

    expect(outcome).toEqual({ offers: [], attempts: 3, errorCode: 'INFERENCE_RATE_LIMITED' });
    expect(client.generate).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('should not retry other client errors', async () => {
    const client = createClient();
    client.generate.mockRejectedValue(new Error('connection refused'));

    const outcome = await createExtractor(client, sleep).extractDetailed('Jazz', PAGE_TEXT);

    expect(outcome).toEqual({ offers: [], attempts: 1, errorCode: 'INFERENCE_FAILED' });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should not retry a malformed payload', async () => {
    const client = createClient();
    client.generate.mockResolvedValue('I could not find any offers.');

    const outcome = await createExtractor(client, sleep).extractDetailed('Jazz', PAGE_TEXT);

    expect(outcome).toEqual({ offers: [], attempts: 1, errorCode: 'INFERENCE_PARSE_ERROR' });
    expect(client.generate).toHaveBeenCalledTimes(1);
  });

  it('should skip the call for short page text', async () => {
    const client = createClient();

    const outcome = await createExtractor(client, sleep).extractDetailed('Jazz', '  Loading...  ');

    expect(outcome).toEqual({ offers: [], attempts: 0, errorCode: 'INFERENCE_SKIPPED' });
    expect(client.generate).not.toHaveBeenCalled();
  });

  it('should accept a RawBlock and return plain offers from extract', async () => {
    const client = createClient();
    client.generate.mockResolvedValue(RESPONSE);

    const offers = await createExtractor(client, sleep).extract('Jazz', PAGE_TEXT.split('\n'));

    expect(offers).toHaveLength(1);
    expect(client.generate.mock.calls[0][0]).toContain('Weekly Super Card\n10GB Data');
  });

  it('should pass the fixed model to the client', async () => {
    const client = createClient();
    client.generate.mockResolvedValue('[]');
    const extractor = new InferenceExtractor({ client, model: 'haiku', sleep, minTextLength: 0, logger: silent });

    await extractor.extract('Jazz', PAGE_TEXT);

    expect(client.generate).toHaveBeenCalledWith(expect.any(String), 'haiku');
  });

  it('should resolve the model from preferences against listed models', async () => {
    const client = {
      generate: jest.fn().mockResolvedValue('[]'),
      listModels: jest.fn().mockResolvedValue(['claude-haiku-x', 'claude-sonnet-x']),
    };
    const extractor = new InferenceExtractor({
      client,
      modelPreferences: ['sonnet', 'haiku'],
      sleep,
      minTextLength: 0,
      logger: silent,
    });

    await extractor.extract('Jazz', PAGE_TEXT);

    expect(client.generate).toHaveBeenCalledWith(expect.any(String), 'claude-sonnet-x');
  });

  it('should reject a blank operator label', async () => {
    const client = createClient();

    await expect(createExtractor(client, sleep).extract(' ', PAGE_TEXT)).rejects.toThrow(
      'Operator label must be a non-empty string'
    );
  });
});
