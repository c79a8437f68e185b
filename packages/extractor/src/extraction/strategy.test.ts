import type { ExtractedOffer } from '@offerscope/shared';
import { InvalidInputError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { inputToText, PatternStrategy, validateOperator, withFallback } from './strategy';
import type { ExtractionStrategy } from './types';

const offer = (name: string): ExtractedOffer => ({
  operator: 'Jazz',
  name,
  price: '100',
  validity: 'Weekly',
  details: 'Check Site',
});

function fakeStrategy(name: string, offers: ExtractedOffer[]): ExtractionStrategy & { extract: jest.Mock } {
  return {
    name,
    extract: jest.fn().mockResolvedValue(offers),
  };
}

describe('validateOperator', () => {
  it('should trim a valid label', () => {
    expect(validateOperator('  Jazz ')).toBe('Jazz');
  });

  it('should reject blank and non-string labels', () => {
    expect(() => validateOperator('   ')).toThrow(InvalidInputError);
    expect(() => validateOperator(null)).toThrow('Operator label must be a non-empty string');
  });
});

describe('inputToText', () => {
  it('should join blocks with newlines and pass strings through', () => {
    expect(inputToText(['a', 'b'])).toBe('a\nb');
    expect(inputToText('page')).toBe('page');
  });
});

describe('PatternStrategy', () => {
  const strategy = new PatternStrategy();

  it('should extract a single offer from a block', async () => {
    const offers = await strategy.extract('Jazz', ['Weekly Super Card', '10GB Data', '500 Mins', 'Rs. 250 Incl. Tax']);

    expect(offers).toEqual([
      {
        operator: 'Jazz',
        name: 'Weekly Super Card',
        price: '250',
        validity: 'Weekly',
        details: '10GB Data, 500 Mins',
      },
    ]);
  });

  it('should split page text into blocks', async () => {
    const text = 'Daily Social\n1GB\nRs. 20\n\nFAQ\n\nMonthly Mega\n30GB\nRs. 1,000';
    const offers = await strategy.extract('Jazz', text);

    expect(offers.map(o => [o.name, o.price, o.validity])).toEqual([
      ['Daily Social', '20', 'Daily'],
      ['Monthly Mega', '1,000', 'Monthly'],
    ]);
  });

  it('should return no offers for a chrome-only block', async () => {
    await expect(strategy.extract('Jazz', ['FAQ', 'SUBSCRIBE'])).resolves.toEqual([]);
  });

  it('should log blocks dropped for having no offer', async () => {
    const logger = createLogger('[Test]', false);
    const debug = jest.spyOn(logger, 'debug');
    const logged = new PatternStrategy({ logger });

    await logged.extract('Jazz', 'Daily Social\n1GB\nRs. 20\n\nFAQ');

    expect(debug).toHaveBeenCalledWith(
      'Jazz: No Offer Found: The text block did not contain a usable offer name. (1 of 2 blocks)'
    );
  });

  it('should reject a blank operator', async () => {
    await expect(strategy.extract('', ['Weekly Super Card'])).rejects.toThrow(InvalidInputError);
  });
});

describe('withFallback', () => {
  it('should not call the fallback when the primary finds offers', async () => {
    const primary = fakeStrategy('pattern', [offer('A Card')]);
    const fallback = fakeStrategy('inference', [offer('B Card')]);

    const offers = await withFallback(primary, fallback).extract('Jazz', 'text');

    expect(offers).toEqual([offer('A Card')]);
    expect(fallback.extract).not.toHaveBeenCalled();
  });

  it('should use the fallback when the primary finds nothing', async () => {
    const primary = fakeStrategy('pattern', []);
    const fallback = fakeStrategy('inference', [offer('B Card')]);
    const composed = withFallback(primary, fallback);

    const offers = await composed.extract('Jazz', 'text');

    expect(composed.name).toBe('pattern>inference');
    expect(offers).toEqual([offer('B Card')]);
    expect(fallback.extract).toHaveBeenCalledWith('Jazz', 'text');
  });
});
