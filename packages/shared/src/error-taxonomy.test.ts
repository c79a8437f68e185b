import { ERROR_TAXONOMY, getErrorInfo, getErrorMessage } from './error-taxonomy';

describe('error taxonomy', () => {
  it('should return the entry for a known code', () => {
    expect(getErrorInfo('INFERENCE_RATE_LIMITED')).toBe(ERROR_TAXONOMY.INFERENCE_RATE_LIMITED);
    expect(getErrorInfo('INFERENCE_RATE_LIMITED')?.retryable).toBe(true);
  });

  it('should build a generic entry for an unknown code', () => {
    expect(getErrorInfo('SHEET_LOCKED')).toEqual({
      title: 'Unknown Error',
      description: 'Error: SHEET_LOCKED',
      recommendation: 'Check the logs. Please report it if this persists.',
      severity: 'warning',
      retryable: true,
    });
  });

  it('should not treat prototype keys as codes', () => {
    expect(getErrorInfo('toString')?.title).toBe('Unknown Error');
  });

  it('should format messages and handle missing codes', () => {
    expect(getErrorMessage('INFERENCE_PARSE_ERROR')).toBe(
      'Malformed Response: The inference service returned something that is not a list of offers.'
    );
    expect(getErrorMessage(null)).toBe('');
  });
});
