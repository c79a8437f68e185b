/**
 * Error Taxonomy - Human-readable error messages and recommendations
 *
 * Maps internal error codes to operator-facing messages with actionable suggestions.
 */

import type { ErrorCode } from './domain';

export interface ErrorInfo {
  title: string;
  description: string;
  recommendation: string;
  severity: 'info' | 'warning' | 'error' | 'critical';
  retryable: boolean;
}

/**
 * Error taxonomy mapping
 */
export const ERROR_TAXONOMY: Record<ErrorCode, ErrorInfo> = {
  // Extraction
  EXTRACT_NO_OFFER: {
    title: 'No Offer Found',
    description: 'The text block did not contain a usable offer name.',
    recommendation: 'The block is probably page chrome. Check the block segmentation if real offers are missing.',
    severity: 'info',
    retryable: false,
  },

  // Inference
  INFERENCE_SKIPPED: {
    title: 'Inference Skipped',
    description: 'The page text was too short to send to the inference service.',
    recommendation: 'The page probably failed to render. Check the page-text provider.',
    severity: 'warning',
    retryable: true,
  },
  INFERENCE_RATE_LIMITED: {
    title: 'Rate Limited',
    description: 'The inference service kept rejecting requests for exceeding its quota.',
    recommendation: 'Increase the retry delay or run fewer sources per batch.',
    severity: 'warning',
    retryable: true,
  },
  INFERENCE_PARSE_ERROR: {
    title: 'Malformed Response',
    description: 'The inference service returned something that is not a list of offers.',
    recommendation: 'Check the prompt or switch to another model.',
    severity: 'warning',
    retryable: false,
  },
  INFERENCE_FAILED: {
    title: 'Inference Failed',
    description: 'The inference service call failed.',
    recommendation: 'Check the client configuration and that the service is reachable.',
    severity: 'error',
    retryable: false,
  },

  // Ledger
  LEDGER_ROW_INVALID: {
    title: 'Invalid Ledger Row',
    description: 'A historical row is missing its operator or offer name.',
    recommendation: 'Fix or remove the row in the ledger. It is ignored for comparison.',
    severity: 'warning',
    retryable: false,
  },

  // Boundary and setup
  INVALID_INPUT: {
    title: 'Invalid Input',
    description: 'A required argument was missing or empty.',
    recommendation: 'Pass a non-empty operator label and page text.',
    severity: 'error',
    retryable: false,
  },
  CONFIG_INVALID: {
    title: 'Invalid Configuration',
    description: 'One or more environment variables failed validation.',
    recommendation: 'Fix the listed variables and restart.',
    severity: 'critical',
    retryable: false,
  },

  // Unknown
  UNKNOWN: {
    title: 'Unknown Error',
    description: 'An unexpected error occurred.',
    recommendation: 'Check the logs. Please report it if this persists.',
    severity: 'warning',
    retryable: true,
  },
};

function isErrorCode(value: string): value is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ERROR_TAXONOMY, value);
}

/**
 * Get error info for an error code
 */
export function getErrorInfo(errorCode: string | null): ErrorInfo | null {
  if (!errorCode) return null;
  if (isErrorCode(errorCode)) return ERROR_TAXONOMY[errorCode];
  return {
    title: 'Unknown Error',
    description: `Error: ${errorCode}`,
    recommendation: 'Check the logs. Please report it if this persists.',
    severity: 'warning',
    retryable: true,
  };
}

/**
 * Get user-friendly error message
 */
export function getErrorMessage(errorCode: string | null): string {
  const info = getErrorInfo(errorCode);
  if (!info) return '';
  return `${info.title}: ${info.description}`;
}
