import type { Validity } from '@offerscope/shared';

/**
 * Classification rules, in precedence order: price > detail > validity.
 *
 * A price line is excluded from every other rule. Detail and validity rules
 * are independent of each other, so one line can be both an allowance and a
 * validity hint.
 */
export type DetailKind = 'data' | 'minutes' | 'sms';

export interface DetailRule {
  kind: DetailKind;
  pattern: RegExp;
}

export const PRICE_MARKERS: readonly string[] = ['Rs.', 'PKR', 'Consumer Price', 'Incl. Tax'];

/** First run of digits, with grouping or decimal separators between digit groups */
export const PRICE_TOKEN_PATTERN = /\d+(?:[,.]\d+)*/;

export const DETAIL_RULES: readonly DetailRule[] = [
  { kind: 'data', pattern: /\d+\s*(?:GB|MB)/i },
  { kind: 'minutes', pattern: /\d+\s*Mins/i },
  { kind: 'sms', pattern: /\d+\s*SMS/i },
];

export interface ValidityRule {
  keyword: string;
  validity: Exclude<Validity, 'N/A'>;
}

// Within one line the first keyword in this table wins
export const VALIDITY_RULES: readonly ValidityRule[] = [
  { keyword: 'weekly', validity: 'Weekly' },
  { keyword: 'monthly', validity: 'Monthly' },
  { keyword: 'daily', validity: 'Daily' },
  { keyword: '3 day', validity: '3 Days' },
];

// Lines containing these never become the offer name
export const NAME_BLOCKLIST: readonly string[] = ['subscribe', 'consumer price'];

export const NAME_MIN_LENGTH = 4;

export const UNKNOWN_BUNDLE = 'Unknown Bundle';
export const NO_PRICE = 'N/A';
export const NO_DETAILS = 'Check Site';
