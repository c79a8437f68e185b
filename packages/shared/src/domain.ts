// Domain types for Offerscope - telecom offer tracking

export type Validity = "Daily" | "Weekly" | "Monthly" | "3 Days" | "N/A";

export type ErrorCode =
  // Extraction
  | "EXTRACT_NO_OFFER"
  // Inference
  | "INFERENCE_SKIPPED" | "INFERENCE_RATE_LIMITED" | "INFERENCE_PARSE_ERROR" | "INFERENCE_FAILED"
  // Ledger
  | "LEDGER_ROW_INVALID"
  // Boundary and setup
  | "INVALID_INPUT" | "CONFIG_INVALID"
  // Unknown
  | "UNKNOWN";

/**
 * One visually grouped region of a page: non-empty, trimmed lines in page order.
 */
export type RawBlock = readonly string[];

export interface ExtractedOffer {
  operator: string;
  name: string;
  price: string;
  validity: Validity;
  details: string;
}

/**
 * A previously persisted observation. Recency is append order, never `date`.
 */
export interface HistoricalRecord {
  date: string;
  operator: string;
  name: string;
  validity: string;
  details: string;
  price: string;
  remark?: string;
}

export type HistoryLookup = (operator: string, name: string) => HistoricalRecord | undefined;

/**
 * Stored row layout: date, operator, name, validity, details, price, remark.
 */
export type LedgerRow = [
  date: string,
  operator: string,
  name: string,
  validity: string,
  details: string,
  price: string,
  remark: string,
];

// Change detection
export type ChangeStatus = "new" | "same" | "changed";

export type ComparisonMode = "price_and_details" | "price_only";

export interface PriceChange {
  from: string;
  to: string;
}

export interface DetailsChange {
  from: string;
  to: string;
  added: string[];
  removed: string[];
}

export interface OfferChanges {
  price?: PriceChange;
  details?: DetailsChange;
}

export interface ChangeResult {
  status: ChangeStatus;
  remark: string;
  changes: OfferChanges;
}

// Inference
export interface RetryPolicy {
  maxAttempts: number;
  delayMs: number;
}
