import { z } from 'zod';
import type {
  ExtractedOffer,
  HistoricalRecord,
  HistoryLookup,
  LedgerRow,
} from '@offerscope/shared';
import { getErrorMessage } from '@offerscope/shared';
import { createLogger, ExtractorLogger } from '../utils/logger';

/** Spreadsheet header names, in stored column order */
export const LEDGER_COLUMNS = [
  'Date',
  'Operator',
  'Offer Name',
  'Validity',
  'Details',
  'Price',
  'Remark',
] as const;

export interface LedgerReader {
  /** Every stored row, in append order */
  getAllRecords(): Promise<HistoricalRecord[]>;
}

export interface LedgerWriter {
  appendRows(rows: LedgerRow[]): Promise<void>;
}

const ledgerLogger = createLogger('[Ledger]');

// Sheets hand back numbers for numeric-looking cells
const cellSchema = z.unknown().transform(value =>
  typeof value === 'string' || typeof value === 'number' ? String(value).trim() : ''
);

const sheetRecordSchema = z.object({
  Date: cellSchema,
  Operator: cellSchema,
  'Offer Name': cellSchema,
  Validity: cellSchema,
  Details: cellSchema,
  Price: cellSchema,
  Remark: cellSchema,
});

function lookupKey(operator: string, name: string): string {
  return JSON.stringify([operator, name]);
}

/**
 * Build a lookup over a snapshot of the ledger.
 *
 * The last record per exact (operator, name) wins: append order is recency,
 * the `date` column is not consulted.
 */
export function buildLookup(records: readonly HistoricalRecord[]): HistoryLookup {
  const latest = new Map<string, HistoricalRecord>();
  for (const record of records) {
    latest.set(lookupKey(record.operator, record.name), record);
  }
  return (operator, name) => latest.get(lookupKey(operator, name));
}

/**
 * Convert header-keyed sheet records into historical records.
 * Rows without an operator or offer name cannot be matched and are skipped.
 */
export function parseLedgerRecords(
  rows: readonly Record<string, unknown>[],
  logger: ExtractorLogger = ledgerLogger
): HistoricalRecord[] {
  const records: HistoricalRecord[] = [];

  rows.forEach((row, index) => {
    const parsed = sheetRecordSchema.safeParse(row);
    if (!parsed.success || !parsed.data.Operator || !parsed.data['Offer Name']) {
      logger.warn(`Row ${index + 1}: ${getErrorMessage('LEDGER_ROW_INVALID')}`);
      return;
    }

    const data = parsed.data;
    records.push({
      date: data.Date,
      operator: data.Operator,
      name: data['Offer Name'],
      validity: data.Validity,
      details: data.Details,
      price: data.Price,
      remark: data.Remark,
    });
  });

  return records;
}

export function toLedgerRow(date: string, offer: ExtractedOffer, remark: string): LedgerRow {
  return [date, offer.operator, offer.name, offer.validity, offer.details, offer.price, remark];
}

export function fromLedgerRow(row: LedgerRow): HistoricalRecord {
  const [date, operator, name, validity, details, price, remark] = row;
  return { date, operator, name, validity, details, price, remark };
}

/**
 * Local calendar date as YYYY-MM-DD
 */
export function formatLedgerDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Append-only ledger kept in process memory.
 */
export class InMemoryLedger implements LedgerReader, LedgerWriter {
  private readonly records: HistoricalRecord[];

  constructor(records: readonly HistoricalRecord[] = []) {
    this.records = [...records];
  }

  async getAllRecords(): Promise<HistoricalRecord[]> {
    return [...this.records];
  }

  async appendRows(rows: LedgerRow[]): Promise<void> {
    this.records.push(...rows.map(fromLedgerRow));
  }
}
