export {
  buildLookup,
  parseLedgerRecords,
  toLedgerRow,
  fromLedgerRow,
  formatLedgerDate,
  InMemoryLedger,
  LEDGER_COLUMNS,
} from './ledger';
export type { LedgerReader, LedgerWriter } from './ledger';
