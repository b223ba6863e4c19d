/**
 * Ledger Domain
 *
 * Public exports for receipt storage, queries, aggregation and export
 */

// Model
export { validateAndNormalize, isIsoDate, isYearMonth, parseAmount } from './receipt-model.js';

// Store
export { LedgerStore, DEFAULT_MAX_RECORDS } from './ledger-store.js';
export type { LedgerStoreOptions } from './ledger-store.js';
export { SerialLock } from './serial-lock.js';

// Engines
export { filterReceipts } from './query-engine.js';
export { summarize, sumByCategory, totalsOf, rankCategories, yearMonthOf } from './aggregation-engine.js';
export {
  toTabular,
  toTabularRow,
  escapeCell,
  parseRows,
  parseTabular,
  TABULAR_COLUMNS,
} from './export-formatter.js';

// Service layer
export { LedgerService, toRejectionReport } from './ledger-service.js';
export { LedgerEventEmitter } from './ledger-events.js';
export type {
  LedgerEvent,
  LedgerEventType,
  LedgerEventHandler,
  LedgerEvents,
  HandlerErrorCallback,
} from './ledger-events.js';
export { SAMPLE_RECEIPTS } from './sample-data.js';

// Domain types
export type {
  IsoDate,
  YearMonth,
  RawReceiptFields,
  NormalizedReceipt,
  Receipt,
  LedgerSnapshot,
  Rejection,
  InsertManyResult,
  RejectionReport,
  FilterCriteria,
  MonthTotals,
  MonthlySummary,
  LedgerTotals,
  CategoryShare,
  MonthlyBreakdown,
  ListReceiptsResult,
  CreateReceiptsResult,
  SeedResult,
} from './ledger-types.js';

// Domain errors
export {
  LedgerError,
  ReceiptValidationError,
  MalformedReceiptError,
  InvalidDateError,
  EmptyCategoryError,
  InvalidAmountError,
  LedgerCapacityError,
  ConfirmationRequiredError,
  ReceiptNotFoundError,
  InvalidYearMonthError,
  MalformedTabularError,
} from './ledger-errors.js';
export type {
  ReceiptField,
  ReceiptValidationCode,
  RejectionCode,
  RejectionError,
} from './ledger-errors.js';
