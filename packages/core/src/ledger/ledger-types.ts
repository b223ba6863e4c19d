/**
 * Ledger Domain Types
 *
 * Type definitions for receipts, snapshots and derived summaries.
 */

import type { RejectionCode, RejectionError } from './ledger-errors.js';

/**
 * Calendar date in `YYYY-MM-DD` form
 */
export type IsoDate = string;

/**
 * Calendar month in `YYYY-MM` form
 */
export type YearMonth = string;

/**
 * Raw receipt fields as received from a caller, before validation.
 * Values may be of any shape; validation decides what is acceptable.
 */
export interface RawReceiptFields {
  date?: unknown;
  category?: unknown;
  description?: unknown;
  amount?: unknown;
  [key: string]: unknown;
}

/**
 * Receipt fields after validation, before an id is assigned
 */
export interface NormalizedReceipt {
  date: IsoDate;
  category: string;
  description: string;
  amount: number;
}

/**
 * A stored household-ledger entry
 */
export interface Receipt extends NormalizedReceipt {
  id: number;
}

/**
 * Ordered, read-only, point-in-time copy of receipts
 */
export type LedgerSnapshot = readonly Receipt[];

export interface Rejection {
  index: number;
  error: RejectionError;
}

export interface InsertManyResult {
  inserted: Receipt[];
  rejected: Rejection[];
}

/**
 * Serializable form of a rejection for transport layers
 */
export interface RejectionReport {
  index: number;
  field: string | null;
  value: unknown;
  code: RejectionCode;
  message: string;
}

export interface FilterCriteria {
  dateFrom?: IsoDate;
  dateTo?: IsoDate;
  category?: string;
}

export interface MonthTotals {
  categories: Record<string, number>;
  total: number;
  count: number;
}

export interface MonthlySummary {
  months: Record<YearMonth, MonthTotals>;
}

export interface LedgerTotals {
  count: number;
  totalAmount: number;
  categories: Record<string, number>;
}

export interface CategoryShare {
  category: string;
  amount: number;
  percentage: number;
}

export interface MonthlyBreakdown {
  yearMonth: YearMonth;
  totalEntries: number;
  totalAmount: number;
  categories: CategoryShare[];
}

export interface ListReceiptsResult {
  totals: LedgerTotals;
  receipts: LedgerSnapshot;
}

export interface CreateReceiptsResult {
  created: Receipt[];
  rejected: RejectionReport[];
}

export interface SeedResult {
  added: number;
  total: number;
}
