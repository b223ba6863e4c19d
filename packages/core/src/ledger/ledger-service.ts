/**
 * Ledger Service
 *
 * Business logic layer the transport shell calls into.
 * Takes snapshots from the store, runs the query and aggregation engines on
 * them, and emits ledger events for audit logging.
 */

import {
  rankCategories,
  sumByCategory,
  summarize,
  totalsOf,
  yearMonthOf,
} from './aggregation-engine.js';
import { parseTabular, toTabular } from './export-formatter.js';
import {
  ConfirmationRequiredError,
  InvalidYearMonthError,
  ReceiptValidationError,
} from './ledger-errors.js';
import type { LedgerEvents } from './ledger-events.js';
import type { LedgerStore } from './ledger-store.js';
import type {
  CreateReceiptsResult,
  FilterCriteria,
  ListReceiptsResult,
  MonthlyBreakdown,
  MonthlySummary,
  Receipt,
  Rejection,
  RejectionReport,
  SeedResult,
  YearMonth,
} from './ledger-types.js';
import { filterReceipts } from './query-engine.js';
import { isYearMonth } from './receipt-model.js';
import { SAMPLE_RECEIPTS } from './sample-data.js';

export class LedgerService {
  constructor(
    private store: LedgerStore,
    private events: LedgerEvents
  ) {}

  /**
   * Store a batch of raw receipts with partial-success semantics.
   * Items are untrusted; anything that is not an object is rejected by index.
   *
   * @returns Stored receipts and a per-item rejection report
   */
  async createReceipts(raws: readonly unknown[]): Promise<CreateReceiptsResult> {
    const { inserted, rejected } = await this.store.insertMany(raws);
    const report = rejected.map(toRejectionReport);

    if (inserted.length > 0) {
      this.events.emit({
        type: 'ledger.receipts_created',
        metadata: {
          count: inserted.length,
          ids: inserted.map((receipt) => receipt.id),
        },
      });
    }

    if (report.length > 0) {
      this.events.emit({
        type: 'ledger.receipts_rejected',
        metadata: {
          count: report.length,
          codes: report.map((item) => item.code),
        },
      });
    }

    return { created: inserted, rejected: report };
  }

  /**
   * Parse a CSV document with a header row and store its rows
   *
   * @throws {MalformedTabularError} If the document cannot be parsed
   */
  async importTabular(document: string): Promise<CreateReceiptsResult> {
    return this.createReceipts(parseTabular(document));
  }

  /**
   * @throws {ReceiptNotFoundError} If no receipt has this id
   */
  async getReceipt(id: number): Promise<Receipt> {
    return this.store.findById(id);
  }

  /**
   * Filtered receipts together with their totals
   */
  async listReceipts(criteria: FilterCriteria = {}): Promise<ListReceiptsResult> {
    const receipts = filterReceipts(await this.store.snapshot(), criteria);
    return { totals: totalsOf(receipts), receipts };
  }

  /**
   * @throws {InvalidYearMonthError} If `yearMonth` is not `YYYY-MM`
   */
  async summarizeMonths(yearMonth?: YearMonth): Promise<MonthlySummary> {
    return summarize(await this.store.snapshot(), yearMonth);
  }

  /**
   * Single month with categories ranked by amount
   *
   * @throws {InvalidYearMonthError} If `yearMonth` is not `YYYY-MM`
   */
  async monthlyBreakdown(yearMonth: YearMonth): Promise<MonthlyBreakdown> {
    if (!isYearMonth(yearMonth)) {
      throw new InvalidYearMonthError(yearMonth);
    }

    const receipts = (await this.store.snapshot()).filter(
      (receipt) => yearMonthOf(receipt.date) === yearMonth
    );
    const { count, totalAmount } = totalsOf(receipts);

    return {
      yearMonth,
      totalEntries: count,
      totalAmount,
      categories: rankCategories(sumByCategory(receipts), totalAmount),
    };
  }

  /**
   * CSV document of the (optionally filtered) receipts
   */
  async exportReceipts(criteria: FilterCriteria = {}): Promise<string> {
    return toTabular(filterReceipts(await this.store.snapshot(), criteria));
  }

  /**
   * Insert the fixed sample receipts
   */
  async seedSampleData(): Promise<SeedResult> {
    const { inserted } = await this.store.insertMany(SAMPLE_RECEIPTS);
    const total = await this.store.count();

    this.events.emit({
      type: 'ledger.sample_seeded',
      metadata: { added: inserted.length, total },
    });

    return { added: inserted.length, total };
  }

  /**
   * Remove every receipt
   *
   * @returns Number of receipts removed
   * @throws {ConfirmationRequiredError} If `confirm` is not true
   */
  async clearAll(confirm: boolean): Promise<number> {
    try {
      const cleared = await this.store.clear(confirm);
      this.events.emit({ type: 'ledger.cleared', metadata: { cleared } });
      return cleared;
    } catch (error) {
      if (error instanceof ConfirmationRequiredError) {
        this.events.emit({ type: 'ledger.clear_refused' });
      }
      throw error;
    }
  }

  async receiptCount(): Promise<number> {
    return this.store.count();
  }
}

/**
 * Serializable rejection entry for transport layers
 */
export function toRejectionReport({ index, error }: Rejection): RejectionReport {
  return {
    index,
    field: error instanceof ReceiptValidationError ? error.field : null,
    value: error instanceof ReceiptValidationError ? error.value : null,
    code: error.code,
    message: error.message,
  };
}
