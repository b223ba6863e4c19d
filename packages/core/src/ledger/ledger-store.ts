/**
 * Ledger Store
 *
 * Authoritative in-memory collection of receipts for the process lifetime.
 * Every operation runs under one serial lock so a snapshot never observes a
 * half-applied batch or a clear in progress. Callers only ever receive copies.
 */

import {
  ConfirmationRequiredError,
  LedgerCapacityError,
  ReceiptNotFoundError,
  ReceiptValidationError,
} from './ledger-errors.js';
import type {
  InsertManyResult,
  LedgerSnapshot,
  Receipt,
  Rejection,
} from './ledger-types.js';
import { validateAndNormalize } from './receipt-model.js';
import { SerialLock } from './serial-lock.js';

export const DEFAULT_MAX_RECORDS = 10_000;

export interface LedgerStoreOptions {
  /**
   * Upper bound on stored receipts; inserts past it are rejected
   */
  maxRecords?: number;
}

export class LedgerStore {
  private readonly receipts: Receipt[] = [];
  private readonly lock = new SerialLock();
  private readonly maxRecords: number;
  private lastId = 0;

  constructor(options: LedgerStoreOptions = {}) {
    const maxRecords = options.maxRecords ?? DEFAULT_MAX_RECORDS;
    if (!Number.isSafeInteger(maxRecords) || maxRecords < 1) {
      throw new RangeError(`maxRecords must be a positive integer, got ${maxRecords}`);
    }
    this.maxRecords = maxRecords;
  }

  /**
   * Validate and store a single receipt
   *
   * @returns Copy of the stored receipt with its assigned id
   * @throws {ReceiptValidationError} If the raw fields are invalid
   * @throws {LedgerCapacityError} If the store is full
   */
  async insertOne(raw: unknown): Promise<Receipt> {
    return this.lock.run(() => ({ ...this.append(raw) }));
  }

  /**
   * Validate and store each item independently.
   * A bad item is reported by index and never aborts the rest of the batch.
   */
  async insertMany(raws: readonly unknown[]): Promise<InsertManyResult> {
    return this.lock.run(() => {
      const inserted: Receipt[] = [];
      const rejected: Rejection[] = [];

      raws.forEach((raw, index) => {
        try {
          inserted.push({ ...this.append(raw) });
        } catch (error) {
          if (error instanceof ReceiptValidationError || error instanceof LedgerCapacityError) {
            rejected.push({ index, error });
            return;
          }
          throw error;
        }
      });

      return { inserted, rejected };
    });
  }

  /**
   * Point-in-time copy of all receipts in insertion order
   */
  async snapshot(): Promise<LedgerSnapshot> {
    return this.lock.run(() => this.receipts.map((receipt) => ({ ...receipt })));
  }

  /**
   * Look up a receipt by id
   *
   * @throws {ReceiptNotFoundError} If no receipt has this id
   */
  async findById(id: number): Promise<Receipt> {
    return this.lock.run(() => {
      const receipt = this.receipts.find((candidate) => candidate.id === id);
      if (!receipt) {
        throw new ReceiptNotFoundError(id);
      }
      return { ...receipt };
    });
  }

  async count(): Promise<number> {
    return this.lock.run(() => this.receipts.length);
  }

  /**
   * Erase every receipt. Ids already handed out are never reused.
   *
   * @returns Number of receipts removed
   * @throws {ConfirmationRequiredError} If `confirm` is not true; nothing is removed
   */
  async clear(confirm: boolean): Promise<number> {
    return this.lock.run(() => {
      if (confirm !== true) {
        throw new ConfirmationRequiredError('clear all receipts');
      }
      const removed = this.receipts.length;
      this.receipts.length = 0;
      return removed;
    });
  }

  /**
   * Must only be called while holding the lock
   */
  private append(raw: unknown): Receipt {
    const normalized = validateAndNormalize(raw);

    if (this.receipts.length >= this.maxRecords) {
      throw new LedgerCapacityError(this.maxRecords);
    }

    this.lastId += 1;
    const receipt: Receipt = Object.freeze({ id: this.lastId, ...normalized });
    this.receipts.push(receipt);
    return receipt;
  }
}
