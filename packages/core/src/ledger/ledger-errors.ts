/**
 * Ledger Domain Errors
 *
 * Custom error classes for ledger business rule violations.
 * These errors are thrown by the core and mapped to HTTP status codes by route handlers.
 */

export type ReceiptField = 'receipt' | 'date' | 'category' | 'amount';

export type ReceiptValidationCode =
  | 'invalid_receipt'
  | 'invalid_date'
  | 'empty_category'
  | 'invalid_amount';

export type RejectionCode = ReceiptValidationCode | 'capacity_exceeded';

export class LedgerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LedgerError';
  }
}

/**
 * Raised when a single receipt's raw fields fail validation.
 * Carries the offending field and the raw value as received.
 */
export class ReceiptValidationError extends LedgerError {
  readonly field: ReceiptField;
  readonly value: unknown;
  readonly code: ReceiptValidationCode;

  constructor(field: ReceiptField, value: unknown, code: ReceiptValidationCode, message: string) {
    super(message);
    this.name = 'ReceiptValidationError';
    this.field = field;
    this.value = value;
    this.code = code;
  }
}

/**
 * The item itself is not a set of fields (null, an array, a number, ...)
 */
export class MalformedReceiptError extends ReceiptValidationError {
  constructor(value: unknown) {
    super('receipt', value, 'invalid_receipt', `Receipt must be an object, got ${describeValue(value)}`);
    this.name = 'MalformedReceiptError';
  }
}

export class InvalidDateError extends ReceiptValidationError {
  constructor(value: unknown) {
    super('date', value, 'invalid_date', `Invalid date: ${describeValue(value)} (expected YYYY-MM-DD)`);
    this.name = 'InvalidDateError';
  }
}

export class EmptyCategoryError extends ReceiptValidationError {
  constructor(value: unknown) {
    super('category', value, 'empty_category', `Category is required, got ${describeValue(value)}`);
    this.name = 'EmptyCategoryError';
  }
}

export class InvalidAmountError extends ReceiptValidationError {
  constructor(value: unknown) {
    super('amount', value, 'invalid_amount', `Invalid amount: ${describeValue(value)} (expected an integer)`);
    this.name = 'InvalidAmountError';
  }
}

export class LedgerCapacityError extends LedgerError {
  readonly code = 'capacity_exceeded' as const;
  readonly maxRecords: number;

  constructor(maxRecords: number) {
    super(`Ledger is full: at most ${maxRecords} receipts can be stored`);
    this.name = 'LedgerCapacityError';
    this.maxRecords = maxRecords;
  }
}

export class ConfirmationRequiredError extends LedgerError {
  readonly code = 'confirmation_required' as const;

  constructor(operation: string) {
    super(`Confirmation required: set confirm=true to ${operation}`);
    this.name = 'ConfirmationRequiredError';
  }
}

export class ReceiptNotFoundError extends LedgerError {
  constructor(id: number | string) {
    super(`Receipt not found: ${id}`);
    this.name = 'ReceiptNotFoundError';
  }
}

export class InvalidYearMonthError extends LedgerError {
  constructor(value: string) {
    super(`Invalid year-month: "${value}" (expected YYYY-MM)`);
    this.name = 'InvalidYearMonthError';
  }
}

export class MalformedTabularError extends LedgerError {
  constructor(reason: string) {
    super(`Malformed CSV document: ${reason}`);
    this.name = 'MalformedTabularError';
  }
}

/**
 * Errors a bulk insert reports per item instead of throwing
 */
export type RejectionError = ReceiptValidationError | LedgerCapacityError;

function describeValue(value: unknown): string {
  if (value === undefined) return 'nothing';
  if (typeof value === 'string') return `"${value}"`;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
