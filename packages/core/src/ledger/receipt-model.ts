/**
 * Receipt Model
 *
 * Validation and normalization of raw receipt fields.
 * Pure functions: no store access, no side effects.
 */

import {
  EmptyCategoryError,
  InvalidAmountError,
  InvalidDateError,
  MalformedReceiptError,
} from './ledger-errors.js';
import type { NormalizedReceipt, RawReceiptFields } from './ledger-types.js';

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const YEAR_MONTH_PATTERN = /^\d{4}-(0[1-9]|1[0-2])$/;
const INTEGER_TEXT_PATTERN = /^[+-]?\d+$/;

/**
 * Check that text is a real calendar date in `YYYY-MM-DD` form.
 * Rejects impossible dates such as 2023-02-30.
 */
export function isIsoDate(text: string): boolean {
  const match = ISO_DATE_PATTERN.exec(text);
  if (!match) {
    return false;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  if (month < 1 || month > 12 || day < 1) {
    return false;
  }

  return day <= daysInMonth(year, month);
}

/**
 * Check that text is a calendar month in `YYYY-MM` form
 */
export function isYearMonth(text: string): boolean {
  return YEAR_MONTH_PATTERN.test(text);
}

/**
 * Parse an amount given as a number or as numeral-only text.
 * Returns null when the value is not a safe integer.
 */
export function parseAmount(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? value : null;
  }

  if (typeof value === 'string' && INTEGER_TEXT_PATTERN.test(value)) {
    const parsed = Number(value);
    // -0 from "-0" normalizes to 0
    return Number.isSafeInteger(parsed) ? parsed + 0 : null;
  }

  return null;
}

/**
 * Validate raw fields and normalize them into receipt form
 *
 * Rules:
 * - the item must be a plain object of fields
 * - date must be a valid `YYYY-MM-DD` calendar date
 * - category must be non-empty after trimming
 * - amount must be an integer, as a number or as text with an optional leading sign
 *
 * @throws {MalformedReceiptError} If the item is not an object of fields
 * @throws {InvalidDateError} If the date is missing or not a calendar date
 * @throws {EmptyCategoryError} If the category is missing or blank
 * @throws {InvalidAmountError} If the amount is not an integer
 */
export function validateAndNormalize(raw: unknown): NormalizedReceipt {
  if (!isRawReceiptFields(raw)) {
    throw new MalformedReceiptError(raw);
  }

  const { date, category, description, amount } = raw;

  if (typeof date !== 'string' || !isIsoDate(date)) {
    throw new InvalidDateError(date);
  }

  const trimmedCategory = typeof category === 'string' ? category.trim() : '';
  if (!trimmedCategory) {
    throw new EmptyCategoryError(category);
  }

  const parsedAmount = parseAmount(amount);
  if (parsedAmount === null) {
    throw new InvalidAmountError(amount);
  }

  return {
    date,
    category: trimmedCategory,
    description: normalizeDescription(description),
    amount: parsedAmount,
  };
}

function isRawReceiptFields(value: unknown): value is RawReceiptFields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizeDescription(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const;

function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) {
    return 29;
  }
  return DAYS_IN_MONTH[month - 1] ?? 0;
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}
