/**
 * Aggregation Engine
 *
 * Monthly category summaries, result-set totals and ranked breakdowns.
 * Everything here is derived on demand from a snapshot and never stored.
 */

import { InvalidYearMonthError } from './ledger-errors.js';
import type {
  CategoryShare,
  LedgerSnapshot,
  LedgerTotals,
  MonthTotals,
  MonthlySummary,
  Receipt,
  YearMonth,
} from './ledger-types.js';
import { isYearMonth } from './receipt-model.js';

/**
 * Year-month grouping key of an ISO date
 */
export function yearMonthOf(date: string): YearMonth {
  return date.slice(0, 7);
}

/**
 * Group receipts by (year-month, category), summing amounts
 *
 * Without `yearMonth` every month present in the snapshot gets its own bucket,
 * keyed by each receipt's own date. With it, only that month is grouped.
 *
 * @throws {InvalidYearMonthError} If `yearMonth` is not `YYYY-MM`
 */
export function summarize(snapshot: LedgerSnapshot, yearMonth?: YearMonth): MonthlySummary {
  if (yearMonth !== undefined && !isYearMonth(yearMonth)) {
    throw new InvalidYearMonthError(yearMonth);
  }

  const buckets = new Map<YearMonth, Receipt[]>();

  for (const receipt of snapshot) {
    const key = yearMonthOf(receipt.date);
    if (yearMonth !== undefined && key !== yearMonth) {
      continue;
    }

    const bucket = buckets.get(key);
    if (bucket) {
      bucket.push(receipt);
    } else {
      buckets.set(key, [receipt]);
    }
  }

  const months: Record<YearMonth, MonthTotals> = {};
  for (const key of [...buckets.keys()].sort()) {
    const receipts = buckets.get(key) ?? [];
    const { count, totalAmount, categories } = totalsOf(receipts);
    months[key] = { categories, total: totalAmount, count };
  }

  return { months };
}

/**
 * Per-category sums in order of first occurrence
 */
export function sumByCategory(snapshot: LedgerSnapshot): Map<string, number> {
  const sums = new Map<string, number>();

  for (const receipt of snapshot) {
    sums.set(receipt.category, (sums.get(receipt.category) ?? 0) + receipt.amount);
  }

  return sums;
}

/**
 * Count, grand total and per-category totals of a result set
 */
export function totalsOf(snapshot: LedgerSnapshot): LedgerTotals {
  const totalAmount = snapshot.reduce((sum, receipt) => sum + receipt.amount, 0);

  // fromEntries defines own properties, so names like __proto__ survive
  const categories: Record<string, number> = Object.fromEntries(sumByCategory(snapshot));

  return { count: snapshot.length, totalAmount, categories };
}

/**
 * Rank category sums by amount, largest first, with their share of `total`
 * as a percentage rounded to two decimals. Ties keep the input order.
 */
export function rankCategories(
  sums: Iterable<readonly [string, number]>,
  total: number
): CategoryShare[] {
  return Array.from(sums, ([category, amount]) => ({
    category,
    amount,
    percentage: total === 0 ? 0 : roundTo(2, (amount / total) * 100),
  })).sort((a, b) => b.amount - a.amount);
}

function roundTo(decimals: number, value: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
