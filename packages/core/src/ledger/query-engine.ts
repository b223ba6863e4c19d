/**
 * Query Engine
 *
 * Filters a snapshot by inclusive date range and exact category.
 * ISO dates order lexicographically, so bounds compare as strings.
 */

import type { FilterCriteria, LedgerSnapshot, Receipt } from './ledger-types.js';

/**
 * Filter receipts, keeping snapshot order
 *
 * - `dateFrom`/`dateTo` are inclusive; an absent bound is unbounded
 * - `category` must match exactly (case-sensitive); blank means no filter
 * - predicates combine with AND
 * - an inverted range (`dateFrom > dateTo`) matches nothing
 */
export function filterReceipts(
  snapshot: LedgerSnapshot,
  criteria: FilterCriteria = {}
): LedgerSnapshot {
  const predicate = buildPredicate(criteria);
  return snapshot.filter(predicate);
}

function buildPredicate(criteria: FilterCriteria): (receipt: Receipt) => boolean {
  const { dateFrom, dateTo } = criteria;
  const category = criteria.category?.trim() || undefined;

  return (receipt) => {
    if (dateFrom !== undefined && receipt.date < dateFrom) return false;
    if (dateTo !== undefined && receipt.date > dateTo) return false;
    if (category !== undefined && receipt.category !== category) return false;
    return true;
  };
}
