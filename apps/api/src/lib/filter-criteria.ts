import type { FilterCriteria } from '@kakeibo/core';
import type { ReceiptFilterQuery } from '@kakeibo/types';

/**
 * Map validated snake_case query parameters onto ledger filter criteria
 */
export function toFilterCriteria(query: ReceiptFilterQuery): FilterCriteria {
  return {
    dateFrom: query.date_from,
    dateTo: query.date_to,
    category: query.category,
  };
}
