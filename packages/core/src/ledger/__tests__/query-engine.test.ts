/**
 * Query Engine Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { filterReceipts } from '../query-engine.js';
import type { Receipt } from '../ledger-types.js';

const receipts: Receipt[] = [
  { id: 1, date: '2023-01-15', category: '食費', description: 'スーパーマーケット', amount: 3500 },
  { id: 2, date: '2023-01-20', category: '交通費', description: '電車', amount: 1200 },
  { id: 3, date: '2023-02-05', category: '日用品', description: 'ドラッグストア', amount: 2600 },
  { id: 4, date: '2023-02-15', category: '食費', description: 'コンビニ', amount: 800 },
  { id: 5, date: '2023-03-01', category: 'Food', description: 'market', amount: 500 },
];

const ids = (list: readonly Receipt[]) => list.map((receipt) => receipt.id);

describe('filterReceipts', () => {
  it('should return the full snapshot in order with no predicates', () => {
    expect(ids(filterReceipts(receipts))).toEqual([1, 2, 3, 4, 5]);
    expect(ids(filterReceipts(receipts, {}))).toEqual([1, 2, 3, 4, 5]);
  });

  it('should treat date bounds as inclusive', () => {
    const result = filterReceipts(receipts, { dateFrom: '2023-01-20', dateTo: '2023-02-15' });

    expect(ids(result)).toEqual([2, 3, 4]);
  });

  it('should treat a missing bound as unbounded', () => {
    expect(ids(filterReceipts(receipts, { dateFrom: '2023-02-05' }))).toEqual([3, 4, 5]);
    expect(ids(filterReceipts(receipts, { dateTo: '2023-01-20' }))).toEqual([1, 2]);
  });

  it('should return nothing for an inverted range', () => {
    expect(filterReceipts(receipts, { dateFrom: '2023-02-01', dateTo: '2023-01-01' })).toEqual([]);
  });

  it('should match category exactly and case-sensitively', () => {
    expect(ids(filterReceipts(receipts, { category: '食費' }))).toEqual([1, 4]);
    expect(ids(filterReceipts(receipts, { category: 'food' }))).toEqual([]);
    expect(ids(filterReceipts(receipts, { category: 'Foo' }))).toEqual([]);
  });

  it('should trim the category argument and ignore a blank one', () => {
    expect(ids(filterReceipts(receipts, { category: ' 食費 ' }))).toEqual([1, 4]);
    expect(ids(filterReceipts(receipts, { category: '  ' }))).toEqual([1, 2, 3, 4, 5]);
  });

  it('should combine predicates with AND', () => {
    const result = filterReceipts(receipts, {
      dateFrom: '2023-02-01',
      dateTo: '2023-02-28',
      category: '食費',
    });

    expect(ids(result)).toEqual([4]);
  });

  it('should not mutate the snapshot', () => {
    const snapshot = [...receipts];
    filterReceipts(snapshot, { category: '食費' });

    expect(snapshot).toEqual(receipts);
  });
});
