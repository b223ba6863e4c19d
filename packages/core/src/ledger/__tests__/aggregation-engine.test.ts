/**
 * Aggregation Engine Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  rankCategories,
  sumByCategory,
  summarize,
  totalsOf,
  yearMonthOf,
} from '../aggregation-engine.js';
import { InvalidYearMonthError } from '../ledger-errors.js';
import type { Receipt } from '../ledger-types.js';

function receipt(id: number, date: string, category: string, amount: number): Receipt {
  return { id, date, category, description: '', amount };
}

describe('summarize', () => {
  const snapshot = [
    receipt(1, '2023-01-03', 'food', 100),
    receipt(2, '2023-01-28', 'food', 200),
    receipt(3, '2023-02-01', 'food', 50),
  ];

  it('should group by month and category with a total per month', () => {
    expect(summarize(snapshot)).toEqual({
      months: {
        '2023-01': { categories: { food: 300 }, total: 300, count: 2 },
        '2023-02': { categories: { food: 50 }, total: 50, count: 1 },
      },
    });
  });

  it('should restrict to a single month when one is given', () => {
    expect(summarize(snapshot, '2023-02')).toEqual({
      months: {
        '2023-02': { categories: { food: 50 }, total: 50, count: 1 },
      },
    });
  });

  it('should return an empty summary when nothing matches', () => {
    expect(summarize([])).toEqual({ months: {} });
    expect(summarize(snapshot, '2024-01')).toEqual({ months: {} });
  });

  it('should order months ascending regardless of insertion order', () => {
    const result = summarize([
      receipt(1, '2023-03-01', 'rent', 10),
      receipt(2, '2022-12-31', 'rent', 20),
      receipt(3, '2023-01-01', 'rent', 30),
    ]);

    expect(Object.keys(result.months)).toEqual(['2022-12', '2023-01', '2023-03']);
  });

  it('should keep a category named "total" apart from the month total', () => {
    const result = summarize([
      receipt(1, '2023-01-01', 'total', 10),
      receipt(2, '2023-01-02', 'food', 5),
    ]);

    expect(result.months['2023-01']).toEqual({
      categories: { total: 10, food: 5 },
      total: 15,
      count: 2,
    });
  });

  it('should sum categories named like built-in object members', () => {
    const result = summarize([
      receipt(1, '2023-01-01', 'constructor', 100),
      receipt(2, '2023-01-02', 'constructor', 50),
      receipt(3, '2023-01-03', 'valueOf', 7),
    ]);

    expect(Object.entries(result.months['2023-01']?.categories ?? {})).toEqual([
      ['constructor', 150],
      ['valueOf', 7],
    ]);
    expect(result.months['2023-01']?.total).toBe(157);
  });

  it('should keep a __proto__ category as its own entry', () => {
    const result = summarize([
      receipt(1, '2023-01-01', '__proto__', 100),
      receipt(2, '2023-01-02', 'food', 100),
    ]);

    const categories = result.months['2023-01']?.categories ?? {};
    expect(Object.entries(categories)).toEqual([
      ['__proto__', 100],
      ['food', 100],
    ]);
    expect(Object.getPrototypeOf(categories)).toBe(Object.prototype);
  });

  it('should sum negative amounts', () => {
    const result = summarize([
      receipt(1, '2023-01-01', 'food', 1000),
      receipt(2, '2023-01-02', 'food', -300),
    ]);

    expect(result.months['2023-01']?.categories.food).toBe(700);
  });

  it('should reject a malformed year-month', () => {
    expect(() => summarize(snapshot, '2023-1')).toThrow(InvalidYearMonthError);
  });
});

describe('totalsOf', () => {
  it('should count, sum and group by category', () => {
    const totals = totalsOf([
      receipt(1, '2023-01-01', 'food', 100),
      receipt(2, '2023-02-01', 'rent', 5000),
      receipt(3, '2023-03-01', 'food', 250),
    ]);

    expect(totals).toEqual({
      count: 3,
      totalAmount: 5350,
      categories: { food: 350, rent: 5000 },
    });
  });

  it('should sum a category named toString as a number', () => {
    const totals = totalsOf([
      receipt(1, '2023-01-01', 'toString', 100),
      receipt(2, '2023-01-02', 'toString', 20),
    ]);

    expect(Object.entries(totals.categories)).toEqual([['toString', 120]]);
  });

  it('should handle an empty result set', () => {
    expect(totalsOf([])).toEqual({ count: 0, totalAmount: 0, categories: {} });
  });
});

describe('rankCategories', () => {
  it('should sort by amount and compute rounded percentages', () => {
    const shares = rankCategories(
      [
        ['transport', 1200],
        ['food', 8300],
      ],
      9500
    );

    expect(shares).toEqual([
      { category: 'food', amount: 8300, percentage: 87.37 },
      { category: 'transport', amount: 1200, percentage: 12.63 },
    ]);
  });

  it('should report zero percent when the month total is zero', () => {
    const shares = rankCategories(
      [
        ['refund', -100],
        ['food', 100],
      ],
      0
    );

    expect(shares).toEqual([
      { category: 'food', amount: 100, percentage: 0 },
      { category: 'refund', amount: -100, percentage: 0 },
    ]);
  });
});

describe('rankCategories tie order', () => {
  it('should keep first-occurrence order for equal amounts', () => {
    const sums = sumByCategory([
      receipt(1, '2023-01-01', 'food', 100),
      receipt(2, '2023-01-02', '2024', 100),
      receipt(3, '2023-01-03', '__proto__', 100),
    ]);

    expect(rankCategories(sums, 300)).toEqual([
      { category: 'food', amount: 100, percentage: 33.33 },
      { category: '2024', amount: 100, percentage: 33.33 },
      { category: '__proto__', amount: 100, percentage: 33.33 },
    ]);
  });
});

describe('sumByCategory', () => {
  it('should keep first-occurrence order, numeric-looking names included', () => {
    const sums = sumByCategory([
      receipt(1, '2023-01-01', 'food', 100),
      receipt(2, '2023-01-02', '2024', 40),
      receipt(3, '2023-01-03', 'food', 5),
    ]);

    expect([...sums]).toEqual([
      ['food', 105],
      ['2024', 40],
    ]);
  });
});

describe('yearMonthOf', () => {
  it('should take the month from an ISO date', () => {
    expect(yearMonthOf('2023-04-30')).toBe('2023-04');
  });
});
