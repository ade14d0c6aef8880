/**
 * Ledger computation tests.
 */
import { describe, expect, it } from 'vitest';
import {
  categoryBreakdown,
  computeTotals,
  directionTotal,
  forDirection,
  percentagesOf,
  signedTotalsByCategory,
  totalsByCategory,
  turnoverPercentages,
} from '../domain/computations.js';
import { makeTransfer, makeTxn, day, ids } from './fixtures.js';

describe('computeTotals', () => {
  it('returns zeros for no transactions', () => {
    expect(computeTotals([])).toEqual({ balance: 0, totalIncome: 0, totalExpense: 0 });
  });

  it('sums each direction by magnitude', () => {
    const txns = [
      makeTxn({ amount: 10000, direction: 'income', category: 'Salary' }),
      makeTxn({ id: '2', amount: 3000 }),
      makeTxn({ id: '3', amount: 2500 }),
    ];
    // 10000 - 3000 - 2500 = 4500
    expect(computeTotals(txns)).toEqual({ balance: 4500, totalIncome: 10000, totalExpense: 5500 });
  });

  it('can go negative (overspent)', () => {
    expect(computeTotals([makeTxn({ amount: 200 })]).balance).toBe(-200);
  });

  it('counts transfers like any other record', () => {
    const txns = [makeTransfer('income', 80, day(2024, 3, 1)), makeTxn({ amount: 30 })];
    expect(directionTotal(txns, 'income')).toBe(80);
  });
});

describe('forDirection', () => {
  it('keeps one direction in input order', () => {
    const txns = [
      makeTxn({ id: '1' }),
      makeTxn({ id: '2', direction: 'income', category: 'Gift' }),
      makeTxn({ id: '3' }),
    ];
    expect(ids(forDirection(txns, 'expense'))).toEqual(['1', '3']);
  });
});

describe('totalsByCategory', () => {
  it('groups and sorts by amount', () => {
    const txns = [
      makeTxn({ amount: 5000, category: 'Food' }),
      makeTxn({ id: '2', amount: 3000, category: 'Food' }),
      makeTxn({ id: '3', amount: 10000, category: 'Transport' }),
      makeTxn({ id: '4', amount: 2000, category: 'Shopping' }),
      makeTxn({ id: '5', amount: 9000, direction: 'income', category: 'Salary' }), // other direction
    ];
    expect(totalsByCategory(txns, 'expense')).toEqual([
      { category: 'Transport', amount: 10000 },
      { category: 'Food', amount: 8000 },
      { category: 'Shopping', amount: 2000 },
    ]);
  });
});

describe('percentagesOf', () => {
  it('is empty against a zero total', () => {
    expect(percentagesOf([{ category: 'Food', amount: 10 }], 0)).toEqual([]);
  });

  it('divides each total by the given total', () => {
    expect(percentagesOf([{ category: 'Food', amount: 30 }, { category: 'Bills', amount: 10 }], 40)).toEqual([
      { category: 'Food', percent: 75 },
      { category: 'Bills', percent: 25 },
    ]);
  });
});

describe('categoryBreakdown', () => {
  it('normalises each direction against itself', () => {
    const txns = [
      makeTxn({ amount: 1000, direction: 'income', category: 'Salary' }),
      makeTxn({ id: '2', amount: 600, category: 'Bills' }),
      makeTxn({ id: '3', amount: 400, category: 'Food' }),
    ];
    const bd = categoryBreakdown(txns);
    expect(bd.incomePercentages).toEqual([{ category: 'Salary', percent: 100 }]);
    // 600 / 1000 and 400 / 1000
    const [bills, food] = bd.expensePercentages;
    expect(bills?.category).toBe('Bills');
    expect(bills?.percent).toBeCloseTo(60, 9);
    expect(food?.category).toBe('Food');
    expect(food?.percent).toBeCloseTo(40, 9);
  });
});

describe('signedTotalsByCategory', () => {
  it('nets income against expense and drops zero nets', () => {
    const txns = [
      makeTxn({ amount: 50, direction: 'income', category: 'Other' }),
      makeTxn({ id: '2', amount: 50, direction: 'expense', category: 'Other' }),
      makeTxn({ id: '3', amount: 20, category: 'Food' }),
    ];
    expect(signedTotalsByCategory(txns)).toEqual([{ category: 'Food', amount: -20 }]);
  });
});

describe('turnoverPercentages', () => {
  it('shares every category in all money moved', () => {
    const txns = [
      makeTxn({ amount: 300, direction: 'income', category: 'Salary' }),
      makeTxn({ id: '2', amount: 100, category: 'Food' }),
    ];
    // 300 / 400 and 100 / 400
    expect(turnoverPercentages(txns)).toEqual([
      { category: 'Salary', percent: 75 },
      { category: 'Food', percent: 25 },
    ]);
  });

  it('is empty for no transactions', () => {
    expect(turnoverPercentages([])).toEqual([]);
  });
});
