/**
 * Pure ledger computations over an arbitrary list of transactions.
 * No wallet state and no IO. Used for "period" views
 * of a filtered list, where the wallet's own aggregates do not apply.
 */
import type { Transaction } from './transaction.js';
import type { CategoryBreakdown, CategoryShare, CategoryTotal, Direction, Totals } from './types.js';

/** Keep only one direction */
export function forDirection(txns: readonly Transaction[], direction: Direction): Transaction[] {
  return txns.filter((t) => t.direction === direction);
}

/** Sum of amounts (positive magnitudes) in one direction */
export function directionTotal(txns: readonly Transaction[], direction: Direction): number {
  return forDirection(txns, direction).reduce((sum, t) => sum + t.amount, 0);
}

export function computeTotals(txns: readonly Transaction[]): Totals {
  const totalIncome = directionTotal(txns, 'income');
  const totalExpense = directionTotal(txns, 'expense');
  return { balance: totalIncome - totalExpense, totalIncome, totalExpense };
}

/** Amount per category for one direction, zero totals dropped, largest first */
export function totalsByCategory(txns: readonly Transaction[], direction: Direction): CategoryTotal[] {
  const map = new Map<string, number>();
  for (const t of forDirection(txns, direction)) {
    map.set(t.category, (map.get(t.category) ?? 0) + t.amount);
  }
  return Array.from(map.entries())
    .filter(([, amount]) => amount !== 0)
    .map(([category, amount]) => ({ category, amount }))
    .sort((a, b) => b.amount - a.amount);
}

/**
 * Share of each category against `total`, in percent.
 * Empty when `total` is zero.
 */
export function percentagesOf(totals: readonly CategoryTotal[], total: number): CategoryShare[] {
  if (total <= 0) return [];
  return totals.map(({ category, amount }) => ({ category, percent: (amount / total) * 100 }));
}

/** Income and expense breakdowns, each normalised against its own direction */
export function categoryBreakdown(txns: readonly Transaction[]): CategoryBreakdown {
  const incomeByCategory = totalsByCategory(txns, 'income');
  const expenseByCategory = totalsByCategory(txns, 'expense');
  const { totalIncome, totalExpense } = computeTotals(txns);
  return {
    incomeByCategory,
    expenseByCategory,
    incomePercentages: percentagesOf(incomeByCategory, totalIncome),
    expensePercentages: percentagesOf(expenseByCategory, totalExpense),
  };
}

/** Net signed amount per category, zero nets dropped */
export function signedTotalsByCategory(txns: readonly Transaction[]): CategoryTotal[] {
  const map = new Map<string, number>();
  for (const t of txns) {
    map.set(t.category, (map.get(t.category) ?? 0) + t.signedAmount);
  }
  return Array.from(map.entries())
    .filter(([, amount]) => amount !== 0)
    .map(([category, amount]) => ({ category, amount }));
}

/**
 * Share of each category in the total turnover (income and expense
 * magnitudes together).
 */
export function turnoverPercentages(txns: readonly Transaction[]): CategoryShare[] {
  const turnover = txns.reduce((sum, t) => sum + t.amount, 0);
  if (turnover <= 0) return [];
  const map = new Map<string, number>();
  for (const t of txns) {
    map.set(t.category, (map.get(t.category) ?? 0) + t.amount);
  }
  return Array.from(map.entries()).map(([category, amount]) => ({
    category,
    percent: (amount / turnover) * 100,
  }));
}
