/**
 * Test data factories shared by the domain tests.
 */
import { Transaction, Transfer, type Clock, type TransactionInit } from '../domain/index.js';

/** Local-time date; month is 1-based to keep test data readable */
export function day(year: number, month: number, date: number, hours = 12, minutes = 0): Date {
  return new Date(year, month - 1, date, hours, minutes);
}

export function fixedClock(at: Date): Clock {
  return () => new Date(at.getTime());
}

/** A clock the test can move */
export function movableClock(start: Date): { clock: Clock; set(at: Date): void } {
  let now = start;
  return {
    clock: () => new Date(now.getTime()),
    set(at: Date) {
      now = at;
    },
  };
}

export function makeTxn(overrides: Partial<TransactionInit> = {}): Transaction {
  return new Transaction({
    amount: 1000,
    direction: 'expense',
    category: 'Food',
    description: 'test',
    createdAt: day(2024, 1, 15),
    ...overrides,
  });
}

export function makeTransfer(
  direction: 'income' | 'expense',
  amount: number,
  createdAt: Date,
  description = '',
): Transfer {
  return new Transfer({ amount, direction, description, createdAt, walletId: 'w-test', link: null });
}

export function ids(transactions: readonly Transaction[]): string[] {
  return transactions.map((t) => t.id);
}
