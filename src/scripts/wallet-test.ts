import { describe, expect, it } from 'vitest';
import {
  STARTING_BALANCE_CATEGORY,
  ValidationError,
  Wallet,
  WalletManager,
} from '../domain/index.js';
import { day, fixedClock, ids } from './fixtures.js';

const clock = fixedClock(day(2024, 3, 13));

function emptyWallet(): Wallet {
  return new Wallet({ name: 'Cash', createdAt: day(2024, 1, 1), clock });
}

describe('Wallet', () => {
  it('keeps balance equal to income minus expense', () => {
    const wallet = emptyWallet();
    wallet.record({ amount: 500, direction: 'income', category: 'Salary' });
    const lunch = wallet.record({ amount: 120, direction: 'expense', category: 'Food' });
    expect(wallet.balance).toBe(380);

    wallet.updateTransaction(lunch.id, { amount: 20 });
    expect(wallet.totalExpense).toBe(20);
    expect(wallet.balance).toBe(480);

    wallet.updateTransaction(lunch.id, { direction: 'income', category: 'Gift' });
    expect(wallet.totalIncome).toBe(520);
    expect(wallet.totalExpense).toBe(0);

    expect(wallet.deleteTransaction(lunch.id)).toBe(true);
    expect(wallet.balance).toBe(500);
    expect(wallet.transactionCount).toBe(1);
  });

  it('dates records by its clock unless told otherwise', () => {
    const wallet = emptyWallet();
    expect(wallet.record({ amount: 1, direction: 'expense', category: 'Food' }).createdAt).toEqual(day(2024, 3, 13));
    expect(
      wallet.record({ amount: 1, direction: 'expense', category: 'Food', createdAt: day(2024, 2, 2) }).createdAt,
    ).toEqual(day(2024, 2, 2));
  });

  it('reports unknown ids without throwing', () => {
    const wallet = emptyWallet();
    expect(wallet.getById('nope')).toBeNull();
    expect(wallet.updateTransaction('nope', { amount: 5 })).toBe(false);
    expect(wallet.deleteTransaction('nope')).toBe(false);
  });

  it('leaves the record alone when an edit is invalid', () => {
    const wallet = emptyWallet();
    const t = wallet.record({ amount: 10, direction: 'expense', category: 'Food' });
    expect(() => wallet.updateTransaction(t.id, { amount: -3 })).toThrow(ValidationError);
    expect(wallet.getById(t.id)?.amount).toBe(10);
    expect(wallet.totalExpense).toBe(10);
  });

  it('resolves 1-based positions against the current sort order', () => {
    const wallet = emptyWallet();
    const jan = wallet.record({ id: 'jan', amount: 900, direction: 'expense', category: 'Bills', createdAt: day(2024, 1, 5) });
    const mar = wallet.record({ id: 'mar', amount: 10, direction: 'expense', category: 'Food', createdAt: day(2024, 3, 5) });

    expect(wallet.getByPosition(1)).toBe(mar);
    expect(wallet.getByPosition(2)).toBe(jan);
    expect(wallet.getByPosition(0)).toBeNull();
    expect(wallet.getByPosition(3)).toBeNull();

    wallet.sortingContext.setStrategy('amount');
    expect(wallet.getByPosition(1)).toBe(jan);
  });

  it('filters the sorted view without touching the ledger', () => {
    const wallet = emptyWallet();
    wallet.record({ id: 'big', amount: 1500, direction: 'income', category: 'Salary', createdAt: day(2024, 3, 1) });
    wallet.record({ id: 'small', amount: 30, direction: 'expense', category: 'Food', createdAt: day(2024, 3, 2) });
    wallet.record({ id: 'old', amount: 60, direction: 'expense', category: 'Food', createdAt: day(2024, 2, 2) });

    wallet.filteringContext.addFilter({ kind: 'amount-preset', preset: 'small' });
    expect(ids(wallet.getFilteredTransactions())).toEqual(['small', 'old']);
    expect(wallet.transactionCount).toBe(3);
    expect(ids(wallet.transactions())).toEqual(['big', 'small', 'old']);
  });

  it('keeps aggregates equal to the summed ledger', () => {
    const wallet = emptyWallet();
    const signedSum = () => wallet.transactions().reduce((sum, t) => sum + t.signedAmount, 0);
    const dime = wallet.record({ amount: 0.1, direction: 'income', category: 'Gift' });
    const fifth = wallet.record({ amount: 0.2, direction: 'income', category: 'Gift' });
    const fee = wallet.record({ amount: 0.3, direction: 'expense', category: 'Bills' });
    expect(wallet.balance).toBeCloseTo(signedSum(), 12);

    wallet.deleteTransaction(dime.id);
    expect(wallet.balance).toBeCloseTo(signedSum(), 12);
    expect(wallet.totalIncome).toBeCloseTo(0.2, 12);

    wallet.deleteTransaction(fifth.id);
    wallet.deleteTransaction(fee.id);
    expect(wallet.balance).toBe(0);
    expect(wallet.totalIncome).toBe(0);
    expect(wallet.totalExpense).toBe(0);
  });

  it('shows the sorted view until a filter narrows it', () => {
    const wallet = emptyWallet();
    wallet.record({ amount: 700, direction: 'income', category: 'Salary', createdAt: day(2024, 3, 1) });
    wallet.record({ amount: 12, direction: 'expense', category: 'Food', createdAt: day(2024, 3, 3) });
    wallet.record({ amount: 90, direction: 'expense', category: 'Food', createdAt: day(2024, 3, 2) });
    wallet.sortingContext.setStrategy('amount');

    const sorted = wallet.getSortedTransactions();
    expect(wallet.getFilteredTransactions()).toEqual(sorted);

    wallet.filteringContext.addFilter({ kind: 'amount-preset', preset: 'small' });
    const narrowed = wallet.getFilteredTransactions();
    expect(narrowed.map((t) => t.amount)).toEqual([90, 12]);
    wallet.filteringContext.addFilter({ kind: 'category', categories: ['Food'], mode: 'include' });
    expect(wallet.getFilteredTransactions().length).toBeLessThanOrEqual(narrowed.length);

    wallet.filteringContext.clearFilters();
    expect(wallet.getFilteredTransactions()).toEqual(sorted);
  });

  it('summarises the filtered period', () => {
    const wallet = emptyWallet();
    wallet.record({ amount: 1000, direction: 'income', category: 'Salary', createdAt: day(2024, 3, 1) });
    wallet.record({ amount: 40, direction: 'expense', category: 'Food', createdAt: day(2024, 3, 2) });
    wallet.record({ amount: 600, direction: 'expense', category: 'Bills', createdAt: day(2024, 2, 2) });
    expect(wallet.getFilteredSummary().transactionCount).toBe(3);

    wallet.filteringContext.addFilter({ kind: 'date-range', from: day(2024, 3, 1), to: null });
    expect(wallet.getFilteredSummary()).toEqual({
      transactionCount: 2,
      totals: { balance: 960, totalIncome: 1000, totalExpense: 40 },
      breakdown: {
        incomeByCategory: [{ category: 'Salary', amount: 1000 }],
        expenseByCategory: [{ category: 'Food', amount: 40 }],
        incomePercentages: [{ category: 'Salary', percent: 100 }],
        expensePercentages: [{ category: 'Food', percent: 100 }],
      },
    });
    expect(wallet.balance).toBe(360);
  });

  it('breaks totals down by category', () => {
    const wallet = emptyWallet();
    wallet.record({ amount: 3000, direction: 'income', category: 'Salary' });
    wallet.record({ amount: 300, direction: 'expense', category: 'Food' });
    wallet.record({ amount: 1000, direction: 'income', category: 'Freelance' });
    wallet.record({ amount: 700, direction: 'expense', category: 'Bills' });
    wallet.record({ amount: 200, direction: 'expense', category: 'Food' });

    expect(wallet.incomeByCategory()).toEqual([
      { category: 'Salary', amount: 3000 },
      { category: 'Freelance', amount: 1000 },
    ]);
    expect(wallet.expenseByCategory()).toEqual([
      { category: 'Bills', amount: 700 },
      { category: 'Food', amount: 500 },
    ]);
    expect(wallet.incomePercentages()).toEqual([
      { category: 'Salary', percent: 75 },
      { category: 'Freelance', percent: 25 },
    ]);
    const [bills, food] = wallet.expensePercentages();
    expect(bills?.percent).toBeCloseTo(58.333, 3);
    expect(food?.percent).toBeCloseTo(41.667, 3);

    expect(wallet.categoryTotals()).toEqual([
      { category: 'Salary', amount: 3000 },
      { category: 'Food', amount: -500 },
      { category: 'Freelance', amount: 1000 },
      { category: 'Bills', amount: -700 },
    ]);
    const shares = wallet.categoryPercentages();
    expect(shares.map((s) => s.category)).toEqual(['Salary', 'Food', 'Freelance', 'Bills']);
    expect(shares.reduce((sum, s) => sum + s.percent, 0)).toBeCloseTo(100, 6);
    expect(shares[0]?.percent).toBeCloseTo((3000 / 5200) * 100, 6);
  });

  it('returns empty percentages for an empty wallet', () => {
    const wallet = emptyWallet();
    expect(wallet.incomePercentages()).toEqual([]);
    expect(wallet.expensePercentages()).toEqual([]);
    expect(wallet.categoryPercentages()).toEqual([]);
  });

  it('rejects a blank name and a negative starting balance', () => {
    expect(() => new Wallet({ name: '  ' })).toThrow(ValidationError);
    expect(() => new Wallet({ name: 'Cash', startingBalance: -1 })).toThrow(ValidationError);
  });
});

describe('WalletManager', () => {
  it('records a starting balance as income dated at creation', () => {
    const manager = new WalletManager({ clock });
    const cash = manager.createWallet({ name: 'Cash', startingBalance: 250, createdAt: day(2024, 1, 1) });
    const [opening] = cash.transactions();
    expect(cash.balance).toBe(250);
    expect(opening?.category).toBe(STARTING_BALANCE_CATEGORY);
    expect(opening?.direction).toBe('income');
    expect(opening?.createdAt).toEqual(day(2024, 1, 1));
  });

  it('records nothing for a zero starting balance', () => {
    const manager = new WalletManager({ clock });
    expect(manager.createWallet({ name: 'Cash', startingBalance: 0 }).transactionCount).toBe(0);
  });

  it('keeps wallet names unique regardless of case', () => {
    const manager = new WalletManager({ clock });
    manager.createWallet({ name: 'Cash' });
    expect(() => manager.createWallet({ name: 'CASH' })).toThrow(ValidationError);
    expect(manager.getWallet(' cash ')?.name).toBe('Cash');
    expect(manager.walletCount).toBe(1);
  });

  it('makes the first wallet current and switches on request', () => {
    const manager = new WalletManager({ clock });
    const cash = manager.createWallet({ name: 'Cash' });
    const bank = manager.createWallet({ name: 'Bank' });
    expect(manager.currentWallet).toBe(cash);
    expect(manager.switchWallet('bank')).toBe(true);
    expect(manager.currentWallet).toBe(bank);
    expect(manager.switchWallet('Nowhere')).toBe(false);
    expect(manager.currentWallet).toBe(bank);
  });

  it('moves the current wallet to the first remaining one on removal', () => {
    const manager = new WalletManager({ clock });
    const cash = manager.createWallet({ name: 'Cash' });
    manager.createWallet({ name: 'Bank' });
    manager.switchWallet('Bank');
    expect(manager.removeWallet('Bank')).toBe(true);
    expect(manager.currentWallet).toBe(cash);
    expect(manager.removeWallet('Cash')).toBe(true);
    expect(manager.currentWallet).toBeNull();
    expect(manager.removeWallet('Cash')).toBe(false);
  });

  it('renames wallets and keeps lookups working', () => {
    const manager = new WalletManager({ clock });
    const cash = manager.createWallet({ name: 'Cash' });
    manager.createWallet({ name: 'Bank' });
    expect(manager.updateWallet('cash', { name: 'Pocket', currency: 'EUR' })).toBe(true);
    expect(manager.getWallet('Cash')).toBeNull();
    expect(manager.getWallet('pocket')).toBe(cash);
    expect(cash.currency).toBe('EUR');
    expect(() => manager.updateWallet('Pocket', { name: 'bank' })).toThrow(ValidationError);
    expect(manager.updateWallet('Missing', { name: 'X' })).toBe(false);
  });

  it('refuses deposit fields on a regular wallet', () => {
    const manager = new WalletManager({ clock });
    expect(() => manager.createWallet({ name: 'Cash', interestRate: 5 })).toThrow(ValidationError);
    manager.createWallet({ name: 'Cash' });
    expect(() => manager.updateWallet('Cash', { termMonths: 6 })).toThrow(ValidationError);
  });

  it('requires rate and term for a deposit', () => {
    const manager = new WalletManager({ clock });
    expect(() => manager.createWallet({ kind: 'deposit', name: 'Savings', termMonths: 12 })).toThrow(ValidationError);
    expect(() => manager.createWallet({ kind: 'deposit', name: 'Savings', interestRate: 5 })).toThrow(ValidationError);
    expect(manager.walletCount).toBe(0);
  });

  it('shares one category registry across wallets', () => {
    const manager = new WalletManager({ clock });
    const cash = manager.createWallet({ name: 'Cash' });
    cash.record({ amount: 40, direction: 'expense', category: 'Pets' });
    expect(manager.categories.categoryExists('Pets', 'expense')).toBe(true);
    expect(manager.createWallet({ name: 'Bank' }).categoryManager).toBe(manager.categories);
  });

  it('orders wallets by the active strategy', () => {
    const manager = new WalletManager({ clock });
    manager.createWallet({ name: 'Cash', startingBalance: 50, createdAt: day(2024, 1, 1) });
    manager.createWallet({ name: 'Bank', startingBalance: 900, createdAt: day(2023, 6, 1) });
    manager.createWallet({ name: 'Savings', startingBalance: 300, createdAt: day(2024, 2, 1) });

    const names = () => manager.getSortedWallets().map((w) => w.name);
    expect(names()).toEqual(['Bank', 'Savings', 'Cash']);
    manager.sortingContext.setStrategy('name');
    expect(names()).toEqual(['Bank', 'Cash', 'Savings']);
    manager.sortingContext.setStrategy('created');
    expect(names()).toEqual(['Savings', 'Cash', 'Bank']);
  });
});
