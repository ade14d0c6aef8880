import { describe, expect, it } from 'vitest';
import {
  createTransactionSorting,
  createWalletSorting,
  type SortableWallet,
} from '../domain/index.js';
import { day, ids, makeTxn } from './fixtures.js';

const older = makeTxn({ id: 'older', amount: 20, category: 'bills', createdAt: day(2024, 1, 10) });
const newest = makeTxn({ id: 'newest', amount: 500, category: 'Food', createdAt: day(2024, 3, 1) });
const middle = makeTxn({ id: 'middle', amount: 75, category: 'apple', createdAt: day(2024, 2, 5) });

describe('transaction sorting', () => {
  it('defaults to most recent first', () => {
    const sorting = createTransactionSorting();
    expect(sorting.currentKey).toBe('recent');
    expect(ids(sorting.sort([older, newest, middle]))).toEqual(['newest', 'middle', 'older']);
  });

  it('sorts high to low by amount', () => {
    const sorting = createTransactionSorting();
    expect(sorting.setStrategy('amount')).toBe(true);
    expect(ids(sorting.sort([older, newest, middle]))).toEqual(['newest', 'middle', 'older']);
  });

  it('sorts categories alphabetically, ignoring case', () => {
    const sorting = createTransactionSorting();
    sorting.setStrategy('category');
    // apple < bills < food
    expect(ids(sorting.sort([newest, older, middle]))).toEqual(['middle', 'older', 'newest']);
  });

  it('keeps the input order for ties', () => {
    const sorting = createTransactionSorting();
    sorting.setStrategy('amount');
    const a = makeTxn({ id: 'a', amount: 10 });
    const b = makeTxn({ id: 'b', amount: 10 });
    const c = makeTxn({ id: 'c', amount: 10 });
    expect(ids(sorting.sort([b, c, a]))).toEqual(['b', 'c', 'a']);
  });

  it('does not mutate the input', () => {
    const input = [older, newest, middle];
    createTransactionSorting().sort(input);
    expect(ids(input)).toEqual(['older', 'newest', 'middle']);
  });

  it('ignores unknown keys and keeps the active strategy', () => {
    const sorting = createTransactionSorting();
    sorting.setStrategy('category');
    expect(sorting.setStrategy('by-mood')).toBe(false);
    expect(sorting.currentKey).toBe('category');
    expect(sorting.currentStrategy.name).toBe('Alphabetical by Category');
  });

  it('lists the available strategies', () => {
    expect(createTransactionSorting().availableStrategies()).toEqual([
      { key: 'recent', name: 'Most Recent' },
      { key: 'amount', name: 'High to Low' },
      { key: 'category', name: 'Alphabetical by Category' },
    ]);
  });
});

describe('wallet sorting', () => {
  const cash: SortableWallet & { id: string } = { id: 'cash', name: 'cash', balance: 50, createdAt: day(2024, 1, 1) };
  const bank: SortableWallet & { id: string } = { id: 'bank', name: 'Bank', balance: 900, createdAt: day(2023, 6, 1) };
  const savings: SortableWallet & { id: string } = { id: 'savings', name: 'Savings', balance: 300, createdAt: day(2024, 2, 1) };
  const walletIds = (list: { id: string }[]) => list.map((w) => w.id);

  it('defaults to highest balance first', () => {
    expect(walletIds(createWalletSorting().sort([cash, bank, savings]))).toEqual(['bank', 'savings', 'cash']);
  });

  it('sorts by name and by creation date', () => {
    const sorting = createWalletSorting();
    sorting.setStrategy('name');
    expect(walletIds(sorting.sort([savings, cash, bank]))).toEqual(['bank', 'cash', 'savings']);
    sorting.setStrategy('created');
    expect(walletIds(sorting.sort([bank, cash, savings]))).toEqual(['savings', 'cash', 'bank']);
  });
});
