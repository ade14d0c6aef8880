import { describe, expect, it } from 'vitest';
import {
  CategoryManager,
  Transaction,
  Transfer,
  TRANSFER_CATEGORY,
  ValidationError,
} from '../domain/index.js';
import { day, makeTxn } from './fixtures.js';

describe('Transaction', () => {
  it('derives the sign from the direction', () => {
    expect(makeTxn({ amount: 250, direction: 'expense' }).signedAmount).toBe(-250);
    expect(makeTxn({ amount: 250, direction: 'income' }).signedAmount).toBe(250);
  });

  it('rejects non-positive and non-finite amounts', () => {
    expect(() => makeTxn({ amount: 0 })).toThrow(ValidationError);
    expect(() => makeTxn({ amount: -5 })).toThrow(ValidationError);
    expect(() => makeTxn({ amount: Number.NaN })).toThrow(ValidationError);
  });

  it('rejects an empty category', () => {
    expect(() => makeTxn({ category: '   ' })).toThrow(ValidationError);
  });

  it('keeps the transfer category for transfers', () => {
    expect(() => makeTxn({ category: TRANSFER_CATEGORY })).toThrow(ValidationError);
    expect(() => makeTxn({ category: ' Transfer ' })).toThrow(ValidationError);
    expect(() => makeTxn().revise({ category: TRANSFER_CATEGORY })).toThrow(ValidationError);
  });

  it('assigns distinct ids', () => {
    expect(makeTxn().id).not.toBe(makeTxn().id);
  });

  it('renders a one-line and a detailed form', () => {
    const t = new Transaction({
      id: 't1',
      amount: 12.5,
      direction: 'expense',
      category: 'Food',
      createdAt: new Date(2024, 0, 15, 9, 5, 3),
    });
    expect(t.toString()).toBe('Food - -12.50');
    expect(t.detailedString()).toBe(
      [
        'ID: t1',
        'Type: - (Expense)',
        'Amount: -12.50',
        'Category: Food',
        'Description: N/A',
        'Date: 2024-01-15 09:05:03',
      ].join('\n'),
    );
  });

  it('revises into a new record with the same id', () => {
    const original = makeTxn({ amount: 40, description: 'lunch' });
    const revised = original.revise({ amount: 55 });
    expect(revised).not.toBe(original);
    expect(revised.id).toBe(original.id);
    expect(revised.amount).toBe(55);
    expect(revised.description).toBe('lunch');
    expect(original.amount).toBe(40);
  });

  it('validates a revision like a new record', () => {
    expect(() => makeTxn().revise({ amount: 0 })).toThrow(ValidationError);
  });
});

describe('Transfer', () => {
  const make = (link: { walletId: string; transactionId: string } | null) =>
    new Transfer({
      id: 'out-1',
      amount: 300,
      direction: 'expense',
      description: 'to savings',
      createdAt: day(2024, 3, 1),
      walletId: 'w1',
      link,
    });

  it('always carries the reserved category', () => {
    expect(make(null).category).toBe(TRANSFER_CATEGORY);
  });

  it('refuses to change category or direction', () => {
    const t = make(null);
    expect(() => t.revise({ category: 'Food' })).toThrow(ValidationError);
    expect(() => t.revise({ direction: 'income' })).toThrow(ValidationError);
  });

  it('keeps its link and wallet through a revision', () => {
    const revised = make({ walletId: 'w2', transactionId: 'in-1' }).revise({ amount: 120 });
    expect(revised).toBeInstanceOf(Transfer);
    expect(revised.link).toEqual({ walletId: 'w2', transactionId: 'in-1' });
    expect(revised.walletId).toBe('w1');
    expect(revised.amount).toBe(120);
  });

  it('reports an orphan as null from update', () => {
    const directory = { locateTransfer: () => null };
    expect(make(null).update({ amount: 5 }, directory)).toBeNull();
    expect(make({ walletId: 'w2', transactionId: 'gone' }).update({ amount: 5 }, directory)).toBeNull();
  });

  it('names its partner in the detailed form', () => {
    const lines = make({ walletId: 'w2', transactionId: 'in-1' }).detailedString().split('\n');
    expect(lines[lines.length - 1]).toBe('Linked: in-1 in wallet w2');

    const detached = make(null);
    const detachedLines = detached.detailedString().split('\n');
    expect(detachedLines[detachedLines.length - 1]).toBe('Linked: detached');
  });

  it('clears its link on detach', () => {
    const t = make({ walletId: 'w2', transactionId: 'in-1' });
    expect(t.isLinked).toBe(true);
    t.detach();
    expect(t.isLinked).toBe(false);
    expect(t.link).toBeNull();
  });
});

describe('CategoryManager', () => {
  it('starts from the default categories', () => {
    const categories = new CategoryManager();
    expect(categories.categoryExists('Salary', 'income')).toBe(true);
    expect(categories.categoryExists('Food', 'expense')).toBe(true);
    expect(categories.categoryExists('Food', 'income')).toBe(false);
  });

  it('keeps the two directions apart', () => {
    const categories = new CategoryManager();
    categories.addCategory('Rent', 'expense');
    expect(categories.categoryExists('Rent', 'expense')).toBe(true);
    expect(categories.categoryExists('Rent', 'income')).toBe(false);
  });

  it('adds idempotently', () => {
    const categories = new CategoryManager({ income: [], expense: [] });
    categories.addCategory('Rent', 'expense');
    categories.addCategory('Rent', 'expense');
    expect([...categories.getCategories('expense')]).toEqual(['Rent']);
  });

  it('hands out copies', () => {
    const categories = new CategoryManager();
    const copy = categories.getCategories('income');
    copy.add('Lottery');
    expect(categories.categoryExists('Lottery', 'income')).toBe(false);
  });
});
