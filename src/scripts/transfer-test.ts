import { describe, expect, it } from 'vitest';
import {
  InvariantViolation,
  isTransfer,
  Transfer,
  TRANSFER_CATEGORY,
  ValidationError,
  WalletManager,
  type Wallet,
} from '../domain/index.js';
import { day, fixedClock } from './fixtures.js';

function setup() {
  const manager = new WalletManager({ clock: fixedClock(day(2024, 3, 13)) });
  const cash = manager.createWallet({ name: 'Cash', startingBalance: 1000, createdAt: day(2024, 1, 1) });
  const bank = manager.createWallet({ name: 'Bank', startingBalance: 200, createdAt: day(2024, 1, 1) });
  return { manager, cash, bank };
}

function transferOf(wallet: Wallet): Transfer {
  const found = wallet.transactions().find(isTransfer);
  if (!found) throw new Error(`no transfer in ${wallet.name}`);
  return found;
}

describe('WalletManager.transfer', () => {
  it('records a linked expense and income pair', () => {
    const { manager, cash, bank } = setup();
    expect(manager.transfer('cash', 'BANK', 300, 'to savings')).toBe(true);

    expect(cash.balance).toBe(700);
    expect(bank.balance).toBe(500);

    const out = transferOf(cash);
    const into = transferOf(bank);
    expect(out.direction).toBe('expense');
    expect(into.direction).toBe('income');
    expect(out.category).toBe(TRANSFER_CATEGORY);
    expect(out.description).toBe('to savings');
    expect(out.createdAt).toEqual(day(2024, 3, 13));
    expect(out.link).toEqual({ walletId: bank.id, transactionId: into.id });
    expect(into.link).toEqual({ walletId: cash.id, transactionId: out.id });
  });

  it('uses the given date', () => {
    const { manager, cash } = setup();
    manager.transfer('Cash', 'Bank', 10, '', day(2024, 2, 29));
    expect(transferOf(cash).createdAt).toEqual(day(2024, 2, 29));
  });

  it('refuses unknown or identical wallets and bad amounts', () => {
    const { manager, cash, bank } = setup();
    expect(manager.transfer('Cash', 'Nowhere', 10)).toBe(false);
    expect(manager.transfer('Nowhere', 'Cash', 10)).toBe(false);
    expect(manager.transfer('Cash', 'cash', 10)).toBe(false);
    expect(manager.transfer('Cash', 'Bank', 0)).toBe(false);
    expect(manager.transfer('Cash', 'Bank', -5)).toBe(false);
    expect(cash.transactionCount).toBe(1);
    expect(bank.transactionCount).toBe(1);
  });

  it('allows overdrawing the source', () => {
    const { manager, cash } = setup();
    expect(manager.transfer('Cash', 'Bank', 1500)).toBe(true);
    expect(cash.balance).toBe(-500);
  });

  it('locates either side from the other', () => {
    const { manager, cash, bank } = setup();
    manager.transfer('Cash', 'Bank', 300);
    const out = transferOf(cash);
    const located = out.link ? manager.locateTransfer(out.link) : null;
    expect(located?.wallet).toBe(bank);
    expect(located?.transfer).toBe(transferOf(bank));
    expect(manager.locateTransfer({ walletId: bank.id, transactionId: 'missing' })).toBeNull();
    expect(manager.locateTransfer({ walletId: 'missing', transactionId: out.id })).toBeNull();
  });
});

describe('editing a transfer', () => {
  it('changes both sides together', () => {
    const { manager, cash, bank } = setup();
    manager.transfer('Cash', 'Bank', 300);

    expect(cash.updateTransaction(transferOf(cash).id, { amount: 120, description: 'adjusted' })).toBe(true);
    expect(cash.totalExpense).toBe(120);
    expect(cash.balance).toBe(880);
    expect(bank.totalIncome).toBe(320);
    expect(bank.balance).toBe(320);
    expect(transferOf(bank).description).toBe('adjusted');
    expect(transferOf(bank).amount).toBe(120);
  });

  it('works from the receiving side', () => {
    const { manager, cash, bank } = setup();
    manager.transfer('Cash', 'Bank', 300);
    bank.updateTransaction(transferOf(bank).id, { createdAt: day(2024, 3, 1) });
    expect(transferOf(cash).createdAt).toEqual(day(2024, 3, 1));
    expect(transferOf(cash).link).toEqual({ walletId: bank.id, transactionId: transferOf(bank).id });
  });

  it('refuses category and direction changes on either side', () => {
    const { manager, cash, bank } = setup();
    manager.transfer('Cash', 'Bank', 300);
    const out = transferOf(cash);
    expect(() => cash.updateTransaction(out.id, { category: 'Food', amount: 10 })).toThrow(ValidationError);
    expect(() => cash.updateTransaction(out.id, { direction: 'income' })).toThrow(ValidationError);
    expect(cash.balance).toBe(700);
    expect(bank.balance).toBe(500);
  });

  it('validates both sides before changing either', () => {
    const { manager, cash, bank } = setup();
    manager.transfer('Cash', 'Bank', 300);
    expect(() => cash.updateTransaction(transferOf(cash).id, { amount: 0 })).toThrow(ValidationError);
    expect(transferOf(bank).amount).toBe(300);
  });

  it('reports a missing partner as an invariant violation', () => {
    const { cash } = setup();
    const dangling = new Transfer({
      amount: 50,
      direction: 'expense',
      walletId: cash.id,
      link: { walletId: cash.id, transactionId: 'gone' },
    });
    cash.addTransaction(dangling);
    expect(() => cash.updateTransaction(dangling.id, { amount: 60 })).toThrow(InvariantViolation);
    expect(() => cash.deleteTransaction(dangling.id)).toThrow(InvariantViolation);
  });
});

describe('deleting a transfer', () => {
  it('removes the partner and restores both balances', () => {
    const { manager, cash, bank } = setup();
    manager.transfer('Cash', 'Bank', 300);
    const into = transferOf(bank);

    expect(bank.deleteTransaction(into.id)).toBe(true);
    expect(cash.balance).toBe(1000);
    expect(bank.balance).toBe(200);
    expect(cash.transactionCount).toBe(1);
    expect(bank.transactionCount).toBe(1);
    expect(into.isLinked).toBe(false);
  });

  it('goes with a removed wallet', () => {
    const { manager, cash } = setup();
    manager.transfer('Cash', 'Bank', 300);
    manager.transfer('Bank', 'Cash', 50);
    expect(manager.removeWallet('Bank')).toBe(true);
    expect(cash.balance).toBe(1000);
    expect(cash.transactions().some(isTransfer)).toBe(false);
  });

  it('counts transfers in category breakdowns', () => {
    const { manager, cash } = setup();
    manager.transfer('Cash', 'Bank', 300);
    expect(cash.expenseByCategory()).toEqual([{ category: TRANSFER_CATEGORY, amount: 300 }]);
  });
});
