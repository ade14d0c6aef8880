import { describe, expect, it } from 'vitest';
import {
  InvariantViolation,
  isDepositWallet,
  isTransfer,
  WalletManager,
} from '../../src/domain/index.js';
import { LedgerStore, openDatabase } from '../src/db.js';

const now = new Date(2024, 2, 13, 12);
const clock = () => new Date(now.getTime());

function sampleLedger(): WalletManager {
  const manager = new WalletManager({ clock });
  const cash = manager.createWallet({ name: 'Cash', startingBalance: 1000, createdAt: new Date(2024, 0, 1) });
  manager.createWallet({
    kind: 'deposit',
    name: 'Savings',
    currency: 'EUR',
    description: 'rainy day',
    interestRate: 4.5,
    termMonths: 6,
    capitalization: false,
    createdAt: new Date(2024, 1, 1),
  });
  cash.record({ amount: 42.5, direction: 'expense', category: 'Pets', description: 'vet', createdAt: new Date(2024, 2, 2) });
  manager.transfer('Cash', 'Savings', 300, 'monthly', new Date(2024, 2, 5));
  cash.sortingContext.setStrategy('amount');
  manager.sortingContext.setStrategy('name');
  manager.switchWallet('Savings');
  return manager;
}

describe('LedgerStore', () => {
  it('round-trips wallets, transactions, links and settings', () => {
    const db = openDatabase(':memory:');
    const original = sampleLedger();
    new LedgerStore(db).save(original);

    const loaded = new LedgerStore(db).load(clock);
    expect(loaded.getWallets().map((w) => w.name)).toEqual(['Cash', 'Savings']);
    expect(loaded.currentWallet?.name).toBe('Savings');
    expect(loaded.sortingContext.currentKey).toBe('name');

    const cash = loaded.getWallet('Cash');
    const savings = loaded.getWallet('Savings');
    if (!cash || !savings || !isDepositWallet(savings)) throw new Error('wallets missing after load');

    expect(cash.balance).toBe(657.5);
    expect(cash.sortingContext.currentKey).toBe('amount');
    expect(cash.transactions().map((t) => t.category)).toEqual(['Starting Balance', 'Pets', 'Transfer']);
    expect(cash.transactions()[1]?.description).toBe('vet');
    expect(cash.transactions()[1]?.createdAt).toEqual(new Date(2024, 2, 2));

    expect(savings.currency).toBe('EUR');
    expect(savings.description).toBe('rainy day');
    expect(savings.interestRate).toBe(4.5);
    expect(savings.termMonths).toBe(6);
    expect(savings.capitalization).toBe(false);
    expect(savings.maturityDate).toEqual(new Date(2024, 7, 1));
    expect(savings.balance).toBe(300);

    const out = cash.transactions().find(isTransfer);
    const into = savings.transactions().find(isTransfer);
    expect(out?.link).toEqual({ walletId: savings.id, transactionId: into?.id });
    expect(into?.link).toEqual({ walletId: cash.id, transactionId: out?.id });
    expect(loaded.categories.categoryExists('Pets', 'expense')).toBe(true);
  });

  it('keeps transfers working after a reload', () => {
    const db = openDatabase(':memory:');
    new LedgerStore(db).save(sampleLedger());
    const loaded = new LedgerStore(db).load(clock);
    const savings = loaded.getWallet('Savings');
    const into = savings?.transactions().find(isTransfer);
    if (!savings || !into) throw new Error('transfer missing after load');

    savings.deleteTransaction(into.id);
    expect(loaded.getWallet('Cash')?.balance).toBe(957.5);
  });

  it('saves over a previous save', () => {
    const db = openDatabase(':memory:');
    const store = new LedgerStore(db);
    const manager = sampleLedger();
    store.save(manager);
    manager.removeWallet('Savings');
    store.save(manager);

    const loaded = store.load(clock);
    expect(loaded.walletCount).toBe(1);
    expect(loaded.getWallet('Cash')?.transactionCount).toBe(2);
    expect(loaded.currentWallet?.name).toBe('Cash');
  });

  it('loads an empty database as an empty ledger', () => {
    const loaded = new LedgerStore(openDatabase(':memory:')).load(clock);
    expect(loaded.walletCount).toBe(0);
    expect(loaded.currentWallet).toBeNull();
    expect(loaded.sortingContext.currentKey).toBe('balance');
  });

  it('refuses a transfer whose partner is missing', () => {
    const db = openDatabase(':memory:');
    new LedgerStore(db).save(sampleLedger());
    db.prepare("DELETE FROM transactions WHERE kind = 'transfer' AND direction = 'income'").run();

    expect(() => new LedgerStore(db).load(clock)).toThrow(InvariantViolation);
  });

  it('refuses a transfer whose partner points elsewhere', () => {
    const db = openDatabase(':memory:');
    new LedgerStore(db).save(sampleLedger());
    db.prepare("UPDATE transactions SET linked_transaction_id = 'someone-else' WHERE kind = 'transfer' AND direction = 'income'").run();

    expect(() => new LedgerStore(db).load(clock)).toThrow(InvariantViolation);
  });
});
