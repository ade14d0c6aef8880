/**
 * Sorting strategies for transactions and wallets.
 * Each strategy is a comparator; Array.prototype.sort is stable, so ties keep
 * the order the collection was handed in.
 */
import type { Transaction } from './transaction.js';

export interface SortingStrategy<K extends string, T> {
  readonly key: K;
  readonly name: string;
  compare(a: T, b: T): number;
}

export interface StrategyOption<K extends string> {
  key: K;
  name: string;
}

export type TransactionSortKey = 'recent' | 'amount' | 'category';

export const TRANSACTION_SORTS: Readonly<Record<TransactionSortKey, SortingStrategy<TransactionSortKey, Transaction>>> = {
  recent: {
    key: 'recent',
    name: 'Most Recent',
    compare: (a, b) => b.createdAt.getTime() - a.createdAt.getTime(),
  },
  amount: {
    key: 'amount',
    name: 'High to Low',
    compare: (a, b) => Math.abs(b.amount) - Math.abs(a.amount),
  },
  category: {
    key: 'category',
    name: 'Alphabetical by Category',
    compare: (a, b) => compareText(a.category.toLowerCase(), b.category.toLowerCase()),
  },
};

/** What wallet ordering needs to know about a wallet */
export interface SortableWallet {
  readonly name: string;
  readonly balance: number;
  readonly createdAt: Date;
}

export type WalletSortKey = 'balance' | 'name' | 'created';

export const WALLET_SORTS: Readonly<Record<WalletSortKey, SortingStrategy<WalletSortKey, SortableWallet>>> = {
  balance: {
    key: 'balance',
    name: 'Highest Balance',
    compare: (a, b) => b.balance - a.balance,
  },
  name: {
    key: 'name',
    name: 'Alphabetical',
    compare: (a, b) => compareText(a.name.toLowerCase(), b.name.toLowerCase()),
  },
  created: {
    key: 'created',
    name: 'Newest First',
    compare: (a, b) => b.createdAt.getTime() - a.createdAt.getTime(),
  },
};

// Code-unit order, so results do not depend on the host locale
function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Holds the one active strategy out of a closed table */
export class SortingContext<K extends string, T> {
  private active: SortingStrategy<K, T>;

  constructor(
    private readonly strategies: readonly SortingStrategy<K, T>[],
    initial: SortingStrategy<K, T>,
  ) {
    this.active = initial;
  }

  get currentKey(): K {
    return this.active.key;
  }

  get currentStrategy(): SortingStrategy<K, T> {
    return this.active;
  }

  /** Unknown keys leave the active strategy in place */
  setStrategy(key: string): boolean {
    const found = this.strategies.find((strategy) => strategy.key === key);
    if (!found) return false;
    this.active = found;
    return true;
  }

  sort<U extends T>(items: Iterable<U>): U[] {
    const strategy = this.active;
    return Array.from(items).sort((a, b) => strategy.compare(a, b));
  }

  availableStrategies(): StrategyOption<K>[] {
    return this.strategies.map(({ key, name }) => ({ key, name }));
  }
}

export function createTransactionSorting(): SortingContext<TransactionSortKey, Transaction> {
  return new SortingContext(Object.values(TRANSACTION_SORTS), TRANSACTION_SORTS.recent);
}

export function createWalletSorting(): SortingContext<WalletSortKey, SortableWallet> {
  return new SortingContext(Object.values(WALLET_SORTS), WALLET_SORTS.balance);
}
