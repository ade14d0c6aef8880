import { CategoryManager } from './categories.js';
import {
  categoryBreakdown,
  computeTotals,
  percentagesOf,
  signedTotalsByCategory,
  totalsByCategory,
  turnoverPercentages,
} from './computations.js';
import { InvariantViolation, ValidationError } from './errors.js';
import { FilteringContext } from './filtering.js';
import { generateId } from './ids.js';
import { createTransactionSorting, type SortingContext, type TransactionSortKey } from './sorting.js';
import {
  isTransfer,
  Transaction,
  type TransferDirectory,
  type TransferHolder,
} from './transaction.js';
import {
  STARTING_BALANCE_CATEGORY,
  systemClock,
  type CategoryShare,
  type CategoryTotal,
  type Clock,
  type PeriodSummary,
  type TransactionEdit,
  type TransactionInput,
} from './types.js';

export type WalletKind = 'regular' | 'deposit';

export interface WalletInit {
  id?: string;
  name: string;
  currency?: string;
  description?: string;
  createdAt?: Date;
  /** Recorded as an income transaction once the wallet joins a manager */
  startingBalance?: number;
  clock?: Clock;
}

export const DEFAULT_CURRENCY = 'USD';

export function checkWalletName(name: string): string {
  const trimmed = name.trim();
  if (!trimmed) {
    throw new ValidationError('Wallet name must not be empty');
  }
  return trimmed;
}

function checkStartingBalance(value: number | undefined): number {
  if (value === undefined) return 0;
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError('Starting balance must be zero or a positive number');
  }
  return value;
}

/**
 * A named ledger. Aggregates are adjusted on every insert, replace and
 * delete, so `balance === totalIncome - totalExpense` holds after each call.
 */
export class Wallet implements TransferHolder {
  readonly kind: WalletKind = 'regular';
  readonly id: string;
  readonly createdAt: Date;
  name: string;
  currency: string;
  description: string;

  readonly sortingContext: SortingContext<TransactionSortKey, Transaction> = createTransactionSorting();
  readonly filteringContext: FilteringContext;

  protected readonly clock: Clock;
  private readonly entries = new Map<string, Transaction>();
  private income = 0;
  private expense = 0;
  private categories: CategoryManager = new CategoryManager();
  private directory: TransferDirectory | null = null;
  private pendingStartingBalance: number;

  constructor(init: WalletInit) {
    this.id = init.id ?? generateId();
    this.name = checkWalletName(init.name);
    this.currency = init.currency?.trim() || DEFAULT_CURRENCY;
    this.description = init.description ?? '';
    this.clock = init.clock ?? systemClock;
    this.createdAt = init.createdAt ?? this.clock();
    this.filteringContext = new FilteringContext(this.clock);
    this.pendingStartingBalance = checkStartingBalance(init.startingBalance);
  }

  get totalIncome(): number {
    return this.income;
  }

  get totalExpense(): number {
    return this.expense;
  }

  get balance(): number {
    return this.income - this.expense;
  }

  get transactionCount(): number {
    return this.entries.size;
  }

  get categoryManager(): CategoryManager {
    return this.categories;
  }

  /**
   * Joins a manager: adopts its shared categories and transfer directory,
   * then records the starting balance, if any.
   */
  attach(categories: CategoryManager, directory: TransferDirectory): void {
    this.categories = categories;
    this.directory = directory;
    for (const t of this.entries.values()) {
      categories.addCategory(t.category, t.direction);
    }
    if (this.pendingStartingBalance > 0) {
      this.record({
        amount: this.pendingStartingBalance,
        direction: 'income',
        category: STARTING_BALANCE_CATEGORY,
        createdAt: this.createdAt,
      });
    }
    this.pendingStartingBalance = 0;
  }

  /** Builds and adds a transaction dated by the wallet clock unless given */
  record(input: TransactionInput): Transaction {
    const transaction = new Transaction({
      ...input,
      createdAt: input.createdAt ?? this.clock(),
    });
    this.addTransaction(transaction);
    return transaction;
  }

  addTransaction(transaction: Transaction): void {
    this.categories.addCategory(transaction.category, transaction.direction);
    this.apply(transaction, 1);
    this.entries.set(transaction.id, transaction);
  }

  getById(id: string): Transaction | null {
    return this.entries.get(id) ?? null;
  }

  /** 1-based position in the current sort order */
  getByPosition(position: number): Transaction | null {
    const sorted = this.getSortedTransactions();
    if (!Number.isInteger(position) || position < 1 || position > sorted.length) return null;
    return sorted[position - 1] ?? null;
  }

  updateTransaction(id: string, edit: TransactionEdit): boolean {
    const current = this.entries.get(id);
    if (!current) return false;

    if (isTransfer(current)) {
      if (edit.category !== undefined || edit.direction !== undefined) {
        // Rejects category/direction changes before the partner is touched
        current.revise(edit);
      }
      const revised = current.update(edit, this.requireDirectory());
      if (!revised) {
        throw new InvariantViolation(`Transfer ${current.id} has no partner to update`);
      }
      this.replaceTransaction(revised);
      return true;
    }

    const revised = current.revise(edit);
    this.categories.addCategory(revised.category, revised.direction);
    this.replaceTransaction(revised);
    return true;
  }

  /**
   * Swaps a stored record for its revision (same id), moving the aggregate
   * contribution from the old record to the new one. Transfer partners call
   * this on each other's wallet during a synchronized update.
   */
  replaceTransaction(transaction: Transaction): void {
    const previous = this.entries.get(transaction.id);
    if (!previous) {
      throw new InvariantViolation(`Transaction ${transaction.id} is not in wallet ${this.name}`);
    }
    this.apply(previous, -1);
    this.apply(transaction, 1);
    this.entries.set(transaction.id, transaction);
  }

  /**
   * Removes a transaction. For a transfer with `cascade`, the partner is
   * removed from its own wallet first (without cascading back) and both
   * links are cleared.
   */
  deleteTransaction(id: string, cascade = true): boolean {
    const current = this.entries.get(id);
    if (!current) return false;

    if (isTransfer(current)) {
      if (cascade) {
        const link = current.link;
        const partner = link ? this.requireDirectory().locateTransfer(link) : null;
        if (!link || !partner) {
          throw new InvariantViolation(`Transfer ${current.id} has no partner to delete`);
        }
        const removed = partner.wallet.deleteTransaction(link.transactionId, false);
        if (!removed) {
          throw new InvariantViolation(`Partner of transfer ${current.id} vanished during delete`);
        }
      }
      current.detach();
    }

    this.apply(current, -1);
    this.entries.delete(id);
    if (this.entries.size === 0) {
      // Drop rounding residue left by the running sums
      this.income = 0;
      this.expense = 0;
    }
    return true;
  }

  /** Deletes every transaction, cascading into transfer partners */
  clear(): void {
    for (const id of Array.from(this.entries.keys())) {
      if (this.entries.has(id)) this.deleteTransaction(id, true);
    }
  }

  /** Insertion order; display order comes from the sorting context */
  transactions(): Transaction[] {
    return Array.from(this.entries.values());
  }

  getSortedTransactions(): Transaction[] {
    return this.sortingContext.sort(this.entries.values());
  }

  getFilteredTransactions(): Transaction[] {
    return this.filteringContext.apply(this.getSortedTransactions());
  }

  /** Period balance and category breakdown of the filtered view */
  getFilteredSummary(): PeriodSummary {
    const transactions = this.getFilteredTransactions();
    return {
      transactionCount: transactions.length,
      totals: computeTotals(transactions),
      breakdown: categoryBreakdown(transactions),
    };
  }

  incomeByCategory(): CategoryTotal[] {
    return totalsByCategory(this.transactions(), 'income');
  }

  expenseByCategory(): CategoryTotal[] {
    return totalsByCategory(this.transactions(), 'expense');
  }

  incomePercentages(): CategoryShare[] {
    return percentagesOf(this.incomeByCategory(), this.income);
  }

  expensePercentages(): CategoryShare[] {
    return percentagesOf(this.expenseByCategory(), this.expense);
  }

  /** Net signed amount per category */
  categoryTotals(): CategoryTotal[] {
    return signedTotalsByCategory(this.transactions());
  }

  /** Each category's share of all money moved through the wallet */
  categoryPercentages(): CategoryShare[] {
    return turnoverPercentages(this.transactions());
  }

  private apply(transaction: Transaction, factor: 1 | -1): void {
    if (transaction.direction === 'income') {
      this.income += factor * transaction.amount;
    } else {
      this.expense += factor * transaction.amount;
    }
  }

  private requireDirectory(): TransferDirectory {
    if (!this.directory) {
      throw new InvariantViolation(`Wallet ${this.name} holds a transfer but belongs to no manager`);
    }
    return this.directory;
  }
}
