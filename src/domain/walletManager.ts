import { CategoryManager } from './categories.js';
import {
  checkInterestRate,
  checkTermMonths,
  DepositWallet,
  isDepositWallet,
} from './depositWallet.js';
import { ValidationError } from './errors.js';
import { createWalletSorting, type SortableWallet, type SortingContext, type WalletSortKey } from './sorting.js';
import {
  isTransfer,
  Transfer,
  type LocatedTransfer,
  type TransferDirectory,
} from './transaction.js';
import { systemClock, type Clock, type TransferLink } from './types.js';
import { checkWalletName, Wallet, type WalletKind } from './wallet.js';

export interface CreateWalletInput {
  kind?: WalletKind;
  name: string;
  currency?: string;
  description?: string;
  startingBalance?: number;
  createdAt?: Date;
  interestRate?: number;
  termMonths?: number;
  capitalization?: boolean;
}

export interface WalletChanges {
  name?: string;
  currency?: string;
  description?: string;
  interestRate?: number;
  termMonths?: number;
  capitalization?: boolean;
}

export interface ManagerOptions {
  clock?: Clock;
  categories?: CategoryManager;
}

function hasDepositFields(fields: Pick<WalletChanges, 'interestRate' | 'termMonths' | 'capitalization'>): boolean {
  return fields.interestRate !== undefined || fields.termMonths !== undefined || fields.capitalization !== undefined;
}

/**
 * Owns every wallet, the current-wallet cursor and the transfer protocol.
 * Wallet names are unique case-insensitively; lookups ignore case.
 */
export class WalletManager implements TransferDirectory {
  readonly categories: CategoryManager;
  readonly sortingContext: SortingContext<WalletSortKey, SortableWallet> = createWalletSorting();
  readonly clock: Clock;
  private readonly wallets = new Map<string, Wallet>();
  private current: Wallet | null = null;

  constructor(options: ManagerOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.categories = options.categories ?? new CategoryManager();
  }

  get currentWallet(): Wallet | null {
    return this.current;
  }

  get walletCount(): number {
    return this.wallets.size;
  }

  /**
   * Builds a regular or deposit wallet and adds it. Interest rate and term
   * are required for deposits and refused for regular wallets.
   */
  createWallet(input: CreateWalletInput): Wallet {
    const kind = input.kind ?? 'regular';
    const base = {
      name: input.name,
      currency: input.currency,
      description: input.description,
      startingBalance: input.startingBalance,
      createdAt: input.createdAt,
      clock: this.clock,
    };

    let wallet: Wallet;
    if (kind === 'deposit') {
      if (input.interestRate === undefined) {
        throw new ValidationError('Interest rate is required for deposit wallets');
      }
      if (input.termMonths === undefined) {
        throw new ValidationError('Term in months is required for deposit wallets');
      }
      wallet = new DepositWallet({
        ...base,
        interestRate: input.interestRate,
        termMonths: input.termMonths,
        capitalization: input.capitalization,
      });
    } else {
      if (hasDepositFields(input)) {
        throw new ValidationError('Interest rate, term and capitalization can only be set for deposit wallets');
      }
      wallet = new Wallet(base);
    }

    this.addWallet(wallet);
    return wallet;
  }

  addWallet(wallet: Wallet): void {
    const key = checkWalletName(wallet.name).toLowerCase();
    if (this.wallets.has(key)) {
      throw new ValidationError(`A wallet named "${wallet.name}" already exists`);
    }
    this.wallets.set(key, wallet);
    wallet.attach(this.categories, this);
    if (!this.current) this.current = wallet;
  }

  getWallet(name: string): Wallet | null {
    return this.wallets.get(name.trim().toLowerCase()) ?? null;
  }

  getWalletById(id: string): Wallet | null {
    for (const wallet of this.wallets.values()) {
      if (wallet.id === id) return wallet;
    }
    return null;
  }

  /** Insertion order */
  getWallets(): Wallet[] {
    return Array.from(this.wallets.values());
  }

  getSortedWallets(): Wallet[] {
    return this.sortingContext.sort(this.wallets.values());
  }

  switchWallet(name: string): boolean {
    const wallet = this.getWallet(name);
    if (!wallet) return false;
    this.current = wallet;
    return true;
  }

  /** False when no wallet is called `name`; renames keep the lookup key in step */
  updateWallet(name: string, changes: WalletChanges): boolean {
    const wallet = this.getWallet(name);
    if (!wallet) return false;

    const deposit = isDepositWallet(wallet) ? wallet : null;
    if (!deposit && hasDepositFields(changes)) {
      throw new ValidationError('Interest rate, term and capitalization can only be set for deposit wallets');
    }

    let newName: string | null = null;
    if (changes.name !== undefined) {
      newName = checkWalletName(changes.name);
      const clash = this.getWallet(newName);
      if (clash && clash !== wallet) {
        throw new ValidationError(`A wallet named "${newName}" already exists`);
      }
    }
    // Validate every field before mutating any of them
    const interestRate = changes.interestRate === undefined ? undefined : checkInterestRate(changes.interestRate);
    const termMonths = changes.termMonths === undefined ? undefined : checkTermMonths(changes.termMonths);

    if (newName !== null) {
      this.wallets.delete(wallet.name.toLowerCase());
      wallet.name = newName;
      this.wallets.set(newName.toLowerCase(), wallet);
    }
    if (changes.currency?.trim()) wallet.currency = changes.currency.trim();
    if (changes.description !== undefined) wallet.description = changes.description;
    if (deposit) {
      if (interestRate !== undefined) deposit.interestRate = interestRate;
      if (termMonths !== undefined) deposit.termMonths = termMonths;
      if (changes.capitalization !== undefined) deposit.capitalization = changes.capitalization;
    }
    return true;
  }

  /**
   * Deletes every transaction of the wallet first (transfer partners in
   * other wallets go with them), then drops the wallet.
   */
  removeWallet(name: string): boolean {
    const wallet = this.getWallet(name);
    if (!wallet) return false;

    wallet.clear();
    this.wallets.delete(wallet.name.toLowerCase());

    if (this.current === wallet) {
      const [next] = this.wallets.values();
      this.current = next ?? null;
    }
    return true;
  }

  /**
   * Moves `amount` from one wallet to another as a linked pair of transfers:
   * an expense on the source and an income on the target. Returns false,
   * with nothing recorded, for unknown or identical wallets or a
   * non-positive amount.
   */
  transfer(fromName: string, toName: string, amount: number, description = '', when?: Date): boolean {
    const from = this.getWallet(fromName);
    const to = this.getWallet(toName);
    if (!from || !to || from === to) return false;
    if (!Number.isFinite(amount) || amount <= 0) return false;

    const createdAt = when ?? this.clock();
    const outgoing = new Transfer({ amount, direction: 'expense', description, createdAt, walletId: from.id, link: null });
    const incoming = new Transfer({ amount, direction: 'income', description, createdAt, walletId: to.id, link: null });
    outgoing.connect({ walletId: to.id, transactionId: incoming.id });
    incoming.connect({ walletId: from.id, transactionId: outgoing.id });

    from.addTransaction(outgoing);
    try {
      to.addTransaction(incoming);
    } catch (error) {
      outgoing.detach();
      from.deleteTransaction(outgoing.id, false);
      throw error;
    }
    return true;
  }

  locateTransfer(link: TransferLink): LocatedTransfer | null {
    const wallet = this.getWalletById(link.walletId);
    const transfer = wallet?.getById(link.transactionId);
    if (!wallet || !transfer || !isTransfer(transfer)) return null;
    return { wallet, transfer };
  }
}
