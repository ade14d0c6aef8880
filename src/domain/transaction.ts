import { format } from 'date-fns';
import { ValidationError } from './errors.js';
import { generateId } from './ids.js';
import {
  TRANSFER_CATEGORY,
  type Direction,
  type TransactionEdit,
  type TransferEdit,
  type TransferLink,
} from './types.js';

export interface TransactionInit {
  id?: string;
  amount: number;
  direction: Direction;
  category: string;
  description?: string;
  createdAt?: Date;
}

function checkAmount(amount: number): number {
  if (!Number.isFinite(amount) || amount <= 0) {
    throw new ValidationError(`Amount must be a positive number, got ${amount}`);
  }
  return amount;
}

function checkCategory(category: string, transfer: boolean): string {
  const trimmed = category.trim();
  if (!trimmed) {
    throw new ValidationError('Category must not be empty');
  }
  if (trimmed === TRANSFER_CATEGORY && !transfer) {
    throw new ValidationError(`"${TRANSFER_CATEGORY}" is reserved for transfers between wallets`);
  }
  return trimmed;
}

function checkDate(date: Date): Date {
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError('Transaction date is not a valid date');
  }
  return date;
}

/**
 * One monetary movement. Fields never change in place: an edit produces a
 * new record with the same id (see `revise`).
 */
export class Transaction {
  readonly id: string;
  readonly amount: number;
  readonly direction: Direction;
  readonly category: string;
  readonly description: string;
  readonly createdAt: Date;

  constructor(init: TransactionInit) {
    this.id = init.id ?? generateId();
    this.amount = checkAmount(init.amount);
    this.direction = init.direction;
    this.category = checkCategory(init.category, this.isTransferRecord());
    this.description = init.description ?? '';
    this.createdAt = checkDate(init.createdAt ?? new Date());
  }

  /** Only transfers may carry the reserved transfer category */
  protected isTransferRecord(): boolean {
    return false;
  }

  get signedAmount(): number {
    return this.direction === 'expense' ? -this.amount : this.amount;
  }

  get sign(): '+' | '-' {
    return this.direction === 'income' ? '+' : '-';
  }

  revise(edit: TransactionEdit): Transaction {
    return new Transaction({
      id: this.id,
      amount: edit.amount ?? this.amount,
      direction: edit.direction ?? this.direction,
      category: edit.category ?? this.category,
      description: edit.description ?? this.description,
      createdAt: edit.createdAt ?? this.createdAt,
    });
  }

  toString(): string {
    return `${this.category} - ${this.sign}${this.amount.toFixed(2)}`;
  }

  detailedString(): string {
    const label = this.direction === 'income' ? 'Income' : 'Expense';
    return [
      `ID: ${this.id}`,
      `Type: ${this.sign} (${label})`,
      `Amount: ${this.sign}${this.amount.toFixed(2)}`,
      `Category: ${this.category}`,
      `Description: ${this.description || 'N/A'}`,
      `Date: ${format(this.createdAt, 'yyyy-MM-dd HH:mm:ss')}`,
    ].join('\n');
  }
}

export interface TransferInit {
  id?: string;
  amount: number;
  direction: Direction;
  description?: string;
  createdAt?: Date;
  walletId: string;
  link: TransferLink | null;
}

/** The wallet side of a transfer, as seen from its partner */
export interface TransferHolder {
  readonly id: string;
  replaceTransaction(transaction: Transaction): void;
  deleteTransaction(id: string, cascade?: boolean): boolean;
}

export interface LocatedTransfer {
  wallet: TransferHolder;
  transfer: Transfer;
}

/** Resolves a transfer link to the partner record and its wallet */
export interface TransferDirectory {
  locateTransfer(link: TransferLink): LocatedTransfer | null;
}

/**
 * One side of a money movement between two wallets. The other side lives in
 * another wallet and is reached through `link`, never held directly.
 */
export class Transfer extends Transaction {
  readonly walletId: string;
  private currentLink: TransferLink | null;

  constructor(init: TransferInit) {
    super({
      id: init.id,
      amount: init.amount,
      direction: init.direction,
      category: TRANSFER_CATEGORY,
      description: init.description,
      createdAt: init.createdAt,
    });
    this.walletId = init.walletId;
    this.currentLink = init.link ? { ...init.link } : null;
  }

  protected override isTransferRecord(): boolean {
    return true;
  }

  get link(): TransferLink | null {
    return this.currentLink;
  }

  get isLinked(): boolean {
    return this.currentLink !== null;
  }

  connect(link: TransferLink): void {
    this.currentLink = { ...link };
  }

  detach(): void {
    this.currentLink = null;
  }

  override revise(edit: TransactionEdit): Transfer {
    if (edit.category !== undefined && edit.category !== TRANSFER_CATEGORY) {
      throw new ValidationError('The category of a transfer cannot be changed');
    }
    if (edit.direction !== undefined && edit.direction !== this.direction) {
      throw new ValidationError('The direction of a transfer cannot be changed');
    }
    return new Transfer({
      id: this.id,
      amount: edit.amount ?? this.amount,
      direction: this.direction,
      description: edit.description ?? this.description,
      createdAt: edit.createdAt ?? this.createdAt,
      walletId: this.walletId,
      link: this.currentLink,
    });
  }

  /**
   * Applies amount, description and date to this side and to the partner.
   * The partner's wallet swaps in its revised record (re-applying its own
   * aggregates); the caller stores the returned record on this side.
   * Returns null when the partner cannot be located.
   */
  update(edit: TransferEdit, directory: TransferDirectory): Transfer | null {
    if (!this.currentLink) return null;
    const partner = directory.locateTransfer(this.currentLink);
    if (!partner) return null;

    const sync: TransferEdit = {
      amount: edit.amount,
      description: edit.description,
      createdAt: edit.createdAt,
    };
    // Both revisions validate before either wallet is touched
    const revised = this.revise(sync);
    const revisedPartner = partner.transfer.revise(sync);
    partner.wallet.replaceTransaction(revisedPartner);
    return revised;
  }

  override detailedString(): string {
    const linked = this.currentLink
      ? `${this.currentLink.transactionId} in wallet ${this.currentLink.walletId}`
      : 'detached';
    return `${super.detailedString()}\nLinked: ${linked}`;
  }
}

export function isTransfer(transaction: Transaction): transaction is Transfer {
  return transaction instanceof Transfer;
}

export function isTransferCategory(transaction: Transaction): boolean {
  return transaction.category === TRANSFER_CATEGORY;
}
