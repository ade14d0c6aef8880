/**
 * Domain types for the wallet ledger.
 * Pure data, no IO.
 */

export type Direction = 'income' | 'expense';

/** Reserved category carried by both sides of a transfer */
export const TRANSFER_CATEGORY = 'Transfer';

/** Category of the transaction injected for a wallet's starting balance */
export const STARTING_BALANCE_CATEGORY = 'Starting Balance';

/** Source of "now" for date presets and deposit math */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/** Fields accepted when recording a transaction */
export interface TransactionInput {
  id?: string;
  amount: number;
  direction: Direction;
  category: string;
  description?: string;
  createdAt?: Date;
}

/** Replacement values for an edit; omitted fields keep their value */
export interface TransactionEdit {
  amount?: number;
  direction?: Direction;
  category?: string;
  description?: string;
  createdAt?: Date;
}

/** The part of an edit a transfer accepts on both of its sides */
export type TransferEdit = Pick<TransactionEdit, 'amount' | 'description' | 'createdAt'>;

/** Non-owning pointer at the other side of a transfer */
export interface TransferLink {
  walletId: string;
  transactionId: string;
}

export interface CategoryTotal {
  category: string;
  amount: number;
}

export interface CategoryShare {
  category: string;
  percent: number;
}

export interface Totals {
  balance: number;
  totalIncome: number;
  totalExpense: number;
}

export interface CategoryBreakdown {
  incomeByCategory: CategoryTotal[];
  expenseByCategory: CategoryTotal[];
  incomePercentages: CategoryShare[];
  expensePercentages: CategoryShare[];
}

/** Totals and breakdown over the transactions a filtered view shows */
export interface PeriodSummary {
  transactionCount: number;
  totals: Totals;
  breakdown: CategoryBreakdown;
}

export interface DepositSummary {
  principal: number;
  interestRate: number;
  termMonths: number;
  capitalization: boolean;
  maturityDate: Date;
  isMatured: boolean;
  daysUntilMaturity: number;
  monthsElapsed: number;
  accruedInterest: number;
  totalInterest: number;
  maturityAmount: number;
}
