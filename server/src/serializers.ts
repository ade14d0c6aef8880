/**
 * Domain objects to JSON response shapes: snake_case keys, ISO dates.
 */
import {
  isDepositWallet,
  isTransfer,
  type CategoryShare,
  type CategoryTotal,
  type DepositWallet,
  type PeriodSummary,
  type Transaction,
  type TransactionFilter,
  type Wallet,
} from '../../src/domain/index.js';

export interface TransactionJson {
  id: string;
  amount: number;
  signed_amount: number;
  direction: string;
  category: string;
  description: string;
  created_at: string;
  is_transfer: boolean;
  linked_wallet_id: string | null;
  linked_transaction_id: string | null;
}

export interface DepositJson {
  principal: number;
  interest_rate: number;
  term_months: number;
  capitalization: boolean;
  maturity_date: string;
  is_matured: boolean;
  days_until_maturity: number;
  months_elapsed: number;
  accrued_interest: number;
  total_interest: number;
  maturity_amount: number;
}

export interface WalletJson {
  id: string;
  name: string;
  type: string;
  currency: string;
  description: string;
  created_at: string;
  balance: number;
  total_income: number;
  total_expense: number;
  transaction_count: number;
  sorting: string;
  deposit: DepositJson | null;
}

export function toTransactionJson(t: Transaction): TransactionJson {
  const link = isTransfer(t) ? t.link : null;
  return {
    id: t.id,
    amount: t.amount,
    signed_amount: t.signedAmount,
    direction: t.direction,
    category: t.category,
    description: t.description,
    created_at: t.createdAt.toISOString(),
    is_transfer: isTransfer(t),
    linked_wallet_id: link?.walletId ?? null,
    linked_transaction_id: link?.transactionId ?? null,
  };
}

export function toDepositJson(wallet: DepositWallet): DepositJson {
  const summary = wallet.depositSummary();
  return {
    principal: summary.principal,
    interest_rate: summary.interestRate,
    term_months: summary.termMonths,
    capitalization: summary.capitalization,
    maturity_date: summary.maturityDate.toISOString(),
    is_matured: summary.isMatured,
    days_until_maturity: summary.daysUntilMaturity,
    months_elapsed: summary.monthsElapsed,
    accrued_interest: summary.accruedInterest,
    total_interest: summary.totalInterest,
    maturity_amount: summary.maturityAmount,
  };
}

export function toWalletJson(wallet: Wallet): WalletJson {
  return {
    id: wallet.id,
    name: wallet.name,
    type: wallet.kind,
    currency: wallet.currency,
    description: wallet.description,
    created_at: wallet.createdAt.toISOString(),
    balance: wallet.balance,
    total_income: wallet.totalIncome,
    total_expense: wallet.totalExpense,
    transaction_count: wallet.transactionCount,
    sorting: wallet.sortingContext.currentKey,
    deposit: isDepositWallet(wallet) ? toDepositJson(wallet) : null,
  };
}

export function toFilterJson(filter: TransactionFilter, index: number) {
  return {
    index,
    kind: filter.spec.kind,
    name: filter.name,
    description: filter.description,
    spec: filter.spec,
  };
}

function totalsJson(totals: CategoryTotal[]) {
  return totals.map(({ category, amount }) => ({ category, amount }));
}

function sharesJson(shares: CategoryShare[]) {
  return shares.map(({ category, percent }) => ({ category, percent }));
}

export function toBreakdownJson(wallet: Wallet) {
  return {
    income_by_category: totalsJson(wallet.incomeByCategory()),
    expense_by_category: totalsJson(wallet.expenseByCategory()),
    income_percentages: sharesJson(wallet.incomePercentages()),
    expense_percentages: sharesJson(wallet.expensePercentages()),
    category_totals: totalsJson(wallet.categoryTotals()),
    category_percentages: sharesJson(wallet.categoryPercentages()),
  };
}

export function toPeriodJson(period: PeriodSummary) {
  return {
    transaction_count: period.transactionCount,
    balance: period.totals.balance,
    total_income: period.totals.totalIncome,
    total_expense: period.totals.totalExpense,
    income_by_category: totalsJson(period.breakdown.incomeByCategory),
    expense_by_category: totalsJson(period.breakdown.expenseByCategory),
    income_percentages: sharesJson(period.breakdown.incomePercentages),
    expense_percentages: sharesJson(period.breakdown.expensePercentages),
  };
}
