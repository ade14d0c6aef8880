/**
 * Fixed-term deposit: a wallet whose income earns monthly interest until a
 * maturity date. Interest is plain floating point; callers round for display.
 */
import {
  addMonths,
  differenceInCalendarDays,
  differenceInCalendarMonths,
  isAfter,
  startOfDay,
} from 'date-fns';
import { ValidationError } from './errors.js';
import type { DepositSummary } from './types.js';
import { Wallet, type WalletInit, type WalletKind } from './wallet.js';

export interface DepositTerms {
  interestRate: number;
  termMonths: number;
  capitalization?: boolean;
}

export type DepositWalletInit = WalletInit & DepositTerms;

export function checkInterestRate(rate: number): number {
  if (!Number.isFinite(rate) || rate < 0 || rate > 100) {
    throw new ValidationError('Interest rate must be between 0 and 100 percent');
  }
  return rate;
}

export function checkTermMonths(months: number): number {
  if (!Number.isInteger(months) || months < 1) {
    throw new ValidationError('Deposit term must be a whole number of months, at least 1');
  }
  return months;
}

/**
 * Whole months from `start` to `end`. A month counts once its anniversary
 * (`start` plus n months, clamped to month end) has been reached by
 * calendar day.
 */
export function wholeMonthsBetween(start: Date, end: Date): number {
  if (!isAfter(end, start)) return 0;
  let months = differenceInCalendarMonths(end, start);
  if (months > 0 && startOfDay(end) < startOfDay(addMonths(start, months))) {
    months -= 1;
  }
  return Math.max(months, 0);
}

/** `principal` grown over `months` at `monthlyRate`, compound or simple */
export function interestFor(principal: number, monthlyRate: number, months: number, compound: boolean): number {
  if (compound) {
    return principal * (1 + monthlyRate) ** months - principal;
  }
  return principal * monthlyRate * months;
}

export class DepositWallet extends Wallet {
  override readonly kind: WalletKind = 'deposit';
  capitalization: boolean;
  private rate: number;
  private term: number;
  private maturity: Date;

  constructor(init: DepositWalletInit) {
    super(init);
    this.rate = checkInterestRate(init.interestRate);
    this.term = checkTermMonths(init.termMonths);
    this.capitalization = init.capitalization ?? true;
    this.maturity = addMonths(this.createdAt, this.term);
  }

  get interestRate(): number {
    return this.rate;
  }

  set interestRate(rate: number) {
    this.rate = checkInterestRate(rate);
  }

  get termMonths(): number {
    return this.term;
  }

  /** Moves the maturity date along with the term */
  set termMonths(months: number) {
    this.term = checkTermMonths(months);
    this.maturity = addMonths(this.createdAt, this.term);
  }

  get maturityDate(): Date {
    return this.maturity;
  }

  get monthlyRate(): number {
    return this.rate / 12 / 100;
  }

  /** Total income ever recorded; later deposits are not tracked apart */
  get principal(): number {
    return this.totalIncome;
  }

  get isMatured(): boolean {
    return this.clock() >= this.maturity;
  }

  get daysUntilMaturity(): number {
    if (this.isMatured) return 0;
    return differenceInCalendarDays(this.maturity, this.clock());
  }

  /** Completed months between opening and min(now, maturity) */
  get monthsElapsed(): number {
    const now = this.clock();
    const end = now < this.maturity ? now : this.maturity;
    return wholeMonthsBetween(this.createdAt, end);
  }

  calculateAccruedInterest(): number {
    return interestFor(this.principal, this.monthlyRate, this.monthsElapsed, this.capitalization);
  }

  calculateTotalInterest(): number {
    return interestFor(this.principal, this.monthlyRate, this.term, this.capitalization);
  }

  calculateMaturityAmount(): number {
    return this.principal + this.calculateTotalInterest();
  }

  depositSummary(): DepositSummary {
    return {
      principal: this.principal,
      interestRate: this.rate,
      termMonths: this.term,
      capitalization: this.capitalization,
      maturityDate: this.maturity,
      isMatured: this.isMatured,
      daysUntilMaturity: this.daysUntilMaturity,
      monthsElapsed: this.monthsElapsed,
      accruedInterest: this.calculateAccruedInterest(),
      totalInterest: this.calculateTotalInterest(),
      maturityAmount: this.calculateMaturityAmount(),
    };
  }
}

export function isDepositWallet(wallet: Wallet): wallet is DepositWallet {
  return wallet instanceof DepositWallet;
}
