import { describe, expect, it } from 'vitest';
import {
  DepositWallet,
  interestFor,
  isDepositWallet,
  ValidationError,
  WalletManager,
  wholeMonthsBetween,
} from '../domain/index.js';
import { day, movableClock } from './fixtures.js';

function openDeposit(capitalization = true) {
  const time = movableClock(day(2024, 1, 15, 10));
  const manager = new WalletManager({ clock: time.clock });
  const wallet = manager.createWallet({
    kind: 'deposit',
    name: 'Savings',
    startingBalance: 1000,
    interestRate: 12,
    termMonths: 12,
    capitalization,
  });
  if (!isDepositWallet(wallet)) throw new Error('expected a deposit wallet');
  return { manager, wallet, time };
}

describe('wholeMonthsBetween', () => {
  it('counts a month once its anniversary day is reached', () => {
    expect(wholeMonthsBetween(day(2024, 1, 15), day(2024, 2, 14))).toBe(0);
    expect(wholeMonthsBetween(day(2024, 1, 15), day(2024, 2, 15))).toBe(1);
    expect(wholeMonthsBetween(day(2024, 1, 15), day(2024, 3, 14))).toBe(1);
  });

  it('clamps the anniversary to the end of a shorter month', () => {
    expect(wholeMonthsBetween(day(2023, 1, 31), day(2023, 2, 27))).toBe(0);
    expect(wholeMonthsBetween(day(2023, 1, 31), day(2023, 2, 28))).toBe(1);
    expect(wholeMonthsBetween(day(2024, 1, 31), day(2024, 2, 28))).toBe(0);
    expect(wholeMonthsBetween(day(2024, 1, 31), day(2024, 2, 29))).toBe(1);
  });

  it('is zero when the end is not after the start', () => {
    expect(wholeMonthsBetween(day(2024, 5, 1), day(2024, 5, 1))).toBe(0);
    expect(wholeMonthsBetween(day(2024, 5, 1), day(2024, 1, 1))).toBe(0);
  });
});

describe('interestFor', () => {
  it('compounds monthly or accrues simply', () => {
    expect(interestFor(1000, 0.01, 12, true)).toBeCloseTo(126.825, 3);
    expect(interestFor(1000, 0.01, 12, false)).toBeCloseTo(120, 9);
    expect(interestFor(1000, 0.01, 0, true)).toBe(0);
  });
});

describe('DepositWallet', () => {
  it('matures term months after opening', () => {
    const { wallet } = openDeposit();
    expect(wallet.kind).toBe('deposit');
    expect(wallet.maturityDate).toEqual(day(2025, 1, 15, 10));
    expect(wallet.monthlyRate).toBeCloseTo(0.01, 12);
    expect(wallet.principal).toBe(1000);
  });

  it('clamps a month-end opening date', () => {
    const wallet = new DepositWallet({ name: 'Short', createdAt: day(2023, 1, 31), interestRate: 5, termMonths: 1 });
    expect(wallet.maturityDate).toEqual(day(2023, 2, 28));
  });

  it('counts down to maturity', () => {
    const { wallet, time } = openDeposit();
    expect(wallet.isMatured).toBe(false);
    time.set(day(2025, 1, 5));
    expect(wallet.daysUntilMaturity).toBe(10);
    time.set(day(2025, 1, 15, 10));
    expect(wallet.isMatured).toBe(true);
    expect(wallet.daysUntilMaturity).toBe(0);
  });

  it('accrues interest for completed months only', () => {
    const { wallet, time } = openDeposit(false);
    time.set(day(2024, 3, 14));
    expect(wallet.monthsElapsed).toBe(1);
    expect(wallet.calculateAccruedInterest()).toBeCloseTo(10, 9);
    time.set(day(2024, 3, 15, 10));
    expect(wallet.monthsElapsed).toBe(2);
    expect(wallet.calculateAccruedInterest()).toBeCloseTo(20, 9);
  });

  it('stops counting months at maturity', () => {
    const { wallet, time } = openDeposit();
    time.set(day(2027, 6, 1));
    expect(wallet.monthsElapsed).toBe(12);
    expect(wallet.calculateAccruedInterest()).toBeCloseTo(wallet.calculateTotalInterest(), 9);
  });

  it('projects total interest and maturity amount', () => {
    const compound = openDeposit(true).wallet;
    expect(compound.calculateTotalInterest()).toBeCloseTo(126.825, 3);
    expect(compound.calculateMaturityAmount()).toBeCloseTo(1126.825, 3);

    const simple = openDeposit(false).wallet;
    expect(simple.calculateTotalInterest()).toBeCloseTo(120, 9);
    expect(simple.calculateMaturityAmount()).toBeCloseTo(1120, 9);
  });

  it('takes later income into the principal', () => {
    const { wallet } = openDeposit(false);
    wallet.record({ amount: 500, direction: 'income', category: 'Other' });
    wallet.record({ amount: 100, direction: 'expense', category: 'Other' });
    expect(wallet.principal).toBe(1500);
    expect(wallet.calculateTotalInterest()).toBeCloseTo(180, 9);
  });

  it('moves maturity with the term', () => {
    const { manager, wallet } = openDeposit();
    expect(manager.updateWallet('Savings', { termMonths: 6, interestRate: 6, capitalization: false })).toBe(true);
    expect(wallet.maturityDate).toEqual(day(2024, 7, 15, 10));
    expect(wallet.interestRate).toBe(6);
    expect(wallet.capitalization).toBe(false);
  });

  it('rejects bad terms without changing anything', () => {
    const { manager, wallet } = openDeposit();
    expect(() => manager.updateWallet('Savings', { name: 'Renamed', termMonths: 0 })).toThrow(ValidationError);
    expect(() => manager.updateWallet('Savings', { interestRate: 101 })).toThrow(ValidationError);
    expect(() => manager.updateWallet('Savings', { termMonths: 1.5 })).toThrow(ValidationError);
    expect(wallet.name).toBe('Savings');
    expect(wallet.termMonths).toBe(12);
    expect(wallet.interestRate).toBe(12);
  });

  it('summarises its state', () => {
    const { wallet, time } = openDeposit(false);
    time.set(day(2024, 4, 20));
    expect(wallet.depositSummary()).toEqual({
      principal: 1000,
      interestRate: 12,
      termMonths: 12,
      capitalization: false,
      maturityDate: day(2025, 1, 15, 10),
      isMatured: false,
      daysUntilMaturity: wallet.daysUntilMaturity,
      monthsElapsed: 3,
      accruedInterest: wallet.calculateAccruedInterest(),
      totalInterest: wallet.calculateTotalInterest(),
      maturityAmount: wallet.calculateMaturityAmount(),
    });
  });
});
