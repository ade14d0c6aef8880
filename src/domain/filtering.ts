/**
 * Filter strategies over a wallet's transactions.
 *
 * A filter is described by a plain `FilterSpec` (what the HTTP layer accepts
 * and returns) and built into a named predicate. Active filters combine with
 * logical AND; filtering never touches the ledger itself.
 */
import {
  endOfDay,
  endOfMonth,
  endOfWeek,
  endOfYear,
  format,
  isWithinInterval,
  startOfDay,
  startOfMonth,
  startOfWeek,
  startOfYear,
  subMonths,
  subWeeks,
  subYears,
  type Interval,
} from 'date-fns';
import { ValidationError } from './errors.js';
import { isTransferCategory, type Transaction } from './transaction.js';
import { systemClock, type Clock } from './types.js';

export type DatePreset =
  | 'today'
  | 'this-week'
  | 'last-week'
  | 'this-month'
  | 'last-month'
  | 'this-year'
  | 'last-year';

export type AmountPreset = 'large' | 'small';

export type CategoryMode = 'include' | 'exclude';

export type FilterSpec =
  | { kind: 'date'; preset: DatePreset }
  | { kind: 'date-range'; from: Date | null; to: Date | null }
  | { kind: 'income'; includeTransfers: boolean }
  | { kind: 'expense'; includeTransfers: boolean }
  | { kind: 'transfers-only' }
  | { kind: 'no-transfers' }
  | { kind: 'category'; categories: string[]; mode: CategoryMode }
  | { kind: 'amount'; min: number | null; max: number | null }
  | { kind: 'amount-preset'; preset: AmountPreset }
  | { kind: 'description'; query: string; caseSensitive: boolean };

export interface TransactionFilter {
  readonly spec: FilterSpec;
  readonly name: string;
  readonly description: string;
  matches(transaction: Transaction): boolean;
}

export const DATE_PRESETS: Readonly<Record<DatePreset, string>> = {
  today: 'Today',
  'this-week': 'This Week',
  'last-week': 'Last Week',
  'this-month': 'This Month',
  'last-month': 'Last Month',
  'this-year': 'This Year',
  'last-year': 'Last Year',
};

export const LARGE_AMOUNT_THRESHOLD = 1000;
export const SMALL_AMOUNT_THRESHOLD = 100;

export const AMOUNT_PRESETS: Readonly<Record<AmountPreset, string>> = {
  large: 'Large Amounts',
  small: 'Small Amounts',
};

export const DIRECTION_PRESETS = {
  income: 'Income Only',
  expense: 'Expense Only',
  'transfers-only': 'Transfers Only',
  'no-transfers': 'No Transfers',
} as const;

const WEEK_OPTIONS = { weekStartsOn: 1 } as const;

/** Calendar period a preset covers, relative to `now` */
export function datePresetInterval(preset: DatePreset, now: Date): Interval {
  switch (preset) {
    case 'today':
      return { start: startOfDay(now), end: endOfDay(now) };
    case 'this-week':
      return { start: startOfWeek(now, WEEK_OPTIONS), end: endOfWeek(now, WEEK_OPTIONS) };
    case 'last-week': {
      const previous = subWeeks(now, 1);
      return { start: startOfWeek(previous, WEEK_OPTIONS), end: endOfWeek(previous, WEEK_OPTIONS) };
    }
    case 'this-month':
      return { start: startOfMonth(now), end: endOfMonth(now) };
    case 'last-month': {
      const previous = subMonths(now, 1);
      return { start: startOfMonth(previous), end: endOfMonth(previous) };
    }
    case 'this-year':
      return { start: startOfYear(now), end: endOfYear(now) };
    case 'last-year': {
      const previous = subYears(now, 1);
      return { start: startOfYear(previous), end: endOfYear(previous) };
    }
  }
}

function formatDay(date: Date | null): string {
  return date ? format(date, 'yyyy-MM-dd') : 'any';
}

function formatBound(value: number | null): string {
  return value === null ? 'any' : value.toFixed(2);
}

function transfersNote(includeTransfers: boolean): string {
  return includeTransfers ? 'transfers included' : 'transfers excluded';
}

function checkBound(value: number | null, label: string): void {
  if (value !== null && (!Number.isFinite(value) || value < 0)) {
    throw new ValidationError(`${label} must be a non-negative number`);
  }
}

function amountFilter(spec: FilterSpec, name: string, min: number | null, max: number | null): TransactionFilter {
  checkBound(min, 'Minimum amount');
  checkBound(max, 'Maximum amount');
  if (min !== null && max !== null && min > max) {
    throw new ValidationError('Minimum amount is greater than maximum amount');
  }
  return {
    spec,
    name,
    description: `Between ${formatBound(min)} and ${formatBound(max)}`,
    matches: (t) => (min === null || t.amount >= min) && (max === null || t.amount <= max),
  };
}

export function buildFilter(spec: FilterSpec, clock: Clock = systemClock): TransactionFilter {
  switch (spec.kind) {
    case 'date': {
      const name = DATE_PRESETS[spec.preset];
      return {
        spec,
        name,
        description: `Transactions dated ${name.toLowerCase()}`,
        matches: (t) => isWithinInterval(t.createdAt, datePresetInterval(spec.preset, clock())),
      };
    }

    case 'date-range': {
      const start = spec.from ? startOfDay(spec.from) : null;
      const end = spec.to ? endOfDay(spec.to) : null;
      if (start && end && start > end) {
        throw new ValidationError('Date range starts after it ends');
      }
      return {
        spec,
        name: 'Date Range',
        description: `From ${formatDay(spec.from)} to ${formatDay(spec.to)}`,
        matches: (t) => (start === null || t.createdAt >= start) && (end === null || t.createdAt <= end),
      };
    }

    case 'income':
    case 'expense': {
      const direction = spec.kind;
      const includeTransfers = spec.includeTransfers;
      return {
        spec,
        name: DIRECTION_PRESETS[direction],
        description: `${direction === 'income' ? 'Income' : 'Expenses'} only (${transfersNote(includeTransfers)})`,
        matches: (t) => t.direction === direction && (includeTransfers || !isTransferCategory(t)),
      };
    }

    case 'transfers-only':
      return {
        spec,
        name: DIRECTION_PRESETS['transfers-only'],
        description: 'Only transfers between wallets',
        matches: (t) => isTransferCategory(t),
      };

    case 'no-transfers':
      return {
        spec,
        name: DIRECTION_PRESETS['no-transfers'],
        description: 'Everything except transfers between wallets',
        matches: (t) => !isTransferCategory(t),
      };

    case 'category': {
      if (spec.categories.length === 0) {
        throw new ValidationError('Category filter needs at least one category');
      }
      const names = new Set(spec.categories);
      const include = spec.mode === 'include';
      return {
        spec,
        name: 'Category',
        description: `${include ? 'Include' : 'Exclude'}: ${[...names].join(', ')}`,
        matches: (t) => names.has(t.category) === include,
      };
    }

    case 'amount':
      return amountFilter(spec, 'Amount', spec.min, spec.max);

    case 'amount-preset':
      return spec.preset === 'large'
        ? amountFilter(spec, AMOUNT_PRESETS.large, LARGE_AMOUNT_THRESHOLD, null)
        : amountFilter(spec, AMOUNT_PRESETS.small, null, SMALL_AMOUNT_THRESHOLD);

    case 'description': {
      if (!spec.query) {
        throw new ValidationError('Description search needs a query');
      }
      const needle = spec.caseSensitive ? spec.query : spec.query.toLowerCase();
      return {
        spec,
        name: 'Description',
        description: `Contains "${spec.query}" (${spec.caseSensitive ? 'case-sensitive' : 'case-insensitive'})`,
        matches: (t) => (spec.caseSensitive ? t.description : t.description.toLowerCase()).includes(needle),
      };
    }
  }
}

/** Ordered list of active filters, combined with AND */
export class FilteringContext {
  private filters: TransactionFilter[] = [];

  constructor(private readonly clock: Clock = systemClock) {}

  get hasFilters(): boolean {
    return this.filters.length > 0;
  }

  get activeFilters(): readonly TransactionFilter[] {
    return [...this.filters];
  }

  get filterSummary(): string {
    if (!this.hasFilters) return 'No filters';
    return this.filters.map((f) => f.name).join(', ');
  }

  addFilter(spec: FilterSpec): TransactionFilter {
    const filter = buildFilter(spec, this.clock);
    this.filters.push(filter);
    return filter;
  }

  /** 0-based; false when nothing sits at `index` */
  removeFilter(index: number): boolean {
    if (!Number.isInteger(index) || index < 0 || index >= this.filters.length) return false;
    this.filters.splice(index, 1);
    return true;
  }

  clearFilters(): void {
    this.filters = [];
  }

  matches(transaction: Transaction): boolean {
    return this.filters.every((f) => f.matches(transaction));
  }

  /** Keeps the input order */
  apply<T extends Transaction>(transactions: readonly T[]): T[] {
    return transactions.filter((t) => this.matches(t));
  }
}
