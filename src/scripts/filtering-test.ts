import { describe, expect, it } from 'vitest';
import {
  buildFilter,
  FilteringContext,
  ValidationError,
  type DatePreset,
  type FilterSpec,
  type Transaction,
} from '../domain/index.js';
import { day, fixedClock, ids, makeTransfer, makeTxn } from './fixtures.js';

// Wednesday
const clock = fixedClock(day(2024, 3, 13));

const salary = makeTxn({ id: 'a', amount: 2000, direction: 'income', category: 'Salary', description: 'March salary', createdAt: day(2024, 3, 1, 9) });
const groceries = makeTxn({ id: 'b', amount: 45.5, category: 'Food', description: 'Groceries at Market', createdAt: day(2024, 3, 13, 8, 30) });
const rent = makeTxn({ id: 'c', amount: 1200, category: 'Bills', description: 'Rent', createdAt: day(2024, 2, 28) });
const sent = makeTransfer('expense', 300, day(2024, 3, 11));
const received = makeTransfer('income', 80, day(2024, 3, 5));
const coffee = makeTxn({ id: 'f', amount: 15, category: 'Food', description: 'coffee', createdAt: day(2023, 12, 24) });

const all: Transaction[] = [salary, groceries, rent, sent, received, coffee];
const label = new Map<string, string>(all.map((t, i) => [t.id, 'abcdef'[i] ?? '?']));

function run(spec: FilterSpec): string[] {
  const filter = buildFilter(spec, clock);
  return ids(all.filter((t) => filter.matches(t))).map((id) => label.get(id) ?? id);
}

describe('date filters', () => {
  const cases: [DatePreset, string[]][] = [
    ['today', ['b']],
    ['this-week', ['b', 'd']],
    ['last-week', ['e']],
    ['this-month', ['a', 'b', 'd', 'e']],
    ['last-month', ['c']],
    ['this-year', ['a', 'b', 'c', 'd', 'e']],
    ['last-year', ['f']],
  ];
  for (const [preset, expected] of cases) {
    it(preset, () => {
      expect(run({ kind: 'date', preset })).toEqual(expected);
    });
  }

  it('takes whole days at both ends of a range', () => {
    expect(run({ kind: 'date-range', from: day(2024, 3, 1, 15), to: day(2024, 3, 5, 0) })).toEqual(['a', 'e']);
  });

  it('leaves an open end unbounded', () => {
    expect(run({ kind: 'date-range', from: null, to: day(2024, 2, 28) })).toEqual(['c', 'f']);
  });

  it('rejects a range that ends before it starts', () => {
    expect(() => buildFilter({ kind: 'date-range', from: day(2024, 3, 2), to: day(2024, 3, 1) })).toThrow(ValidationError);
  });

  it('describes a range', () => {
    const filter = buildFilter({ kind: 'date-range', from: day(2024, 3, 1), to: null }, clock);
    expect(filter.name).toBe('Date Range');
    expect(filter.description).toBe('From 2024-03-01 to any');
  });
});

describe('direction filters', () => {
  it('excludes transfers unless asked', () => {
    expect(run({ kind: 'income', includeTransfers: false })).toEqual(['a']);
    expect(run({ kind: 'income', includeTransfers: true })).toEqual(['a', 'e']);
    expect(run({ kind: 'expense', includeTransfers: false })).toEqual(['b', 'c', 'f']);
    expect(run({ kind: 'expense', includeTransfers: true })).toEqual(['b', 'c', 'd', 'f']);
  });

  it('selects or drops transfers', () => {
    expect(run({ kind: 'transfers-only' })).toEqual(['d', 'e']);
    expect(run({ kind: 'no-transfers' })).toEqual(['a', 'b', 'c', 'f']);
  });

  it('describes itself', () => {
    const filter = buildFilter({ kind: 'income', includeTransfers: false });
    expect(filter.name).toBe('Income Only');
    expect(filter.description).toBe('Income only (transfers excluded)');
  });
});

describe('category filters', () => {
  it('includes listed categories', () => {
    expect(run({ kind: 'category', categories: ['Food'], mode: 'include' })).toEqual(['b', 'f']);
  });

  it('excludes listed categories', () => {
    expect(run({ kind: 'category', categories: ['Food', 'Transfer'], mode: 'exclude' })).toEqual(['a', 'c']);
    expect(buildFilter({ kind: 'category', categories: ['Food', 'Transfer'], mode: 'exclude' }).description).toBe(
      'Exclude: Food, Transfer',
    );
  });

  it('needs at least one category', () => {
    expect(() => buildFilter({ kind: 'category', categories: [], mode: 'include' })).toThrow(ValidationError);
  });
});

describe('amount filters', () => {
  it('bounds inclusively', () => {
    expect(run({ kind: 'amount', min: 40, max: 300 })).toEqual(['b', 'd', 'e']);
  });

  it('has large and small presets', () => {
    expect(run({ kind: 'amount-preset', preset: 'large' })).toEqual(['a', 'c']);
    expect(run({ kind: 'amount-preset', preset: 'small' })).toEqual(['b', 'e', 'f']);
  });

  it('describes open bounds', () => {
    expect(buildFilter({ kind: 'amount', min: 40, max: null }).description).toBe('Between 40.00 and any');
  });

  it('rejects negative or crossed bounds', () => {
    expect(() => buildFilter({ kind: 'amount', min: -1, max: null })).toThrow(ValidationError);
    expect(() => buildFilter({ kind: 'amount', min: 50, max: 10 })).toThrow(ValidationError);
  });
});

describe('description filter', () => {
  it('matches case-insensitively by default', () => {
    expect(run({ kind: 'description', query: 'groceries', caseSensitive: false })).toEqual(['b']);
  });

  it('honours case when asked', () => {
    expect(run({ kind: 'description', query: 'groceries', caseSensitive: true })).toEqual([]);
    expect(run({ kind: 'description', query: 'Groceries', caseSensitive: true })).toEqual(['b']);
  });

  it('needs a query', () => {
    expect(() => buildFilter({ kind: 'description', query: '', caseSensitive: false })).toThrow(ValidationError);
  });

  it('describes itself', () => {
    expect(buildFilter({ kind: 'description', query: 'rent', caseSensitive: false }).description).toBe(
      'Contains "rent" (case-insensitive)',
    );
  });
});

describe('FilteringContext', () => {
  it('passes everything with no filters', () => {
    const context = new FilteringContext(clock);
    expect(context.hasFilters).toBe(false);
    expect(context.filterSummary).toBe('No filters');
    expect(context.apply(all)).toEqual(all);
  });

  it('combines filters with AND and keeps order', () => {
    const context = new FilteringContext(clock);
    context.addFilter({ kind: 'date', preset: 'this-month' });
    context.addFilter({ kind: 'amount-preset', preset: 'small' });
    expect(ids(context.apply(all))).toEqual([groceries.id, received.id]);
    expect(context.filterSummary).toBe('This Month, Small Amounts');
  });

  it('removes by 0-based index', () => {
    const context = new FilteringContext(clock);
    context.addFilter({ kind: 'transfers-only' });
    context.addFilter({ kind: 'amount-preset', preset: 'large' });
    expect(context.removeFilter(2)).toBe(false);
    expect(context.removeFilter(-1)).toBe(false);
    expect(context.removeFilter(0)).toBe(true);
    expect(context.activeFilters.map((f) => f.name)).toEqual(['Large Amounts']);
  });

  it('does not add an invalid filter', () => {
    const context = new FilteringContext(clock);
    expect(() => context.addFilter({ kind: 'amount', min: 5, max: 1 })).toThrow(ValidationError);
    expect(context.hasFilters).toBe(false);
  });

  it('clears everything', () => {
    const context = new FilteringContext(clock);
    context.addFilter({ kind: 'no-transfers' });
    context.clearFilters();
    expect(context.hasFilters).toBe(false);
  });

  it('hands out a copy of the active filters', () => {
    const context = new FilteringContext(clock);
    context.addFilter({ kind: 'no-transfers' });
    const snapshot = context.activeFilters;
    context.clearFilters();
    expect(snapshot).toHaveLength(1);
  });
});
