import type { Direction } from './types.js';

export const DEFAULT_CATEGORIES: Readonly<Record<Direction, readonly string[]>> = {
  income: ['Salary', 'Freelance', 'Investment', 'Gift', 'Other'],
  expense: ['Food', 'Transport', 'Entertainment', 'Bills', 'Shopping', 'Health', 'Other'],
};

/**
 * Known category names per direction. One instance is shared by every wallet
 * of a manager; names only ever accumulate.
 */
export class CategoryManager {
  private readonly byDirection: Record<Direction, Set<string>>;

  constructor(seed: Readonly<Record<Direction, readonly string[]>> = DEFAULT_CATEGORIES) {
    this.byDirection = {
      income: new Set(seed.income),
      expense: new Set(seed.expense),
    };
  }

  getCategories(direction: Direction): Set<string> {
    return new Set(this.byDirection[direction]);
  }

  addCategory(name: string, direction: Direction): void {
    this.byDirection[direction].add(name);
  }

  categoryExists(name: string, direction: Direction): boolean {
    return this.byDirection[direction].has(name);
  }
}
