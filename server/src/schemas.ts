/**
 * Request body schemas. Bodies are snake_case, like the stored rows; each
 * schema hands the domain its camelCase input.
 */
import { z } from 'zod';
import type { FilterSpec } from '../../src/domain/index.js';

// ISO strings or epoch milliseconds; null and booleans are refused
const dateInput = z.union([z.string(), z.number()]).pipe(z.coerce.date());

const direction = z.enum(['income', 'expense']);

export const CreateWalletBody = z
  .object({
    name: z.string().min(1).max(100),
    type: z.enum(['regular', 'deposit']).default('regular'),
    currency: z.string().max(10).optional(),
    description: z.string().max(500).optional(),
    starting_balance: z.number().nonnegative().optional(),
    created_at: dateInput.optional(),
    interest_rate: z.number().optional(),
    term_months: z.number().optional(),
    capitalization: z.boolean().optional(),
  })
  .transform((body) => ({
    kind: body.type,
    name: body.name,
    currency: body.currency,
    description: body.description,
    startingBalance: body.starting_balance,
    createdAt: body.created_at,
    interestRate: body.interest_rate,
    termMonths: body.term_months,
    capitalization: body.capitalization,
  }));

export const UpdateWalletBody = z
  .object({
    name: z.string().min(1).max(100).optional(),
    currency: z.string().max(10).optional(),
    description: z.string().max(500).optional(),
    interest_rate: z.number().optional(),
    term_months: z.number().optional(),
    capitalization: z.boolean().optional(),
  })
  .transform((body) => ({
    name: body.name,
    currency: body.currency,
    description: body.description,
    interestRate: body.interest_rate,
    termMonths: body.term_months,
    capitalization: body.capitalization,
  }));

export const TransactionBody = z
  .object({
    amount: z.number(),
    direction,
    category: z.string(),
    description: z.string().max(500).optional(),
    created_at: dateInput.optional(),
  })
  .transform((body) => ({
    amount: body.amount,
    direction: body.direction,
    category: body.category,
    description: body.description,
    createdAt: body.created_at,
  }));

export const TransactionEditBody = z
  .object({
    amount: z.number().optional(),
    direction: direction.optional(),
    category: z.string().optional(),
    description: z.string().max(500).optional(),
    created_at: dateInput.optional(),
  })
  .transform((body) => ({
    amount: body.amount,
    direction: body.direction,
    category: body.category,
    description: body.description,
    createdAt: body.created_at,
  }));

export const TransferBody = z.object({
  from: z.string().min(1),
  to: z.string().min(1),
  amount: z.number(),
  description: z.string().max(500).default(''),
  created_at: dateInput.optional(),
});

export const CategoryQuery = z.object({ direction });

export const StrategyBody = z.object({ key: z.string() });

export const CurrentWalletBody = z.object({ name: z.string().min(1) });

const datePreset = z.enum(['today', 'this-week', 'last-week', 'this-month', 'last-month', 'this-year', 'last-year']);

export const FilterBody: z.ZodType<FilterSpec, z.ZodTypeDef, unknown> = z.union([
  z.object({ kind: z.literal('date'), preset: datePreset }),
  z.object({
    kind: z.literal('date-range'),
    from: dateInput.nullable().default(null),
    to: dateInput.nullable().default(null),
  }),
  z.object({ kind: z.literal('income'), include_transfers: z.boolean().default(false) })
    .transform((f) => ({ kind: f.kind, includeTransfers: f.include_transfers })),
  z.object({ kind: z.literal('expense'), include_transfers: z.boolean().default(false) })
    .transform((f) => ({ kind: f.kind, includeTransfers: f.include_transfers })),
  z.object({ kind: z.literal('transfers-only') }),
  z.object({ kind: z.literal('no-transfers') }),
  z.object({
    kind: z.literal('category'),
    categories: z.array(z.string()),
    mode: z.enum(['include', 'exclude']).default('include'),
  }),
  z.object({
    kind: z.literal('amount'),
    min: z.number().nullable().default(null),
    max: z.number().nullable().default(null),
  }),
  z.object({ kind: z.literal('amount-preset'), preset: z.enum(['large', 'small']) }),
  z.object({ kind: z.literal('description'), query: z.string(), case_sensitive: z.boolean().default(false) })
    .transform((f) => ({ kind: f.kind, query: f.query, caseSensitive: f.case_sensitive })),
]);
