/**
 * HTTP API tests against an in-process server on an ephemeral port.
 */
import type { Server } from 'http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { WalletManager } from '../../src/domain/index.js';
import { createApp } from '../src/app.js';
import { LedgerStore, openDatabase, type LedgerDatabase } from '../src/db.js';

const now = new Date(2024, 2, 13, 12);

let db: LedgerDatabase;
let server: Server;
let base: string;

beforeEach(async () => {
  db = openDatabase(':memory:');
  const store = new LedgerStore(db);
  const manager = new WalletManager({ clock: () => new Date(now.getTime()) });
  const app = createApp({ manager, store });
  server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const { port } = z.object({ port: z.number() }).parse(server.address());
  base = `http://127.0.0.1:${port}`;
});

afterEach(async () => {
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
  db.close();
});

async function call(method: string, path: string, body?: unknown): Promise<{ status: number; body: unknown }> {
  const response = await fetch(`${base}${path}`, {
    method,
    headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  return { status: response.status, body: await response.json() };
}

const WithId = z.object({ id: z.string() });
const TransactionList = z.object({ transactions: z.array(z.object({ id: z.string(), amount: z.number() })) });

async function createWallet(name: string, extra: Record<string, unknown> = {}) {
  const res = await call('POST', '/wallets', { name, ...extra });
  expect(res.status).toBe(201);
  return res.body;
}

describe('health and strategies', () => {
  it('answers health checks', async () => {
    expect(await call('GET', '/health')).toEqual({ status: 200, body: { ok: true } });
  });

  it('lists sort keys and presets', async () => {
    const res = await call('GET', '/strategies');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      transaction_sorts: [
        { key: 'recent', name: 'Most Recent' },
        { key: 'amount', name: 'High to Low' },
        { key: 'category', name: 'Alphabetical by Category' },
      ],
      amount_presets: { large: 'Large Amounts', small: 'Small Amounts' },
    });
  });
});

describe('wallets', () => {
  it('creates a wallet with a starting balance', async () => {
    const body = await createWallet('Cash', { starting_balance: 1000 });
    expect(body).toMatchObject({
      name: 'Cash',
      type: 'regular',
      currency: 'USD',
      balance: 1000,
      total_income: 1000,
      transaction_count: 1,
      sorting: 'recent',
      deposit: null,
      created_at: now.toISOString(),
    });
  });

  it('rejects a duplicate name regardless of case', async () => {
    await createWallet('Cash');
    const res = await call('POST', '/wallets', { name: 'cash' });
    expect(res).toEqual({ status: 400, body: { error: 'A wallet named "cash" already exists' } });
  });

  it('reports schema failures with their issues', async () => {
    const res = await call('POST', '/wallets', { starting_balance: -5 });
    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ issues: expect.any(Array) });
  });

  it('404s an unknown wallet', async () => {
    expect(await call('GET', '/wallets/Nowhere')).toEqual({
      status: 404,
      body: { error: 'Wallet "Nowhere" not found' },
    });
  });

  it('lists wallets in the chosen order', async () => {
    await createWallet('Cash', { starting_balance: 50 });
    await createWallet('Bank', { starting_balance: 900 });
    const names = async () =>
      z.array(z.object({ name: z.string() })).parse((await call('GET', '/wallets')).body).map((w) => w.name);

    expect(await names()).toEqual(['Bank', 'Cash']);
    expect((await call('PUT', '/wallet-sorting', { key: 'name' })).body).toEqual({ key: 'name', name: 'Alphabetical' });
    expect((await call('PUT', '/wallet-sorting', { key: 'shoe-size' })).status).toBe(400);
  });

  it('renames and deletes', async () => {
    await createWallet('Cash');
    await createWallet('Bank');
    const renamed = await call('PATCH', '/wallets/cash', { name: 'Pocket' });
    expect(renamed.body).toMatchObject({ name: 'Pocket' });

    const removed = await call('DELETE', '/wallets/Pocket');
    expect(removed).toEqual({ status: 200, body: { ok: true, current: 'Bank' } });
    expect((await call('GET', '/current')).body).toMatchObject({ wallet: { name: 'Bank' } });
  });

  it('switches the current wallet', async () => {
    await createWallet('Cash');
    await createWallet('Bank');
    expect((await call('PUT', '/current', { name: 'bank' })).body).toMatchObject({ wallet: { name: 'Bank' } });
    expect((await call('PUT', '/current', { name: 'Nowhere' })).status).toBe(404);
  });
});

describe('transactions', () => {
  it('records, edits by position and deletes by id', async () => {
    await createWallet('Cash', { starting_balance: 500, created_at: '2024-01-01T00:00:00.000Z' });
    const created = await call('POST', '/wallets/Cash/transactions', {
      amount: 80,
      direction: 'expense',
      category: 'Food',
      description: 'market',
    });
    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({ amount: 80, signed_amount: -80, category: 'Food', is_transfer: false });
    const { id } = WithId.parse(created.body);

    // Most recent first: the new record sits at position 1
    const edited = await call('PATCH', '/wallets/Cash/positions/1', { amount: 20 });
    expect(edited.body).toMatchObject({ id, amount: 20 });
    expect((await call('GET', '/wallets/Cash')).body).toMatchObject({ balance: 480 });

    const removed = await call('DELETE', `/wallets/Cash/transactions/${id}`);
    expect(removed.body).toMatchObject({ ok: true, wallet: { balance: 500, transaction_count: 1 } });
    expect((await call('GET', `/wallets/Cash/transactions/${id}`)).status).toBe(404);
  });

  it('refuses a null date instead of dating the record 1970', async () => {
    await createWallet('Cash');
    await createWallet('Bank');
    const res = await call('POST', '/wallets/Cash/transactions', {
      amount: 5,
      direction: 'expense',
      category: 'Food',
      created_at: null,
    });
    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ issues: expect.any(Array) });
    expect((await call('POST', '/transfers', { from: 'Cash', to: 'Bank', amount: 5, created_at: null })).status).toBe(400);
    expect((await call('POST', '/wallets/Cash/transactions', { amount: 5, direction: 'expense', category: 'Food', created_at: true })).status).toBe(400);
    expect((await call('GET', '/wallets/Cash')).body).toMatchObject({ transaction_count: 0 });
  });

  it('takes an ISO date string', async () => {
    await createWallet('Cash');
    const res = await call('POST', '/wallets/Cash/transactions', {
      amount: 5,
      direction: 'expense',
      category: 'Food',
      created_at: '2024-02-10T08:00:00.000Z',
    });
    expect(res.body).toMatchObject({ created_at: '2024-02-10T08:00:00.000Z' });
  });

  it('rejects a bad position and an invalid amount', async () => {
    await createWallet('Cash');
    expect((await call('GET', '/wallets/Cash/positions/zero')).status).toBe(400);
    expect((await call('GET', '/wallets/Cash/positions/3')).status).toBe(404);
    const res = await call('POST', '/wallets/Cash/transactions', { amount: 0, direction: 'expense', category: 'Food' });
    expect(res).toEqual({ status: 400, body: { error: 'Amount must be a positive number, got 0' } });
  });

  it('sorts the listing by the chosen key', async () => {
    await createWallet('Cash');
    await call('POST', '/wallets/Cash/transactions', { amount: 5, direction: 'expense', category: 'Food' });
    await call('POST', '/wallets/Cash/transactions', { amount: 90, direction: 'expense', category: 'Bills' });

    expect((await call('PUT', '/wallets/Cash/sorting', { key: 'amount' })).body).toEqual({
      key: 'amount',
      name: 'High to Low',
    });
    const listing = TransactionList.parse((await call('GET', '/wallets/Cash/transactions?view=sorted')).body);
    expect(listing.transactions.map((t) => t.amount)).toEqual([90, 5]);
    expect((await call('PUT', '/wallets/Cash/sorting', { key: 'price' })).status).toBe(400);
  });
});

describe('transfers', () => {
  it('moves money and links both sides', async () => {
    await createWallet('Cash', { starting_balance: 1000 });
    await createWallet('Bank', { starting_balance: 200, created_at: '2024-01-01T00:00:00.000Z' });
    const res = await call('POST', '/transfers', { from: 'Cash', to: 'Bank', amount: 300 });
    expect(res.status).toBe(201);
    expect(res.body).toMatchObject({ from: { balance: 700 }, to: { balance: 500 } });

    const listing = await call('GET', '/wallets/Bank/transactions?view=sorted');
    expect(listing.body).toMatchObject({
      transactions: [{ category: 'Transfer', direction: 'income', is_transfer: true, created_at: now.toISOString() }, {}],
    });
  });

  it('refuses a transfer to the same wallet', async () => {
    await createWallet('Cash', { starting_balance: 10 });
    const res = await call('POST', '/transfers', { from: 'Cash', to: 'cash', amount: 5 });
    expect(res.status).toBe(400);
  });

  it('404s an unknown side', async () => {
    await createWallet('Cash');
    expect((await call('POST', '/transfers', { from: 'Cash', to: 'Nowhere', amount: 5 })).status).toBe(404);
  });
});

describe('categories', () => {
  it('lists known names per direction, sorted', async () => {
    await createWallet('Cash');
    await call('POST', '/wallets/Cash/transactions', { amount: 30, direction: 'expense', category: 'Pets' });
    expect(await call('GET', '/categories?direction=expense')).toEqual({
      status: 200,
      body: {
        direction: 'expense',
        categories: ['Bills', 'Entertainment', 'Food', 'Health', 'Other', 'Pets', 'Shopping', 'Transport'],
      },
    });
    expect((await call('GET', '/categories?direction=income')).body).toEqual({
      direction: 'income',
      categories: ['Freelance', 'Gift', 'Investment', 'Other', 'Salary'],
    });
  });

  it('needs a valid direction', async () => {
    expect((await call('GET', '/categories')).status).toBe(400);
    expect((await call('GET', '/categories?direction=sideways')).status).toBe(400);
  });
});

describe('filters', () => {
  it('narrows the default listing until removed', async () => {
    await createWallet('Cash', { starting_balance: 1000 });
    await call('POST', '/wallets/Cash/transactions', { amount: 25, direction: 'expense', category: 'Food' });

    const added = await call('POST', '/wallets/Cash/filters', { kind: 'expense' });
    expect(added).toEqual({
      status: 201,
      body: {
        index: 0,
        kind: 'expense',
        name: 'Expense Only',
        description: 'Expenses only (transfers excluded)',
        spec: { kind: 'expense', includeTransfers: false },
      },
    });

    const filtered = await call('GET', '/wallets/Cash/transactions');
    expect(filtered.body).toMatchObject({ view: 'filtered', filters: 'Expense Only', total_count: 2 });
    expect(TransactionList.parse(filtered.body).transactions.map((t) => t.amount)).toEqual([25]);

    expect((await call('DELETE', '/wallets/Cash/filters/4')).status).toBe(404);
    expect((await call('DELETE', '/wallets/Cash/filters/0')).body).toEqual({ ok: true, summary: 'No filters' });
  });

  it('reports period figures for the filtered view only', async () => {
    await createWallet('Cash', { starting_balance: 1000, created_at: '2024-01-01T00:00:00.000Z' });
    await call('POST', '/wallets/Cash/transactions', { amount: 25, direction: 'expense', category: 'Food' });
    await call('POST', '/wallets/Cash/filters', { kind: 'expense' });

    expect((await call('GET', '/wallets/Cash/transactions')).body).toMatchObject({
      period: {
        transaction_count: 1,
        balance: -25,
        total_income: 0,
        total_expense: 25,
        income_by_category: [],
        expense_by_category: [{ category: 'Food', amount: 25 }],
        income_percentages: [],
        expense_percentages: [{ category: 'Food', percent: 100 }],
      },
    });
    expect((await call('GET', '/wallets/Cash/transactions?view=sorted')).body).toMatchObject({ period: null });
  });

  it('rejects an invalid filter', async () => {
    await createWallet('Cash');
    expect((await call('POST', '/wallets/Cash/filters', { kind: 'amount', min: 10, max: 1 })).status).toBe(400);
    expect((await call('POST', '/wallets/Cash/filters', { kind: 'mood' })).status).toBe(400);
    expect((await call('GET', '/wallets/Cash/filters')).body).toEqual({ summary: 'No filters', filters: [] });
  });
});

describe('deposits and breakdowns', () => {
  it('summarises a deposit', async () => {
    await createWallet('Savings', {
      type: 'deposit',
      starting_balance: 1000,
      interest_rate: 12,
      term_months: 12,
      capitalization: false,
    });
    const res = await call('GET', '/wallets/Savings/deposit');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      principal: 1000,
      interest_rate: 12,
      term_months: 12,
      is_matured: false,
      months_elapsed: 0,
      maturity_date: new Date(2025, 2, 13, 12).toISOString(),
    });
  });

  it('refuses a deposit summary for a regular wallet', async () => {
    await createWallet('Cash');
    expect((await call('GET', '/wallets/Cash/deposit')).status).toBe(400);
  });

  it('breaks a wallet down by category', async () => {
    await createWallet('Cash');
    await call('POST', '/wallets/Cash/transactions', { amount: 300, direction: 'income', category: 'Gift' });
    await call('POST', '/wallets/Cash/transactions', { amount: 100, direction: 'expense', category: 'Food' });
    expect((await call('GET', '/wallets/Cash/breakdown')).body).toEqual({
      income_by_category: [{ category: 'Gift', amount: 300 }],
      expense_by_category: [{ category: 'Food', amount: 100 }],
      income_percentages: [{ category: 'Gift', percent: 100 }],
      expense_percentages: [{ category: 'Food', percent: 100 }],
      category_totals: [
        { category: 'Gift', amount: 300 },
        { category: 'Food', amount: -100 },
      ],
      category_percentages: [
        { category: 'Gift', percent: 75 },
        { category: 'Food', percent: 25 },
      ],
    });
  });
});

describe('persistence', () => {
  it('saves after every change', async () => {
    await createWallet('Cash', { starting_balance: 100 });
    await createWallet('Bank');
    await call('POST', '/transfers', { from: 'Cash', to: 'Bank', amount: 40 });

    const reloaded = new LedgerStore(db).load();
    expect(reloaded.getWallet('Cash')?.balance).toBe(60);
    expect(reloaded.getWallet('Bank')?.balance).toBe(40);
    expect(reloaded.currentWallet?.name).toBe('Cash');
  });
});
