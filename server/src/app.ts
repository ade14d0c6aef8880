import express, { type Response } from 'express';
import cors from 'cors';
import type { z } from 'zod';
import {
  AMOUNT_PRESETS,
  DATE_PRESETS,
  DIRECTION_PRESETS,
  isDepositWallet,
  NotFoundError,
  TRANSACTION_SORTS,
  ValidationError,
  WALLET_SORTS,
  type Transaction,
  type Wallet,
  type WalletManager,
} from '../../src/domain/index.js';
import type { LedgerSink } from './db.js';
import {
  CategoryQuery,
  CreateWalletBody,
  CurrentWalletBody,
  FilterBody,
  StrategyBody,
  TransactionBody,
  TransactionEditBody,
  TransferBody,
  UpdateWalletBody,
} from './schemas.js';
import {
  toBreakdownJson,
  toDepositJson,
  toFilterJson,
  toPeriodJson,
  toTransactionJson,
  toWalletJson,
} from './serializers.js';

export interface AppOptions {
  manager: WalletManager;
  store: LedgerSink;
  corsOrigin?: string;
}

/** A request body that failed its schema */
class BodyError extends ValidationError {
  constructor(readonly issues: z.ZodIssue[]) {
    super(issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; '));
  }
}

function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const result = schema.safeParse(body);
  if (!result.success) throw new BodyError(result.error.issues);
  return result.data;
}

function parsePosition(raw: string): number {
  const position = Number(raw);
  if (!Number.isInteger(position) || position < 1) {
    throw new ValidationError(`Position must be a whole number from 1, got "${raw}"`);
  }
  return position;
}

function sendError(res: Response, error: unknown, action: string): void {
  if (error instanceof BodyError) {
    res.status(400).json({ error: error.message, issues: error.issues });
    return;
  }
  if (error instanceof ValidationError) {
    res.status(400).json({ error: error.message });
    return;
  }
  if (error instanceof NotFoundError) {
    res.status(404).json({ error: error.message });
    return;
  }
  console.error(`Error trying to ${action}:`, error);
  res.status(500).json({ error: `Failed to ${action}` });
}

export function createApp({ manager, store, corsOrigin }: AppOptions): express.Express {
  const app = express();

  app.use(cors(corsOrigin ? { origin: corsOrigin } : undefined));
  app.use(express.json());

  function requireWallet(name: string): Wallet {
    const wallet = manager.getWallet(name);
    if (!wallet) throw new NotFoundError(`Wallet "${name}" not found`);
    return wallet;
  }

  function requireTransaction(wallet: Wallet, id: string): Transaction {
    const transaction = wallet.getById(id);
    if (!transaction) throw new NotFoundError(`Transaction ${id} not found in wallet "${wallet.name}"`);
    return transaction;
  }

  function requirePosition(wallet: Wallet, raw: string): Transaction {
    const position = parsePosition(raw);
    const transaction = wallet.getByPosition(position);
    if (!transaction) throw new NotFoundError(`No transaction at position ${position} in wallet "${wallet.name}"`);
    return transaction;
  }

  function editTransaction(wallet: Wallet, id: string, body: unknown) {
    const edit = parseBody(TransactionEditBody, body);
    if (!wallet.updateTransaction(id, edit)) {
      throw new NotFoundError(`Transaction ${id} not found in wallet "${wallet.name}"`);
    }
    store.save(manager);
    return toTransactionJson(requireTransaction(wallet, id));
  }

  function removeTransaction(wallet: Wallet, id: string) {
    if (!wallet.deleteTransaction(id)) {
      throw new NotFoundError(`Transaction ${id} not found in wallet "${wallet.name}"`);
    }
    store.save(manager);
    return { ok: true, wallet: toWalletJson(wallet) };
  }

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  // GET /strategies - sort keys and filter presets a client can offer
  app.get('/strategies', (_req, res) => {
    res.json({
      transaction_sorts: Object.values(TRANSACTION_SORTS).map(({ key, name }) => ({ key, name })),
      wallet_sorts: Object.values(WALLET_SORTS).map(({ key, name }) => ({ key, name })),
      date_presets: DATE_PRESETS,
      direction_presets: DIRECTION_PRESETS,
      amount_presets: AMOUNT_PRESETS,
    });
  });

  // GET /categories?direction=income|expense - known names, sorted
  app.get('/categories', (req, res) => {
    try {
      const { direction } = parseBody(CategoryQuery, req.query);
      const categories = Array.from(manager.categories.getCategories(direction)).sort();
      res.json({ direction, categories });
    } catch (error) {
      sendError(res, error, 'fetch categories');
    }
  });

  // --- Wallets ---

  // GET /wallets - all wallets in the active wallet order
  app.get('/wallets', (_req, res) => {
    res.json(manager.getSortedWallets().map(toWalletJson));
  });

  // POST /wallets - create a regular or deposit wallet
  app.post('/wallets', (req, res) => {
    try {
      const input = parseBody(CreateWalletBody, req.body);
      const wallet = manager.createWallet(input);
      store.save(manager);
      res.status(201).json(toWalletJson(wallet));
    } catch (error) {
      sendError(res, error, 'create wallet');
    }
  });

  app.get('/wallets/:name', (req, res) => {
    try {
      res.json(toWalletJson(requireWallet(req.params.name)));
    } catch (error) {
      sendError(res, error, 'fetch wallet');
    }
  });

  app.patch('/wallets/:name', (req, res) => {
    try {
      const changes = parseBody(UpdateWalletBody, req.body);
      const wallet = requireWallet(req.params.name);
      manager.updateWallet(wallet.name, changes);
      store.save(manager);
      res.json(toWalletJson(wallet));
    } catch (error) {
      sendError(res, error, 'update wallet');
    }
  });

  // DELETE /wallets/:name - also removes transfer partners in other wallets
  app.delete('/wallets/:name', (req, res) => {
    try {
      const wallet = requireWallet(req.params.name);
      manager.removeWallet(wallet.name);
      store.save(manager);
      res.json({ ok: true, current: manager.currentWallet?.name ?? null });
    } catch (error) {
      sendError(res, error, 'delete wallet');
    }
  });

  // PUT /wallet-sorting - choose how GET /wallets orders wallets
  app.put('/wallet-sorting', (req, res) => {
    try {
      const { key } = parseBody(StrategyBody, req.body);
      if (!manager.sortingContext.setStrategy(key)) {
        throw new ValidationError(`Unknown wallet sorting "${key}"`);
      }
      store.save(manager);
      res.json({ key: manager.sortingContext.currentKey, name: manager.sortingContext.currentStrategy.name });
    } catch (error) {
      sendError(res, error, 'set wallet sorting');
    }
  });

  // --- Current wallet ---

  app.get('/current', (_req, res) => {
    const wallet = manager.currentWallet;
    res.json({ wallet: wallet ? toWalletJson(wallet) : null });
  });

  app.put('/current', (req, res) => {
    try {
      const { name } = parseBody(CurrentWalletBody, req.body);
      if (!manager.switchWallet(name)) throw new NotFoundError(`Wallet "${name}" not found`);
      store.save(manager);
      res.json({ wallet: toWalletJson(requireWallet(name)) });
    } catch (error) {
      sendError(res, error, 'switch wallet');
    }
  });

  // --- Transactions ---

  // GET /wallets/:name/transactions?view=sorted|filtered
  app.get('/wallets/:name/transactions', (req, res) => {
    try {
      const wallet = requireWallet(req.params.name);
      const view = req.query.view === 'sorted' ? 'sorted' : 'filtered';
      const transactions = view === 'sorted' ? wallet.getSortedTransactions() : wallet.getFilteredTransactions();
      res.json({
        view,
        sorting: wallet.sortingContext.currentKey,
        filters: wallet.filteringContext.filterSummary,
        total_count: wallet.transactionCount,
        transactions: transactions.map(toTransactionJson),
        // Period figures only describe a filtered view
        period: view === 'filtered' ? toPeriodJson(wallet.getFilteredSummary()) : null,
      });
    } catch (error) {
      sendError(res, error, 'fetch transactions');
    }
  });

  app.post('/wallets/:name/transactions', (req, res) => {
    try {
      const wallet = requireWallet(req.params.name);
      const input = parseBody(TransactionBody, req.body);
      const transaction = wallet.record(input);
      store.save(manager);
      res.status(201).json(toTransactionJson(transaction));
    } catch (error) {
      sendError(res, error, 'create transaction');
    }
  });

  app.get('/wallets/:name/transactions/:id', (req, res) => {
    try {
      const wallet = requireWallet(req.params.name);
      res.json(toTransactionJson(requireTransaction(wallet, req.params.id)));
    } catch (error) {
      sendError(res, error, 'fetch transaction');
    }
  });

  app.patch('/wallets/:name/transactions/:id', (req, res) => {
    try {
      const wallet = requireWallet(req.params.name);
      res.json(editTransaction(wallet, req.params.id, req.body));
    } catch (error) {
      sendError(res, error, 'update transaction');
    }
  });

  app.delete('/wallets/:name/transactions/:id', (req, res) => {
    try {
      const wallet = requireWallet(req.params.name);
      res.json(removeTransaction(wallet, req.params.id));
    } catch (error) {
      sendError(res, error, 'delete transaction');
    }
  });

  // Same three operations addressed by 1-based position in the current sort order
  app.get('/wallets/:name/positions/:position', (req, res) => {
    try {
      const wallet = requireWallet(req.params.name);
      res.json(toTransactionJson(requirePosition(wallet, req.params.position)));
    } catch (error) {
      sendError(res, error, 'fetch transaction');
    }
  });

  app.patch('/wallets/:name/positions/:position', (req, res) => {
    try {
      const wallet = requireWallet(req.params.name);
      const target = requirePosition(wallet, req.params.position);
      res.json(editTransaction(wallet, target.id, req.body));
    } catch (error) {
      sendError(res, error, 'update transaction');
    }
  });

  app.delete('/wallets/:name/positions/:position', (req, res) => {
    try {
      const wallet = requireWallet(req.params.name);
      const target = requirePosition(wallet, req.params.position);
      res.json(removeTransaction(wallet, target.id));
    } catch (error) {
      sendError(res, error, 'delete transaction');
    }
  });

  // POST /transfers - linked expense on `from`, income on `to`
  app.post('/transfers', (req, res) => {
    try {
      const body = parseBody(TransferBody, req.body);
      const from = requireWallet(body.from);
      const to = requireWallet(body.to);
      if (!manager.transfer(from.name, to.name, body.amount, body.description, body.created_at)) {
        throw new ValidationError('Transfer needs two different wallets and a positive amount');
      }
      store.save(manager);
      res.status(201).json({ from: toWalletJson(from), to: toWalletJson(to) });
    } catch (error) {
      sendError(res, error, 'create transfer');
    }
  });

  // --- Views ---

  app.get('/wallets/:name/breakdown', (req, res) => {
    try {
      res.json(toBreakdownJson(requireWallet(req.params.name)));
    } catch (error) {
      sendError(res, error, 'compute breakdown');
    }
  });

  app.get('/wallets/:name/deposit', (req, res) => {
    try {
      const wallet = requireWallet(req.params.name);
      if (!isDepositWallet(wallet)) throw new ValidationError(`Wallet "${wallet.name}" is not a deposit`);
      res.json(toDepositJson(wallet));
    } catch (error) {
      sendError(res, error, 'compute deposit summary');
    }
  });

  app.put('/wallets/:name/sorting', (req, res) => {
    try {
      const wallet = requireWallet(req.params.name);
      const { key } = parseBody(StrategyBody, req.body);
      if (!wallet.sortingContext.setStrategy(key)) {
        throw new ValidationError(`Unknown transaction sorting "${key}"`);
      }
      store.save(manager);
      res.json({ key: wallet.sortingContext.currentKey, name: wallet.sortingContext.currentStrategy.name });
    } catch (error) {
      sendError(res, error, 'set transaction sorting');
    }
  });

  // --- Filters (view state, not persisted) ---

  app.get('/wallets/:name/filters', (req, res) => {
    try {
      const context = requireWallet(req.params.name).filteringContext;
      res.json({ summary: context.filterSummary, filters: context.activeFilters.map(toFilterJson) });
    } catch (error) {
      sendError(res, error, 'fetch filters');
    }
  });

  app.post('/wallets/:name/filters', (req, res) => {
    try {
      const context = requireWallet(req.params.name).filteringContext;
      const filter = context.addFilter(parseBody(FilterBody, req.body));
      res.status(201).json(toFilterJson(filter, context.activeFilters.length - 1));
    } catch (error) {
      sendError(res, error, 'add filter');
    }
  });

  app.delete('/wallets/:name/filters', (req, res) => {
    try {
      requireWallet(req.params.name).filteringContext.clearFilters();
      res.json({ ok: true });
    } catch (error) {
      sendError(res, error, 'clear filters');
    }
  });

  app.delete('/wallets/:name/filters/:index', (req, res) => {
    try {
      const context = requireWallet(req.params.name).filteringContext;
      const index = Number(req.params.index);
      if (!context.removeFilter(index)) throw new NotFoundError(`No filter at index ${req.params.index}`);
      res.json({ ok: true, summary: context.filterSummary });
    } catch (error) {
      sendError(res, error, 'remove filter');
    }
  });

  return app;
}
