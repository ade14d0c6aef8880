import Database from 'better-sqlite3';
import { z } from 'zod';
import {
  DepositWallet,
  InvariantViolation,
  isDepositWallet,
  isTransfer,
  Transaction,
  Transfer,
  Wallet,
  WalletManager,
  type Clock,
} from '../../src/domain/index.js';

export type LedgerDatabase = Database.Database;

/** Opens (or creates) the ledger database and makes sure the tables exist */
export function openDatabase(filename: string): LedgerDatabase {
  const db = new Database(filename);

  if (filename !== ':memory:') {
    // Enable WAL mode for better performance
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');

  db.exec(`
    CREATE TABLE IF NOT EXISTS wallets (
      id TEXT PRIMARY KEY,
      position INTEGER NOT NULL,
      name TEXT NOT NULL UNIQUE COLLATE NOCASE,
      kind TEXT NOT NULL DEFAULT 'regular',
      currency TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      created_at TEXT NOT NULL,
      sort_key TEXT NOT NULL DEFAULT 'recent',
      interest_rate REAL,
      term_months INTEGER,
      capitalization INTEGER
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS transactions (
      id TEXT PRIMARY KEY,
      position INTEGER NOT NULL,
      wallet_id TEXT NOT NULL REFERENCES wallets(id) ON DELETE CASCADE,
      kind TEXT NOT NULL DEFAULT 'regular',
      amount REAL NOT NULL CHECK (amount > 0),
      direction TEXT NOT NULL,
      category TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      created_at TEXT NOT NULL,
      linked_wallet_id TEXT,
      linked_transaction_id TEXT
    )
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_transactions_wallet ON transactions(wallet_id)
  `);

  // Settings table (single-row)
  db.exec(`
    CREATE TABLE IF NOT EXISTS settings (
      id INTEGER PRIMARY KEY CHECK (id = 1),
      current_wallet_id TEXT,
      wallet_sort_key TEXT NOT NULL DEFAULT 'balance'
    )
  `);
  db.exec(`INSERT OR IGNORE INTO settings (id) VALUES (1)`);

  return db;
}

// Rows are checked on the way in rather than trusted
const WalletRow = z.object({
  id: z.string(),
  name: z.string(),
  kind: z.enum(['regular', 'deposit']),
  currency: z.string(),
  description: z.string(),
  created_at: z.string(),
  sort_key: z.string(),
  interest_rate: z.number().nullable(),
  term_months: z.number().int().nullable(),
  capitalization: z.number().int().nullable(),
});
type WalletRow = z.infer<typeof WalletRow>;

const TransactionRow = z.object({
  id: z.string(),
  wallet_id: z.string(),
  kind: z.enum(['regular', 'transfer']),
  amount: z.number(),
  direction: z.enum(['income', 'expense']),
  category: z.string(),
  description: z.string(),
  created_at: z.string(),
  linked_wallet_id: z.string().nullable(),
  linked_transaction_id: z.string().nullable(),
});
type TransactionRow = z.infer<typeof TransactionRow>;

const SettingsRow = z.object({
  current_wallet_id: z.string().nullable(),
  wallet_sort_key: z.string(),
});

/** Where the HTTP layer writes the ledger after each change */
export interface LedgerSink {
  save(manager: WalletManager): void;
}

/**
 * Stores a whole WalletManager in SQLite: every wallet, every transaction
 * (transfer links included) and the current-wallet cursor.
 */
export class LedgerStore implements LedgerSink {
  constructor(private readonly db: LedgerDatabase) {}

  /** Rewrites every row in one SQLite transaction */
  save(manager: WalletManager): void {
    const insertWallet = this.db.prepare(`
      INSERT INTO wallets (id, position, name, kind, currency, description, created_at, sort_key, interest_rate, term_months, capitalization)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertTransaction = this.db.prepare(`
      INSERT INTO transactions (id, position, wallet_id, kind, amount, direction, category, description, created_at, linked_wallet_id, linked_transaction_id)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const writeAll = this.db.transaction((m: WalletManager) => {
      this.db.exec('DELETE FROM transactions');
      this.db.exec('DELETE FROM wallets');

      m.getWallets().forEach((wallet, position) => {
        const deposit = isDepositWallet(wallet) ? wallet : null;
        insertWallet.run(
          wallet.id,
          position,
          wallet.name,
          wallet.kind,
          wallet.currency,
          wallet.description,
          wallet.createdAt.toISOString(),
          wallet.sortingContext.currentKey,
          deposit ? deposit.interestRate : null,
          deposit ? deposit.termMonths : null,
          deposit ? Number(deposit.capitalization) : null,
        );

        wallet.transactions().forEach((t, index) => {
          const link = isTransfer(t) ? t.link : null;
          insertTransaction.run(
            t.id,
            index,
            wallet.id,
            isTransfer(t) ? 'transfer' : 'regular',
            t.amount,
            t.direction,
            t.category,
            t.description,
            t.createdAt.toISOString(),
            link?.walletId ?? null,
            link?.transactionId ?? null,
          );
        });
      });

      this.db
        .prepare('UPDATE settings SET current_wallet_id = ?, wallet_sort_key = ? WHERE id = 1')
        .run(m.currentWallet?.id ?? null, m.sortingContext.currentKey);
    });

    writeAll(manager);
  }

  /** Rebuilds the manager; throws InvariantViolation on a dangling transfer */
  load(clock?: Clock): WalletManager {
    const manager = new WalletManager({ clock });

    const walletRows = z
      .array(WalletRow)
      .parse(this.db.prepare('SELECT * FROM wallets ORDER BY position').all());
    for (const row of walletRows) {
      const wallet = walletFromRow(row, manager.clock);
      manager.addWallet(wallet);
      wallet.sortingContext.setStrategy(row.sort_key);
    }

    const transactionRows = z
      .array(TransactionRow)
      .parse(this.db.prepare('SELECT * FROM transactions ORDER BY wallet_id, position').all());
    for (const row of transactionRows) {
      const wallet = manager.getWalletById(row.wallet_id);
      if (!wallet) {
        throw new InvariantViolation(`Transaction ${row.id} belongs to unknown wallet ${row.wallet_id}`);
      }
      wallet.addTransaction(transactionFromRow(row));
    }

    verifyLinks(manager);

    const settings = SettingsRow.parse(
      this.db.prepare('SELECT current_wallet_id, wallet_sort_key FROM settings WHERE id = 1').get(),
    );
    manager.sortingContext.setStrategy(settings.wallet_sort_key);
    const current = settings.current_wallet_id ? manager.getWalletById(settings.current_wallet_id) : null;
    if (current) manager.switchWallet(current.name);

    return manager;
  }
}

function walletFromRow(row: WalletRow, clock: Clock): Wallet {
  const init = {
    id: row.id,
    name: row.name,
    currency: row.currency,
    description: row.description,
    createdAt: new Date(row.created_at),
    clock,
  };
  if (row.kind === 'regular') return new Wallet(init);

  if (row.interest_rate === null || row.term_months === null) {
    throw new InvariantViolation(`Deposit wallet ${row.id} is stored without its terms`);
  }
  return new DepositWallet({
    ...init,
    interestRate: row.interest_rate,
    termMonths: row.term_months,
    capitalization: row.capitalization !== 0,
  });
}

function transactionFromRow(row: TransactionRow): Transaction {
  const common = {
    id: row.id,
    amount: row.amount,
    direction: row.direction,
    description: row.description,
    createdAt: new Date(row.created_at),
  };
  if (row.kind === 'regular') {
    return new Transaction({ ...common, category: row.category });
  }
  const link =
    row.linked_wallet_id && row.linked_transaction_id
      ? { walletId: row.linked_wallet_id, transactionId: row.linked_transaction_id }
      : null;
  return new Transfer({ ...common, walletId: row.wallet_id, link });
}

function verifyLinks(manager: WalletManager): void {
  for (const wallet of manager.getWallets()) {
    for (const t of wallet.transactions()) {
      if (!isTransfer(t)) continue;
      const partner = t.link ? manager.locateTransfer(t.link) : null;
      if (!partner || partner.transfer.link?.transactionId !== t.id) {
        throw new InvariantViolation(`Transfer ${t.id} in wallet ${wallet.name} has no matching partner`);
      }
    }
  }
}
