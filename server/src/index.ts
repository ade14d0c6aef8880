import fs from 'fs';
import path from 'path';
import { createApp } from './app.js';
import { loadConfig, type ServerConfig } from './config.js';
import { LedgerStore, openDatabase } from './db.js';

let config: ServerConfig;
try {
  config = loadConfig();
} catch (error) {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
}

if (config.dbPath !== ':memory:') {
  fs.mkdirSync(path.dirname(config.dbPath), { recursive: true });
}

const store = new LedgerStore(openDatabase(config.dbPath));
const manager = store.load();
const app = createApp({ manager, store, corsOrigin: config.corsOrigin });

app.listen(config.port, () => {
  console.log(`Ledger loaded from ${config.dbPath}: ${manager.walletCount} wallet(s)`);
  console.log(`API server running on http://localhost:${config.port}`);
});

export default app;
