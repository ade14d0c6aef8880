import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    const config = loadConfig({});
    expect(config.port).toBe(8787);
    expect(config.dbPath.endsWith('ledger.db')).toBe(true);
    expect(config.corsOrigin).toBeUndefined();
  });

  it('reads overrides from the environment', () => {
    expect(loadConfig({ PORT: '9000', LEDGER_DB_PATH: ':memory:', CORS_ORIGIN: 'http://localhost:5173' })).toEqual({
      port: 9000,
      dbPath: ':memory:',
      corsOrigin: 'http://localhost:5173',
    });
  });

  it('stops on an unusable port', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(/^Invalid environment: PORT: /);
  });
});
