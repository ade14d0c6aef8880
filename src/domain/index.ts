export * from './types.js';
export * from './errors.js';
export { generateId } from './ids.js';
export * from './transaction.js';
export * from './categories.js';
export * from './sorting.js';
export * from './filtering.js';
export * from './computations.js';
export * from './wallet.js';
export * from './depositWallet.js';
export * from './walletManager.js';
