export * from './ledger/voting-escrow.js';
export * from './ledger/checkpoint.js';
export * from './ledger/query.js';
export * from './ledger/store.js';
export * from './ledger/clock.js';
export * from './ledger/errors.js';
export * from './ledger/mutex.js';

export * from './storage/db.js';
export * from './storage/memory-store.js';

export * from './collaborators/asset-mover.js';
export * from './collaborators/wallet-checker.js';

export * from './config/config.js';
export * from './keeper/checkpoint-keeper.js';
export * from './telemetry/metrics.js';

export * from './runtime.js';
