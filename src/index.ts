/**
 * xchain-relay
 * Cross-chain token transfers and call messages over redundant bridge adapters, with fee wrappers
 */

// Core primitives
export * from './core/index.js';

// Simulated chain runtime
export * from './chain/index.js';

// Tokens
export * from './tokens/index.js';

// Bridge adapters
export * from './bridge/index.js';

// Asset controllers
export * from './controller/index.js';

// Fee wrappers
export * from './wrappers/index.js';
