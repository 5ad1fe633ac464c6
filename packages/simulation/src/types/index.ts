/**
 * Types Module Index
 */

export * from './bar.js';
export * from './order.js';
export * from './finished-order.js';
export * from './strategy.js';
export * from './ledger.js';
