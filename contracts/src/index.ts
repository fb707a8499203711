/**
 * Up/Down Prediction Market - Main Export
 *
 * Binary price markets: stake on UP or DOWN, the oracle reports the
 * settlement price, winners split the pool minus the platform fee.
 */
export * from './contracts/index.js';
export * from './types/index.js';
export * from './utils/index.js';
