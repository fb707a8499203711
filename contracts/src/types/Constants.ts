/**
 * Constants for the Up/Down Prediction Market
 *
 * Prices and stakes are fixed-point integers; the convention for price
 * decimals is left to the caller, stakes use nanounits.
 */

import { Field, UInt64 } from 'o1js';

/**
 * UNITS_PER_TOKEN: Stakes are tracked in nanounits
 * 1 token = 1,000,000,000 nanounits
 */
export const UNITS_PER_TOKEN = 1_000_000_000;

/**
 * DIRECTION: Field values a participant may predict
 * Anything else is rejected as an invalid prediction.
 */
export const DIRECTION = {
  UP: Field(1),    // Settlement price ends above the reference price
  DOWN: Field(2),  // Settlement price ends at or below the reference price
} as const;

/**
 * TIE_DIRECTION: Winner when settlement price equals reference price
 *
 * Keeps the winning-side function total. Changing it changes who gets paid.
 */
export const TIE_DIRECTION = DIRECTION.DOWN;

/**
 * MARKET_PHASE: Derived lifecycle phases (never stored)
 */
export const MARKET_PHASE = {
  PENDING: 'PENDING',    // Created, window not yet open
  OPEN: 'OPEN',          // Accepting positions
  CLOSED: 'CLOSED',      // Window elapsed, waiting for the oracle
  RESOLVED: 'RESOLVED',  // Settlement price reported, claims available
} as const;

export type MarketPhase = (typeof MARKET_PHASE)[keyof typeof MARKET_PHASE];

/**
 * Fee arithmetic
 * Formula: fee = (amount * feeBasisPoints) / BASIS_POINTS_DIVISOR
 */
export const BASIS_POINTS_DIVISOR = UInt64.from(10_000); // 100.00%
export const MAX_PLATFORM_FEE_BPS = UInt64.from(1_000);  // 10%
export const DEFAULT_PLATFORM_FEE_BPS = UInt64.from(200); // 2%

/**
 * DEFAULT_MINIMUM_STAKE: 0.001 token = 1,000,000 nanounits
 */
export const DEFAULT_MINIMUM_STAKE = UInt64.from(UNITS_PER_TOKEN / 1000);

/**
 * MAX_UINT64: Upper bound of every accumulator
 */
export const MAX_UINT64 = (1n << 64n) - 1n;
