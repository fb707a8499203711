/**
 * MarketPhase.ts - Lifecycle phase derived from the clock
 *
 * PENDING → OPEN → CLOSED → RESOLVED. Only resolution is stored;
 * the rest follows from openAt/closeAt.
 */

import type { UInt64 } from 'o1js';
import type { Market } from '../types/Market.js';
import { MARKET_PHASE, type MarketPhase } from '../types/Constants.js';

export function marketPhase(market: Market, now: UInt64): MarketPhase {
  if (market.resolved.toBoolean()) return MARKET_PHASE.RESOLVED;
  if (now.lessThan(market.openAt).toBoolean()) return MARKET_PHASE.PENDING;
  if (now.lessThan(market.closeAt).toBoolean()) return MARKET_PHASE.OPEN;
  return MARKET_PHASE.CLOSED;
}

export function isAcceptingPositions(market: Market, now: UInt64): boolean {
  return marketPhase(market, now) === MARKET_PHASE.OPEN;
}

export function isAwaitingResolution(market: Market, now: UInt64): boolean {
  return marketPhase(market, now) === MARKET_PHASE.CLOSED;
}
