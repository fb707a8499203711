/**
 * Market.ts - Up/Down market record kept by the MarketRegistry
 *
 * Phase (pending/open/closed/resolved) is derived from the clock and the
 * resolved flag; see utils/MarketPhase.ts.
 */

import { Struct, UInt64, Bool } from 'o1js';
import type { Field } from 'o1js';
import { safeAdd } from '../utils/MarketMath.js';

/**
 * Market: Configuration and resolution state of one prediction market
 *
 * @property referencePrice - Price at creation (fixed point, > 0)
 * @property settlementPrice - Price reported by the oracle (0 = unresolved)
 * @property totalUpStake - Sum of stakes on UP
 * @property totalDownStake - Sum of stakes on DOWN
 * @property openAt - First clock value accepting positions
 * @property closeAt - First clock value refusing positions, > openAt
 * @property resolved - Set exactly once by resolution
 * @property createdAt - Clock value at creation
 *
 * Storage: MarketStore (marketId → Market)
 */
export class Market extends Struct({
  referencePrice: UInt64,
  settlementPrice: UInt64,
  totalUpStake: UInt64,
  totalDownStake: UInt64,
  openAt: UInt64,
  closeAt: UInt64,
  resolved: Bool,
  createdAt: UInt64,
}) {
  /**
   * Creates an unresolved market with empty pools
   */
  static create(
    referencePrice: UInt64,
    openAt: UInt64,
    closeAt: UInt64,
    createdAt: UInt64
  ): Market {
    return new Market({
      referencePrice,
      settlementPrice: UInt64.zero,
      totalUpStake: UInt64.zero,
      totalDownStake: UInt64.zero,
      openAt,
      closeAt,
      resolved: Bool(false),
      createdAt,
    });
  }

  /**
   * Combined UP + DOWN pool
   */
  totalPool(): UInt64 {
    return safeAdd(this.totalUpStake, this.totalDownStake);
  }

  /**
   * Adds a stake to one side's accumulator
   */
  withStake(isUp: Bool, amount: UInt64): Market {
    const up = isUp.toBoolean();
    return new Market({
      ...this.fields(),
      totalUpStake: up ? safeAdd(this.totalUpStake, amount) : this.totalUpStake,
      totalDownStake: up ? this.totalDownStake : safeAdd(this.totalDownStake, amount),
    });
  }

  /**
   * Records the oracle's settlement price and closes the market for good
   */
  withSettlement(settlementPrice: UInt64): Market {
    return new Market({
      ...this.fields(),
      settlementPrice,
      resolved: Bool(true),
    });
  }

  private fields() {
    return {
      referencePrice: this.referencePrice,
      settlementPrice: this.settlementPrice,
      totalUpStake: this.totalUpStake,
      totalDownStake: this.totalDownStake,
      openAt: this.openAt,
      closeAt: this.closeAt,
      resolved: this.resolved,
      createdAt: this.createdAt,
    };
  }
}

/**
 * Market identifiers are sequential Fields starting at 1
 */
export type MarketId = Field;
