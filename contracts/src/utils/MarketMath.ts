/**
 * MarketMath.ts - Winning side and proportional payout calculation
 *
 * Pure functions. Products are taken at arbitrary precision and divided
 * with truncation, so a payout is never rounded up past its share.
 */

import { UInt64, Provable } from 'o1js';
import type { Field, Bool } from 'o1js';
import type { Market } from '../types/Market.js';
import type { Position } from '../types/Position.js';
import {
  DIRECTION,
  TIE_DIRECTION,
  BASIS_POINTS_DIVISOR,
  MAX_UINT64,
} from '../types/Constants.js';
import { MARKET_ERROR, ensure } from './MarketError.js';

/**
 * Breakdown of a single claim
 */
export interface Payout {
  gross: UInt64;  // Share of the total pool
  fee: UInt64;    // Platform fee taken from gross
  net: UInt64;    // Amount credited to the claimant
}

export class MarketMath {
  /**
   * UP if the settlement price ends strictly above the reference price,
   * DOWN if strictly below, TIE_DIRECTION (DOWN) if equal.
   */
  static winningDirection(market: Market): Field {
    const upWins = market.settlementPrice.greaterThan(market.referencePrice);
    const downWins = market.settlementPrice.lessThan(market.referencePrice);
    return Provable.if(
      upWins,
      DIRECTION.UP,
      Provable.if(downWins, DIRECTION.DOWN, TIE_DIRECTION)
    );
  }

  /**
   * Pool staked on the winning side
   */
  static winningPool(market: Market): UInt64 {
    const upWon = MarketMath.winningDirection(market).equals(DIRECTION.UP);
    return Provable.if(upWon, market.totalUpStake, market.totalDownStake);
  }

  /**
   * Formula: userPayout = floor(userStake * totalPool / winningPool)
   *
   * The product can exceed 64 bits, the quotient cannot (userStake <= winningPool).
   */
  static calculateProportionalPayout(
    userStake: UInt64,
    winningPool: UInt64,
    totalPool: UInt64
  ): UInt64 {
    ensure(
      winningPool.greaterThan(UInt64.zero).toBoolean(),
      MARKET_ERROR.INVALID_STATE,
      'Winning pool is empty: market has no valid claimants'
    );
    const share = (userStake.toBigInt() * totalPool.toBigInt()) / winningPool.toBigInt();
    return UInt64.from(share);
  }

  /**
   * Fee = floor(amount * feeBasisPoints / 10000)
   */
  static calculatePlatformFee(amount: UInt64, feeBasisPoints: UInt64): UInt64 {
    const fee = (amount.toBigInt() * feeBasisPoints.toBigInt()) / BASIS_POINTS_DIVISOR.toBigInt();
    return UInt64.from(fee);
  }

  /**
   * Full payout for a winning position on a resolved market
   */
  static payout(market: Market, position: Position, feeBasisPoints: UInt64): Payout {
    ensure(
      market.resolved.toBoolean(),
      MARKET_ERROR.MARKET_UNRESOLVED,
      'Market has not been resolved'
    );
    // An empty winning side means nobody can claim, losers included
    const winningPool = MarketMath.winningPool(market);
    ensure(
      winningPool.greaterThan(UInt64.zero).toBoolean(),
      MARKET_ERROR.INVALID_STATE,
      'Winning pool is empty: market has no valid claimants'
    );
    ensure(
      position.direction.equals(MarketMath.winningDirection(market)).toBoolean(),
      MARKET_ERROR.INVALID_PREDICTION,
      'Position is on the losing side'
    );

    const gross = MarketMath.calculateProportionalPayout(
      position.stakeAmount,
      winningPool,
      market.totalPool()
    );
    const fee = MarketMath.calculatePlatformFee(gross, feeBasisPoints);
    return { gross, fee, net: gross.sub(fee) };
  }

  static isValidDirection(direction: Field): Bool {
    return direction.equals(DIRECTION.UP).or(direction.equals(DIRECTION.DOWN));
  }
}

/**
 * Helper function: UInt64 addition that rejects overflow as bad input
 */
export function safeAdd(a: UInt64, b: UInt64): UInt64 {
  ensure(
    a.toBigInt() + b.toBigInt() <= MAX_UINT64,
    MARKET_ERROR.INVALID_PARAMETERS,
    'Amount overflows 64 bits'
  );
  return a.add(b);
}
