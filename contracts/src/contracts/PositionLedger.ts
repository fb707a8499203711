/**
 * PositionLedger.ts - Owns each participant's stake per market
 *
 * One position per (market, participant). Funds are debited from escrow
 * before the position and the side's pool are written, and the two writes
 * are committed together.
 */

import type { UInt64, Field, PublicKey } from 'o1js';
import type { MarketId } from '../types/Market.js';
import { Position } from '../types/Position.js';
import type { ConfigSource } from '../types/PlatformConfig.js';
import type { MarketStore, StoredPosition } from '../utils/MarketStore.js';
import type { Clock } from '../utils/Clock.js';
import type { Escrow } from '../utils/Escrow.js';
import { MarketMath } from '../utils/MarketMath.js';
import { MARKET_ERROR, MarketError, ensure } from '../utils/MarketError.js';
import { isAcceptingPositions } from '../utils/MarketPhase.js';

export class PositionLedger {
  constructor(
    private readonly store: MarketStore,
    private readonly clock: Clock,
    private readonly config: ConfigSource
  ) {}

  /**
   * Stake on UP or DOWN while the market is open
   *
   * @param direction - DIRECTION.UP or DIRECTION.DOWN
   * @param stakeAmount - At least the configured minimum stake
   * @param escrow - Custody the stake is debited into
   */
  async placePosition(
    marketId: MarketId,
    direction: Field,
    stakeAmount: UInt64,
    caller: PublicKey,
    escrow: Escrow
  ): Promise<Position> {
    const market = await this.store.getMarket(marketId);
    ensure(market !== undefined, MARKET_ERROR.NOT_FOUND, `Market ${marketId.toString()} not found`);

    const now = this.clock.now();
    ensure(
      isAcceptingPositions(market, now),
      MARKET_ERROR.MARKET_INACTIVE,
      'Market is not accepting positions'
    );
    ensure(
      MarketMath.isValidDirection(direction).toBoolean(),
      MARKET_ERROR.INVALID_PREDICTION,
      `Unknown direction ${direction.toString()}`
    );

    const { minimumStake } = this.config.current();
    ensure(
      stakeAmount.greaterThanOrEqual(minimumStake).toBoolean(),
      MARKET_ERROR.INVALID_PARAMETERS,
      `Stake must be at least ${minimumStake.toString()}`
    );

    const existing = await this.store.getPosition(marketId, caller);
    ensure(
      existing === undefined,
      MARKET_ERROR.POSITION_EXISTS,
      'Participant already holds a position in this market'
    );

    const position = Position.open(direction, stakeAmount, now);
    // Overflow is rejected here, before any funds move
    const updatedMarket = market.withStake(position.isUp(), stakeAmount);
    const limit = escrow.maxAmount();
    ensure(
      updatedMarket.totalPool().lessThanOrEqual(limit).toBoolean(),
      MARKET_ERROR.INVALID_PARAMETERS,
      `Market pool would exceed the escrow limit of ${limit.toString()}`
    );

    const debit = await escrow.debit(caller, stakeAmount);
    if (!debit.ok) {
      throw new MarketError(MARKET_ERROR.INSUFFICIENT_FUNDS, 'Escrow debit failed: insufficient funds');
    }

    try {
      await this.store.commitPosition(marketId, updatedMarket, caller, position);
    } catch (error) {
      try {
        await escrow.credit(caller, stakeAmount);
      } catch (refundError) {
        throw new AggregateError(
          [error, refundError],
          `Position commit failed and the refund of ${stakeAmount.toString()} did not go through`
        );
      }
      throw error;
    }

    return position;
  }

  /**
   * Get a participant's position (undefined if none)
   */
  async getPosition(marketId: MarketId, participant: PublicKey): Promise<Position | undefined> {
    return this.store.getPosition(marketId, participant);
  }

  async listPositions(marketId: MarketId): Promise<StoredPosition[]> {
    return this.store.listPositions(marketId);
  }

  /**
   * Persist the claimed flag. Nothing else on a position ever changes.
   */
  async markClaimed(marketId: MarketId, participant: PublicKey, position: Position): Promise<Position> {
    const claimed = position.markClaimed();
    await this.store.savePosition(marketId, participant, claimed);
    return claimed;
  }
}
