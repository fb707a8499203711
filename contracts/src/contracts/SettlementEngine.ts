/**
 * SettlementEngine.ts - One-time claim of winnings
 *
 * Payout arithmetic lives in MarketMath; this applies it to stored state,
 * marks the position claimed and only then pays out.
 */

import type { PublicKey, UInt64 } from 'o1js';
import type { ConfigSource } from '../types/PlatformConfig.js';
import type { MarketStore } from '../utils/MarketStore.js';
import type { Escrow } from '../utils/Escrow.js';
import { MarketMath, type Payout } from '../utils/MarketMath.js';
import { MARKET_ERROR, ensure } from '../utils/MarketError.js';
import type { Market, MarketId } from '../types/Market.js';
import type { Position } from '../types/Position.js';
import type { PositionLedger } from './PositionLedger.js';

/**
 * A platform fee that stayed in custody because the treasury credit failed
 */
export interface FeeCreditFailure {
  marketId: MarketId;
  treasury: PublicKey;
  fee: UInt64;
  error: unknown;
}

export class SettlementEngine {
  constructor(
    private readonly store: MarketStore,
    private readonly ledger: PositionLedger,
    private readonly config: ConfigSource,
    private readonly onFeeCreditFailure: (failure: FeeCreditFailure) => void
  ) {}

  /**
   * Claim winnings
   *
   * The claimed flag is persisted before the credit: a failed credit can
   * leave a position claimed and unpaid, never paid twice. Once the
   * claimant is paid the claim stands; a failed fee credit is reported
   * to onFeeCreditFailure and the fee stays in custody.
   *
   * @returns gross share, fee and the net amount credited to the caller
   */
  async claimRewards(marketId: MarketId, caller: PublicKey, escrow: Escrow): Promise<Payout> {
    const { position, payout } = await this.evaluateClaim(marketId, caller);
    const { treasury } = this.config.current();

    await this.ledger.markClaimed(marketId, caller, position);

    await escrow.credit(caller, payout.net);
    if (payout.fee.toBigInt() > 0n) {
      try {
        await escrow.credit(treasury, payout.fee);
      } catch (error) {
        this.onFeeCreditFailure({ marketId, treasury, fee: payout.fee, error });
      }
    }

    return payout;
  }

  /**
   * What claimRewards would pay right now, without paying it
   */
  async quoteClaim(marketId: MarketId, participant: PublicKey): Promise<Payout> {
    const { payout } = await this.evaluateClaim(marketId, participant);
    return payout;
  }

  private async evaluateClaim(
    marketId: MarketId,
    participant: PublicKey
  ): Promise<{ market: Market; position: Position; payout: Payout }> {
    const market = await this.store.getMarket(marketId);
    ensure(market !== undefined, MARKET_ERROR.NOT_FOUND, `Market ${marketId.toString()} not found`);
    ensure(market.resolved.toBoolean(), MARKET_ERROR.MARKET_UNRESOLVED, 'Market has not been resolved');

    const position = await this.store.getPosition(marketId, participant);
    ensure(position !== undefined, MARKET_ERROR.NOT_FOUND, 'No position in this market');
    ensure(!position.claimed.toBoolean(), MARKET_ERROR.ALREADY_CLAIMED, 'Winnings already claimed');

    const { platformFeeBasisPoints } = this.config.current();
    const payout = MarketMath.payout(market, position, platformFeeBasisPoints);
    return { market, position, payout };
  }
}
