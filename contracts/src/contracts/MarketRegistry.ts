/**
 * MarketRegistry.ts - Owns every market, its window and its resolution
 *
 * Key responsibilities:
 * - Create markets (admin only) with sequential ids starting at 1
 * - Provide market lookup by ID
 * - Record the oracle's settlement price once the window has closed
 *
 * Markets are never deleted; resolved markets stay queryable.
 */

import { UInt64 } from 'o1js';
import type { PublicKey } from 'o1js';
import { Market, type MarketId } from '../types/Market.js';
import type { ConfigSource } from '../types/PlatformConfig.js';
import type { MarketStore } from '../utils/MarketStore.js';
import type { Clock } from '../utils/Clock.js';
import { MARKET_ERROR, ensure } from '../utils/MarketError.js';
import { isAwaitingResolution } from '../utils/MarketPhase.js';

export class MarketRegistry {
  constructor(
    private readonly store: MarketStore,
    private readonly clock: Clock,
    private readonly config: ConfigSource
  ) {}

  /**
   * Create a new market
   *
   * @param referencePrice - Price the settlement is compared against (> 0)
   * @param openAt - First clock value accepting positions
   * @param closeAt - End of the window, after openAt and in the future
   * @returns marketId - Unique ID for this market
   */
  async createMarket(
    referencePrice: UInt64,
    openAt: UInt64,
    closeAt: UInt64,
    caller: PublicKey
  ): Promise<MarketId> {
    const { admin } = this.config.current();
    ensure(caller.equals(admin).toBoolean(), MARKET_ERROR.UNAUTHORIZED, 'Only the admin can create markets');

    const now = this.clock.now();
    ensure(
      closeAt.greaterThan(openAt).toBoolean(),
      MARKET_ERROR.INVALID_PARAMETERS,
      'closeAt must be after openAt'
    );
    ensure(
      referencePrice.greaterThan(UInt64.zero).toBoolean(),
      MARKET_ERROR.INVALID_PARAMETERS,
      'referencePrice must be positive'
    );
    ensure(
      closeAt.greaterThan(now).toBoolean(),
      MARKET_ERROR.INVALID_PARAMETERS,
      'closeAt must be in the future'
    );

    return this.store.insertMarket(Market.create(referencePrice, openAt, closeAt, now));
  }

  /**
   * Record the settlement price reported by the oracle
   *
   * Accepted once, after closeAt. The resolved market is returned.
   */
  async resolveMarket(
    marketId: MarketId,
    settlementPrice: UInt64,
    caller: PublicKey
  ): Promise<Market> {
    const market = await this.store.getMarket(marketId);
    ensure(market !== undefined, MARKET_ERROR.NOT_FOUND, `Market ${marketId.toString()} not found`);

    const { oracle } = this.config.current();
    ensure(caller.equals(oracle).toBoolean(), MARKET_ERROR.UNAUTHORIZED, 'Only the oracle can resolve markets');

    const now = this.clock.now();
    ensure(
      now.greaterThanOrEqual(market.closeAt).toBoolean(),
      MARKET_ERROR.MARKET_INACTIVE,
      'Market has not closed yet'
    );
    ensure(
      !market.resolved.toBoolean(),
      MARKET_ERROR.MARKET_INACTIVE,
      'Market is already resolved'
    );
    ensure(
      settlementPrice.greaterThan(UInt64.zero).toBoolean(),
      MARKET_ERROR.INVALID_PARAMETERS,
      'settlementPrice must be positive'
    );

    const resolved = market.withSettlement(settlementPrice);
    await this.store.saveMarket(marketId, resolved);
    return resolved;
  }

  /**
   * Get market by ID (undefined if it does not exist)
   */
  async getMarket(marketId: MarketId): Promise<Market | undefined> {
    return this.store.getMarket(marketId);
  }

  async listMarkets(): Promise<Array<{ marketId: MarketId; market: Market }>> {
    const ids = await this.store.listMarketIds();
    const entries: Array<{ marketId: MarketId; market: Market }> = [];

    for (const marketId of ids) {
      const market = await this.store.getMarket(marketId);
      if (market) entries.push({ marketId, market });
    }

    return entries.sort((a, b) => Number(a.marketId.toBigInt() - b.marketId.toBigInt()));
  }

  /**
   * Total number of markets ever created
   */
  async getTotalMarkets(): Promise<number> {
    return this.store.marketCount();
  }

  /**
   * Markets past closeAt that the oracle has not resolved yet
   */
  async getMarketsAwaitingResolution(): Promise<MarketId[]> {
    const now = this.clock.now();
    const markets = await this.listMarkets();
    return markets
      .filter(({ market }) => isAwaitingResolution(market, now))
      .map(({ marketId }) => marketId);
  }
}
