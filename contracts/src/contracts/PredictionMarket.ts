/**
 * PredictionMarket.ts - Up/Down prediction market service
 *
 * Ties the MarketRegistry, PositionLedger and SettlementEngine to the clock,
 * the escrow and the platform config. Implements:
 * - Admin-created markets with an open/close window
 * - One UP or DOWN position per participant per market
 * - Oracle settlement after close
 * - Proportional payouts with a platform fee
 *
 * Each state change on a market runs under that market's lock; markets
 * do not wait on each other.
 */

import { UInt64 } from 'o1js';
import type { Field, PublicKey } from 'o1js';
import type { Market, MarketId } from '../types/Market.js';
import type { Position } from '../types/Position.js';
import type { PlatformConfig, PlatformConfigFields, ConfigSource } from '../types/PlatformConfig.js';
import { MAX_PLATFORM_FEE_BPS, type MarketPhase } from '../types/Constants.js';
import type { MarketStore, StoredPosition } from '../utils/MarketStore.js';
import type { Clock } from '../utils/Clock.js';
import type { Escrow } from '../utils/Escrow.js';
import type { Payout } from '../utils/MarketMath.js';
import { KeyedLock } from '../utils/KeyedLock.js';
import { MARKET_ERROR, ensure } from '../utils/MarketError.js';
import { marketPhase } from '../utils/MarketPhase.js';
import { MarketRegistry } from './MarketRegistry.js';
import { PositionLedger } from './PositionLedger.js';
import { SettlementEngine, type FeeCreditFailure } from './SettlementEngine.js';

export interface PredictionMarketDeps {
  store: MarketStore;
  clock: Clock;
  escrow: Escrow;
  // Called for every fee the treasury could not be credited
  onFeeCreditFailure?: (failure: FeeCreditFailure) => void;
}

const REGISTRY_LOCK = 'registry';
const CONFIG_LOCK = 'config';

function marketLock(marketId: MarketId): string {
  return `market:${marketId.toString()}`;
}

/**
 * Rejects a config the platform cannot run with
 */
export function validatePlatformConfig(config: PlatformConfig): void {
  ensure(
    config.minimumStake.greaterThan(UInt64.zero).toBoolean(),
    MARKET_ERROR.INVALID_PARAMETERS,
    'minimumStake must be positive'
  );
  ensure(
    config.platformFeeBasisPoints.lessThanOrEqual(MAX_PLATFORM_FEE_BPS).toBoolean(),
    MARKET_ERROR.INVALID_PARAMETERS,
    `platformFeeBasisPoints must be at most ${MAX_PLATFORM_FEE_BPS.toString()}`
  );
}

export class PredictionMarket implements ConfigSource {
  readonly registry: MarketRegistry;
  readonly ledger: PositionLedger;
  readonly settlement: SettlementEngine;

  private config: PlatformConfig;
  private readonly lock = new KeyedLock();
  private readonly feeFailures: FeeCreditFailure[] = [];

  private constructor(private readonly deps: PredictionMarketDeps, config: PlatformConfig) {
    this.config = config;
    this.registry = new MarketRegistry(deps.store, deps.clock, this);
    this.ledger = new PositionLedger(deps.store, deps.clock, this);
    this.settlement = new SettlementEngine(deps.store, this.ledger, this, (failure) => {
      this.feeFailures.push(failure);
      deps.onFeeCreditFailure?.(failure);
    });
  }

  /**
   * Open the market service over a store
   *
   * Uses the config persisted in the store; on first use validates and
   * persists `defaults` instead.
   */
  static async open(deps: PredictionMarketDeps, defaults: PlatformConfig): Promise<PredictionMarket> {
    const stored = await deps.store.loadConfig();
    if (stored) {
      return new PredictionMarket(deps, stored);
    }

    validatePlatformConfig(defaults);
    await deps.store.saveConfig(defaults);
    return new PredictionMarket(deps, defaults);
  }

  current(): PlatformConfig {
    return this.config;
  }

  // ========== Market lifecycle ==========

  async createMarket(
    referencePrice: UInt64,
    openAt: UInt64,
    closeAt: UInt64,
    caller: PublicKey
  ): Promise<MarketId> {
    return this.lock.run(REGISTRY_LOCK, () =>
      this.registry.createMarket(referencePrice, openAt, closeAt, caller)
    );
  }

  async placePosition(
    marketId: MarketId,
    direction: Field,
    stakeAmount: UInt64,
    caller: PublicKey
  ): Promise<Position> {
    return this.lock.run(marketLock(marketId), () =>
      this.ledger.placePosition(marketId, direction, stakeAmount, caller, this.deps.escrow)
    );
  }

  async resolveMarket(marketId: MarketId, settlementPrice: UInt64, caller: PublicKey): Promise<Market> {
    return this.lock.run(marketLock(marketId), () =>
      this.registry.resolveMarket(marketId, settlementPrice, caller)
    );
  }

  /**
   * Claim winnings
   *
   * @returns net payout credited to the caller
   */
  async claimRewards(marketId: MarketId, caller: PublicKey): Promise<UInt64> {
    const payout = await this.lock.run(marketLock(marketId), () =>
      this.settlement.claimRewards(marketId, caller, this.deps.escrow)
    );
    return payout.net;
  }

  // ========== Reads ==========

  async getMarket(marketId: MarketId): Promise<Market | undefined> {
    return this.registry.getMarket(marketId);
  }

  async getPosition(marketId: MarketId, participant: PublicKey): Promise<Position | undefined> {
    return this.ledger.getPosition(marketId, participant);
  }

  async listMarkets(): Promise<Array<{ marketId: MarketId; market: Market }>> {
    return this.registry.listMarkets();
  }

  async listPositions(marketId: MarketId): Promise<StoredPosition[]> {
    return this.ledger.listPositions(marketId);
  }

  async getTotalMarkets(): Promise<number> {
    return this.registry.getTotalMarkets();
  }

  async getMarketsAwaitingResolution(): Promise<MarketId[]> {
    return this.registry.getMarketsAwaitingResolution();
  }

  async quoteClaim(marketId: MarketId, participant: PublicKey): Promise<Payout> {
    return this.settlement.quoteClaim(marketId, participant);
  }

  /**
   * Fees still held in custody because their treasury credit failed
   */
  unsettledFees(): FeeCreditFailure[] {
    return [...this.feeFailures];
  }

  phaseOf(market: Market): MarketPhase {
    return marketPhase(market, this.deps.clock.now());
  }

  // ========== Administration ==========

  getConfig(): PlatformConfig {
    return this.config;
  }

  async setOracle(oracle: PublicKey, caller: PublicKey): Promise<PlatformConfig> {
    return this.updateConfig(caller, (config) => config.with({ oracle }));
  }

  async setTreasury(treasury: PublicKey, caller: PublicKey): Promise<PlatformConfig> {
    return this.updateConfig(caller, (config) => config.with({ treasury }));
  }

  async transferAdmin(admin: PublicKey, caller: PublicKey): Promise<PlatformConfig> {
    return this.updateConfig(caller, (config) => config.with({ admin }));
  }

  async setMinimumStake(minimumStake: UInt64, caller: PublicKey): Promise<PlatformConfig> {
    return this.updateConfig(caller, (config) => config.with({ minimumStake }));
  }

  async setPlatformFee(platformFeeBasisPoints: UInt64, caller: PublicKey): Promise<PlatformConfig> {
    return this.updateConfig(caller, (config) => config.with({ platformFeeBasisPoints }));
  }

  /**
   * Applies several config changes as one update; all or nothing
   */
  async updatePlatformConfig(
    changes: Partial<PlatformConfigFields>,
    caller: PublicKey
  ): Promise<PlatformConfig> {
    return this.updateConfig(caller, (config) => config.with(changes));
  }

  private async updateConfig(
    caller: PublicKey,
    change: (config: PlatformConfig) => PlatformConfig
  ): Promise<PlatformConfig> {
    return this.lock.run(CONFIG_LOCK, async () => {
      ensure(
        caller.equals(this.config.admin).toBoolean(),
        MARKET_ERROR.UNAUTHORIZED,
        'Only the admin can change the platform config'
      );

      const next = change(this.config);
      validatePlatformConfig(next);
      await this.deps.store.saveConfig(next);
      this.config = next;
      return next;
    });
  }
}
