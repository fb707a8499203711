/**
 * MarketStore.ts - Persistence boundary for markets, positions and config
 *
 * Two keyed collections (marketId → Market, (marketId, participant) → Position)
 * plus the config singleton and the market id counter.
 */

import { Field, UInt64, Bool, PublicKey } from 'o1js';
import { Market, type MarketId } from '../types/Market.js';
import { Position } from '../types/Position.js';
import { PlatformConfig } from '../types/PlatformConfig.js';

export interface StoredPosition {
  participant: PublicKey;
  position: Position;
}

export interface MarketStore {
  loadConfig(): Promise<PlatformConfig | undefined>;
  saveConfig(config: PlatformConfig): Promise<void>;

  /** Allocates the next id (1, 2, ...) and stores the market under it */
  insertMarket(market: Market): Promise<MarketId>;
  getMarket(marketId: MarketId): Promise<Market | undefined>;
  saveMarket(marketId: MarketId, market: Market): Promise<void>;
  listMarketIds(): Promise<MarketId[]>;
  marketCount(): Promise<number>;

  getPosition(marketId: MarketId, participant: PublicKey): Promise<Position | undefined>;
  listPositions(marketId: MarketId): Promise<StoredPosition[]>;
  savePosition(marketId: MarketId, participant: PublicKey, position: Position): Promise<void>;
  /** Writes the new position and the updated market as one unit */
  commitPosition(
    marketId: MarketId,
    market: Market,
    participant: PublicKey,
    position: Position
  ): Promise<void>;
}

// ========== JSON records ==========

export interface MarketRecord {
  referencePrice: string;
  settlementPrice: string;
  totalUpStake: string;
  totalDownStake: string;
  openAt: string;
  closeAt: string;
  resolved: boolean;
  createdAt: string;
}

export interface PositionRecord {
  direction: string;
  stakeAmount: string;
  claimed: boolean;
  placedAt: string;
}

export interface ConfigRecord {
  admin: string;
  oracle: string;
  treasury: string;
  minimumStake: string;
  platformFeeBasisPoints: string;
}

export function marketToRecord(market: Market): MarketRecord {
  return {
    referencePrice: market.referencePrice.toString(),
    settlementPrice: market.settlementPrice.toString(),
    totalUpStake: market.totalUpStake.toString(),
    totalDownStake: market.totalDownStake.toString(),
    openAt: market.openAt.toString(),
    closeAt: market.closeAt.toString(),
    resolved: market.resolved.toBoolean(),
    createdAt: market.createdAt.toString(),
  };
}

export function marketFromRecord(record: MarketRecord): Market {
  return new Market({
    referencePrice: UInt64.from(record.referencePrice),
    settlementPrice: UInt64.from(record.settlementPrice),
    totalUpStake: UInt64.from(record.totalUpStake),
    totalDownStake: UInt64.from(record.totalDownStake),
    openAt: UInt64.from(record.openAt),
    closeAt: UInt64.from(record.closeAt),
    resolved: Bool(record.resolved),
    createdAt: UInt64.from(record.createdAt),
  });
}

export function positionToRecord(position: Position): PositionRecord {
  return {
    direction: position.direction.toString(),
    stakeAmount: position.stakeAmount.toString(),
    claimed: position.claimed.toBoolean(),
    placedAt: position.placedAt.toString(),
  };
}

export function positionFromRecord(record: PositionRecord): Position {
  return new Position({
    direction: Field(record.direction),
    stakeAmount: UInt64.from(record.stakeAmount),
    claimed: Bool(record.claimed),
    placedAt: UInt64.from(record.placedAt),
  });
}

export function configToRecord(config: PlatformConfig): ConfigRecord {
  return {
    admin: config.admin.toBase58(),
    oracle: config.oracle.toBase58(),
    treasury: config.treasury.toBase58(),
    minimumStake: config.minimumStake.toString(),
    platformFeeBasisPoints: config.platformFeeBasisPoints.toString(),
  };
}

export function configFromRecord(record: ConfigRecord): PlatformConfig {
  return new PlatformConfig({
    admin: PublicKey.fromBase58(record.admin),
    oracle: PublicKey.fromBase58(record.oracle),
    treasury: PublicKey.fromBase58(record.treasury),
    minimumStake: UInt64.from(record.minimumStake),
    platformFeeBasisPoints: UInt64.from(record.platformFeeBasisPoints),
  });
}

// ========== In-memory store ==========

/**
 * Map-backed store for tests and LOCAL_MODE
 */
export class MemoryMarketStore implements MarketStore {
  private config: PlatformConfig | undefined;
  private markets = new Map<string, Market>();
  private positions = new Map<string, Map<string, Position>>();
  private nextId = 1n;

  async loadConfig(): Promise<PlatformConfig | undefined> {
    return this.config;
  }

  async saveConfig(config: PlatformConfig): Promise<void> {
    this.config = config;
  }

  async insertMarket(market: Market): Promise<MarketId> {
    const marketId = Field(this.nextId);
    this.nextId += 1n;
    this.markets.set(marketId.toString(), market);
    return marketId;
  }

  async getMarket(marketId: MarketId): Promise<Market | undefined> {
    return this.markets.get(marketId.toString());
  }

  async saveMarket(marketId: MarketId, market: Market): Promise<void> {
    this.markets.set(marketId.toString(), market);
  }

  async listMarketIds(): Promise<MarketId[]> {
    return [...this.markets.keys()].map((id) => Field(id));
  }

  async marketCount(): Promise<number> {
    return this.markets.size;
  }

  async getPosition(marketId: MarketId, participant: PublicKey): Promise<Position | undefined> {
    return this.positions.get(marketId.toString())?.get(participant.toBase58());
  }

  async listPositions(marketId: MarketId): Promise<StoredPosition[]> {
    const byParticipant = this.positions.get(marketId.toString()) ?? new Map<string, Position>();
    return [...byParticipant.entries()].map(([address, position]) => ({
      participant: PublicKey.fromBase58(address),
      position,
    }));
  }

  async savePosition(marketId: MarketId, participant: PublicKey, position: Position): Promise<void> {
    const key = marketId.toString();
    const byParticipant = this.positions.get(key) ?? new Map<string, Position>();
    byParticipant.set(participant.toBase58(), position);
    this.positions.set(key, byParticipant);
  }

  async commitPosition(
    marketId: MarketId,
    market: Market,
    participant: PublicKey,
    position: Position
  ): Promise<void> {
    await this.savePosition(marketId, participant, position);
    this.markets.set(marketId.toString(), market);
  }
}
