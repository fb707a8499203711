/**
 * Redis Client - Upstash Redis Integration
 *
 * Market store on Upstash's serverless Redis with REST API.
 * All records stored as JSON strings with set/get operations.
 */

import { Redis } from '@upstash/redis';
import { Field, PublicKey } from 'o1js';
import {
  marketToRecord,
  marketFromRecord,
  positionToRecord,
  positionFromRecord,
  configToRecord,
  configFromRecord,
  type Market,
  type MarketId,
  type Position,
  type PlatformConfig,
  type MarketStore,
  type StoredPosition,
  type MarketRecord,
  type PositionRecord,
  type ConfigRecord,
} from '../../../contracts/src/index.js';
import { config } from '../config.js';

/**
 * The slice of the Upstash client the store and escrow use
 */
export interface RedisTransaction {
  set(key: string, value: string): unknown;
  sadd(key: string, member: string): unknown;
  incrby(key: string, increment: number): unknown;
  decrby(key: string, decrement: number): unknown;
  exec(): Promise<unknown>;
}

export interface RedisCommands {
  get(key: string): Promise<unknown>;
  set(key: string, value: string): Promise<unknown>;
  incr(key: string): Promise<number>;
  smembers(key: string): Promise<string[]>;
  scard(key: string): Promise<number>;
  multi(): RedisTransaction;
  eval(script: string, keys: string[], args: string[]): Promise<unknown>;
}

export function createRedisClient(): Redis {
  // Upstash Redis is serverless - no connect/disconnect needed
  return new Redis({
    url: config.redis.url,
    token: config.redis.token,
  });
}

// ========== Record validation ==========

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function hasStrings(value: Record<string, unknown>, keys: string[]): boolean {
  return keys.every((key) => typeof value[key] === 'string');
}

function isMarketRecord(value: unknown): value is MarketRecord {
  return (
    isObject(value) &&
    typeof value.resolved === 'boolean' &&
    hasStrings(value, [
      'referencePrice',
      'settlementPrice',
      'totalUpStake',
      'totalDownStake',
      'openAt',
      'closeAt',
      'createdAt',
    ])
  );
}

function isPositionRecord(value: unknown): value is PositionRecord {
  return (
    isObject(value) &&
    typeof value.claimed === 'boolean' &&
    hasStrings(value, ['direction', 'stakeAmount', 'placedAt'])
  );
}

function isConfigRecord(value: unknown): value is ConfigRecord {
  return (
    isObject(value) &&
    hasStrings(value, ['admin', 'oracle', 'treasury', 'minimumStake', 'platformFeeBasisPoints'])
  );
}

/**
 * Upstash returns parsed JSON or the raw string depending on content
 */
function decode<T>(data: unknown, guard: (value: unknown) => value is T, key: string): T | undefined {
  if (data === null || data === undefined) return undefined;

  const parsed: unknown = typeof data === 'string' ? JSON.parse(data) : data;
  if (!guard(parsed)) {
    throw new Error(`Malformed record at ${key}`);
  }
  return parsed;
}

/**
 * Upstash Redis Market Store
 *
 * Data model:
 * - config → JSON of ConfigRecord
 * - markets:nextId → counter, INCR allocates market ids
 * - markets:all → set of market IDs
 * - market:{id} → JSON of MarketRecord
 * - positions:{id} → set of participant addresses
 * - position:{id}:{address} → JSON of PositionRecord
 */
export class RedisMarketStore implements MarketStore {
  constructor(private readonly client: RedisCommands) {}

  // ========== Config ==========

  async loadConfig(): Promise<PlatformConfig | undefined> {
    const record = decode(await this.client.get('config'), isConfigRecord, 'config');
    return record ? configFromRecord(record) : undefined;
  }

  async saveConfig(platformConfig: PlatformConfig): Promise<void> {
    await this.client.set('config', JSON.stringify(configToRecord(platformConfig)));
  }

  // ========== Market Data ==========

  async insertMarket(market: Market): Promise<MarketId> {
    const id = await this.client.incr('markets:nextId');
    const marketId = Field(id);

    const tx = this.client.multi();
    tx.set(marketKey(marketId), JSON.stringify(marketToRecord(market)));
    tx.sadd('markets:all', marketId.toString());
    await tx.exec();

    return marketId;
  }

  async getMarket(marketId: MarketId): Promise<Market | undefined> {
    const key = marketKey(marketId);
    const record = decode(await this.client.get(key), isMarketRecord, key);
    return record ? marketFromRecord(record) : undefined;
  }

  async saveMarket(marketId: MarketId, market: Market): Promise<void> {
    await this.client.set(marketKey(marketId), JSON.stringify(marketToRecord(market)));
  }

  async listMarketIds(): Promise<MarketId[]> {
    const ids = await this.client.smembers('markets:all');
    return ids.map((id) => Field(String(id)));
  }

  async marketCount(): Promise<number> {
    return this.client.scard('markets:all');
  }

  // ========== Positions ==========

  async getPosition(marketId: MarketId, participant: PublicKey): Promise<Position | undefined> {
    const key = positionKey(marketId, participant.toBase58());
    const record = decode(await this.client.get(key), isPositionRecord, key);
    return record ? positionFromRecord(record) : undefined;
  }

  async listPositions(marketId: MarketId): Promise<StoredPosition[]> {
    const addresses = await this.client.smembers(`positions:${marketId.toString()}`);
    const positions: StoredPosition[] = [];

    for (const address of addresses.map(String)) {
      const participant = PublicKey.fromBase58(address);
      const position = await this.getPosition(marketId, participant);
      if (position) positions.push({ participant, position });
    }

    return positions;
  }

  async savePosition(marketId: MarketId, participant: PublicKey, position: Position): Promise<void> {
    const key = positionKey(marketId, participant.toBase58());
    await this.client.set(key, JSON.stringify(positionToRecord(position)));
  }

  /**
   * MULTI/EXEC: the position, its index entry and the market land together
   */
  async commitPosition(
    marketId: MarketId,
    market: Market,
    participant: PublicKey,
    position: Position
  ): Promise<void> {
    const address = participant.toBase58();
    const tx = this.client.multi();
    tx.set(positionKey(marketId, address), JSON.stringify(positionToRecord(position)));
    tx.sadd(`positions:${marketId.toString()}`, address);
    tx.set(marketKey(marketId), JSON.stringify(marketToRecord(market)));
    await tx.exec();
  }
}

function marketKey(marketId: MarketId): string {
  return `market:${marketId.toString()}`;
}

function positionKey(marketId: MarketId, address: string): string {
  return `position:${marketId.toString()}:${address}`;
}
