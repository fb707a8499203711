/**
 * Market Service
 *
 * Builds the PredictionMarket for this process and turns HTTP payloads
 * into typed market arguments.
 */

import { Field, PublicKey, UInt64 } from 'o1js';
import {
  PredictionMarket,
  MemoryMarketStore,
  MemoryEscrow,
  SystemClock,
  MarketError,
  MARKET_ERROR,
  DIRECTION,
  MAX_UINT64,
  marketToRecord,
  positionToRecord,
  type Market,
  type MarketId,
  type Position,
  type MarketPhase,
  type MarketRecord,
  type PositionRecord,
  type FeeCreditFailure,
} from '../../../contracts/src/index.js';
import { config, getDefaultPlatformConfig } from '../config.js';
import { createRedisClient, RedisMarketStore } from './redis-client.js';
import { RedisEscrow } from './redis-escrow.js';

export interface MarketServices {
  market: PredictionMarket;
  // Present in LOCAL_MODE so the dev routes can fund accounts
  devEscrow?: MemoryEscrow;
}

/**
 * LOCAL_MODE keeps everything in memory; otherwise Upstash backs both
 * the store and the escrow.
 */
function reportFeeCreditFailure({ marketId, treasury, fee, error }: FeeCreditFailure): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(
    ` Fee of ${fee.toString()} for market #${marketId.toString()} not credited to ${treasury.toBase58()}: ${message}`
  );
}

export async function createMarketServices(): Promise<MarketServices> {
  const clock = new SystemClock();
  const defaults = getDefaultPlatformConfig();

  if (config.localMode) {
    const escrow = new MemoryEscrow();
    const market = await PredictionMarket.open(
      { store: new MemoryMarketStore(), clock, escrow, onFeeCreditFailure: reportFeeCreditFailure },
      defaults
    );
    return { market, devEscrow: escrow };
  }

  const client = createRedisClient();
  const market = await PredictionMarket.open(
    {
      store: new RedisMarketStore(client),
      clock,
      escrow: new RedisEscrow(client),
      onFeeCreditFailure: reportFeeCreditFailure,
    },
    defaults
  );
  return { market };
}

// ========== Request parsing ==========

function invalid(message: string): MarketError {
  return new MarketError(MARKET_ERROR.INVALID_PARAMETERS, message);
}

/**
 * Amounts, prices and clock values arrive as decimal strings or safe integers
 */
export function parseAmount(value: unknown, field: string): UInt64 {
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
    return UInt64.from(value);
  }
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    const amount = BigInt(value);
    if (amount < 1n << 64n) return UInt64.from(amount);
  }
  throw invalid(`${field} must be an unsigned 64-bit integer`);
}

export function parseMarketId(value: string): MarketId {
  if (!/^\d+$/.test(value) || BigInt(value) > MAX_UINT64) {
    throw invalid('Invalid market ID');
  }
  return Field(BigInt(value));
}

/**
 * "UP" / "DOWN"; anything else is an invalid prediction
 */
export function parseDirection(value: unknown): Field {
  if (value === 'UP') return DIRECTION.UP;
  if (value === 'DOWN') return DIRECTION.DOWN;
  throw new MarketError(MARKET_ERROR.INVALID_PREDICTION, 'direction must be "UP" or "DOWN"');
}

export function parseAddress(value: unknown, field: string): PublicKey {
  if (typeof value === 'string') {
    try {
      return PublicKey.fromBase58(value);
    } catch {
      // fall through to the typed error
    }
  }
  throw invalid(`${field} must be a base58 public key`);
}

export function directionLabel(direction: Field): 'UP' | 'DOWN' {
  return direction.equals(DIRECTION.UP).toBoolean() ? 'UP' : 'DOWN';
}

// ========== Response shapes ==========

export interface MarketView extends MarketRecord {
  marketId: string;
  phase: MarketPhase;
}

export interface PositionView extends Omit<PositionRecord, 'direction'> {
  marketId: string;
  participant: string;
  direction: 'UP' | 'DOWN';
}

export function toMarketView(marketId: MarketId, market: Market, phase: MarketPhase): MarketView {
  return { marketId: marketId.toString(), ...marketToRecord(market), phase };
}

export function toPositionView(marketId: MarketId, participant: PublicKey, position: Position): PositionView {
  return {
    marketId: marketId.toString(),
    participant: participant.toBase58(),
    ...positionToRecord(position),
    direction: directionLabel(position.direction),
  };
}
