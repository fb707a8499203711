/**
 * Shared fixtures for the market tests
 */

import assert from 'node:assert';
import { PrivateKey, UInt64 } from 'o1js';
import type { PublicKey } from 'o1js';
import { PredictionMarket } from './contracts/PredictionMarket.js';
import { PlatformConfig } from './types/PlatformConfig.js';
import { MemoryMarketStore } from './utils/MarketStore.js';
import { MemoryEscrow } from './utils/Escrow.js';
import { ManualClock } from './utils/Clock.js';
import { isMarketError, type MarketErrorCode } from './utils/MarketError.js';

export function randomAddress(): PublicKey {
  return PrivateKey.random().toPublicKey();
}

/**
 * Fails unless the promise rejects with a MarketError carrying `code`
 */
export async function assertMarketError(promise: Promise<unknown>, code: MarketErrorCode): Promise<void> {
  await assert.rejects(promise, (error: unknown) => {
    assert.ok(isMarketError(error), `Expected MarketError, got ${String(error)}`);
    assert.strictEqual(error.code, code);
    return true;
  });
}

export interface TestPlatform {
  market: PredictionMarket;
  store: MemoryMarketStore;
  escrow: MemoryEscrow;
  clock: ManualClock;
  admin: PublicKey;
  oracle: PublicKey;
  treasury: PublicKey;
}

export async function createTestPlatform(
  options: { feeBps?: number; minimumStake?: number; clockStart?: number } = {}
): Promise<TestPlatform> {
  const store = new MemoryMarketStore();
  const escrow = new MemoryEscrow();
  const clock = new ManualClock(options.clockStart ?? 500);
  const admin = randomAddress();
  const oracle = randomAddress();
  const treasury = randomAddress();

  const market = await PredictionMarket.open(
    { store, clock, escrow },
    new PlatformConfig({
      admin,
      oracle,
      treasury,
      minimumStake: UInt64.from(options.minimumStake ?? 1_000_000),
      platformFeeBasisPoints: UInt64.from(options.feeBps ?? 200),
    })
  );

  return { market, store, escrow, clock, admin, oracle, treasury };
}

/**
 * Participant with `balance` spendable nanounits in the escrow
 */
export function fundedParticipant(escrow: MemoryEscrow, balance: number | bigint): PublicKey {
  const participant = randomAddress();
  escrow.deposit(participant, balance);
  return participant;
}
