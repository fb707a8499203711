/**
 * Redis Escrow - Participant balances and held stake on Upstash Redis
 *
 * - balance:{address} → spendable balance (integer), funded by the custody side
 * - escrow:held → total currently in custody
 *
 * Debit runs as one Lua script so a balance never goes negative.
 * Redis integers and Lua numbers limit amounts to 2^53 - 1; maxAmount
 * reports that limit so market pools stay within it.
 */

import { UInt64 } from 'o1js';
import type { PublicKey } from 'o1js';
import { MarketError, MARKET_ERROR, type Escrow, type DebitResult } from '../../../contracts/src/index.js';
import type { RedisCommands } from './redis-client.js';

export const HELD_KEY = 'escrow:held';
export const MAX_ESCROW_AMOUNT = UInt64.from(Number.MAX_SAFE_INTEGER);

export const DEBIT_SCRIPT = `
local balance = tonumber(redis.call('GET', KEYS[1]) or '0')
local amount = tonumber(ARGV[1])
if balance < amount then
  return 0
end
redis.call('DECRBY', KEYS[1], ARGV[1])
redis.call('INCRBY', KEYS[2], ARGV[1])
return 1
`;

function toSafeNumber(amount: UInt64): number {
  if (amount.greaterThan(MAX_ESCROW_AMOUNT).toBoolean()) {
    throw new MarketError(
      MARKET_ERROR.INVALID_PARAMETERS,
      `Amount ${amount.toString()} exceeds the escrow limit of ${MAX_ESCROW_AMOUNT.toString()}`
    );
  }
  return Number(amount.toBigInt());
}

export function balanceKey(account: PublicKey): string {
  return `balance:${account.toBase58()}`;
}

export class RedisEscrow implements Escrow {
  constructor(private readonly client: RedisCommands) {}

  async debit(account: PublicKey, amount: UInt64): Promise<DebitResult> {
    const result = await this.client.eval(
      DEBIT_SCRIPT,
      [balanceKey(account), HELD_KEY],
      [toSafeNumber(amount).toString()]
    );
    if (result === 1) return { ok: true };
    if (result === 0) return { ok: false, reason: 'INSUFFICIENT_FUNDS' };
    throw new Error(`Unexpected debit script result: ${String(result)}`);
  }

  async credit(account: PublicKey, amount: UInt64): Promise<void> {
    const value = toSafeNumber(amount);
    const tx = this.client.multi();
    tx.incrby(balanceKey(account), value);
    tx.decrby(HELD_KEY, value);
    await tx.exec();
  }

  maxAmount(): UInt64 {
    return MAX_ESCROW_AMOUNT;
  }
}
