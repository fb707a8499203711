/**
 * Escrow.ts - Custody of staked funds
 *
 * debit moves funds from a participant into custody, credit pays them out.
 * Both are expected to be atomic on the custody side. maxAmount bounds any
 * single transfer; a market's pool never grows past it, so no payout can.
 */

import { UInt64 } from 'o1js';
import type { PublicKey } from 'o1js';
import { MAX_UINT64 } from '../types/Constants.js';

export type DebitResult = { ok: true } | { ok: false; reason: 'INSUFFICIENT_FUNDS' };

export interface Escrow {
  debit(account: PublicKey, amount: UInt64): Promise<DebitResult>;
  credit(account: PublicKey, amount: UInt64): Promise<void>;
  maxAmount(): UInt64;
}

/**
 * In-memory escrow: spendable balances per address, plus what is held.
 */
export class MemoryEscrow implements Escrow {
  private balances = new Map<string, bigint>();
  private held = 0n;

  async debit(account: PublicKey, amount: UInt64): Promise<DebitResult> {
    const key = account.toBase58();
    const balance = this.balances.get(key) ?? 0n;
    if (balance < amount.toBigInt()) {
      return { ok: false, reason: 'INSUFFICIENT_FUNDS' };
    }
    this.balances.set(key, balance - amount.toBigInt());
    this.held += amount.toBigInt();
    return { ok: true };
  }

  async credit(account: PublicKey, amount: UInt64): Promise<void> {
    if (amount.toBigInt() > this.held) {
      throw new Error(`Escrow holds ${this.held}, cannot pay ${amount.toString()}`);
    }
    const key = account.toBase58();
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount.toBigInt());
    this.held -= amount.toBigInt();
  }

  maxAmount(): UInt64 {
    return UInt64.from(MAX_UINT64);
  }

  /**
   * Funds an account from outside custody (deposits, test setup)
   */
  deposit(account: PublicKey, amount: UInt64 | bigint | number): void {
    const key = account.toBase58();
    this.balances.set(key, (this.balances.get(key) ?? 0n) + UInt64.from(amount).toBigInt());
  }

  balanceOf(account: PublicKey): UInt64 {
    return UInt64.from(this.balances.get(account.toBase58()) ?? 0n);
  }

  /** Total currently in custody */
  heldAmount(): UInt64 {
    return UInt64.from(this.held);
  }
}
