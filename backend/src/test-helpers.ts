/**
 * In-process stand-in for the Upstash client
 */

import type { RedisCommands, RedisTransaction } from './services/redis-client.js';

type Operation = () => void;

class FakeTransaction implements RedisTransaction {
  private readonly operations: Operation[] = [];

  constructor(private readonly redis: FakeRedis) {}

  set(key: string, value: string): this {
    this.operations.push(() => this.redis.values.set(key, value));
    return this;
  }

  sadd(key: string, member: string): this {
    this.operations.push(() => this.redis.addMember(key, member));
    return this;
  }

  incrby(key: string, increment: number): this {
    this.operations.push(() => this.redis.addTo(key, increment));
    return this;
  }

  decrby(key: string, decrement: number): this {
    this.operations.push(() => this.redis.addTo(key, -decrement));
    return this;
  }

  async exec(): Promise<unknown> {
    if (this.redis.failNextExec) {
      this.redis.failNextExec = false;
      throw new Error('EXEC aborted');
    }
    for (const operation of this.operations) operation();
    return this.operations.map(() => 'OK');
  }
}

/**
 * Strings and sets in maps. `get` parses JSON the way Upstash does;
 * `eval` runs the escrow debit script's logic unless `scriptResult` is set.
 */
export class FakeRedis implements RedisCommands {
  readonly values = new Map<string, string>();
  readonly sets = new Map<string, Set<string>>();
  readonly scriptCalls: Array<{ keys: string[]; args: string[] }> = [];
  failNextExec = false;
  scriptResult: unknown = undefined;

  async get(key: string): Promise<unknown> {
    const raw = this.values.get(key);
    if (raw === undefined) return null;
    try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch {
      return raw;
    }
  }

  async set(key: string, value: string): Promise<unknown> {
    this.values.set(key, value);
    return 'OK';
  }

  async incr(key: string): Promise<number> {
    return this.addTo(key, 1);
  }

  async smembers(key: string): Promise<string[]> {
    return [...(this.sets.get(key) ?? [])];
  }

  async scard(key: string): Promise<number> {
    return this.sets.get(key)?.size ?? 0;
  }

  multi(): RedisTransaction {
    return new FakeTransaction(this);
  }

  async eval(script: string, keys: string[], args: string[]): Promise<unknown> {
    this.scriptCalls.push({ keys, args });
    if (this.scriptResult !== undefined) return this.scriptResult;

    const [balanceKey, heldKey] = keys;
    const amount = Number(args[0]);
    if (Number(this.values.get(balanceKey) ?? '0') < amount) return 0;
    this.addTo(balanceKey, -amount);
    this.addTo(heldKey, amount);
    return 1;
  }

  addTo(key: string, delta: number): number {
    const next = Number(this.values.get(key) ?? '0') + delta;
    this.values.set(key, String(next));
    return next;
  }

  addMember(key: string, member: string): void {
    const members = this.sets.get(key) ?? new Set<string>();
    members.add(member);
    this.sets.set(key, members);
  }
}
