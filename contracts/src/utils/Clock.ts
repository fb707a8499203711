/**
 * Clock.ts - Source of the current block height or timestamp
 */

import { UInt64 } from 'o1js';

export interface Clock {
  /** Monotonically non-decreasing */
  now(): UInt64;
}

/**
 * Wall clock in milliseconds (network timestamps are in ms)
 */
export class SystemClock implements Clock {
  now(): UInt64 {
    return UInt64.from(Date.now());
  }
}

/**
 * Clock driven by hand, for tests and local simulations
 */
export class ManualClock implements Clock {
  private current: UInt64;

  constructor(start: number | bigint = 0) {
    this.current = UInt64.from(start);
  }

  now(): UInt64 {
    return this.current;
  }

  set(value: number | bigint): void {
    const next = UInt64.from(value);
    if (next.lessThan(this.current).toBoolean()) {
      throw new Error(`Clock cannot move backwards (${this.current} → ${next})`);
    }
    this.current = next;
  }
}
