/**
 * Position.ts - A participant's directional stake in one market
 *
 * Keyed by (marketId, participant). Direction, stake and placement time never
 * change after creation; only the claimed flag flips, once.
 */

import { Struct, UInt64, Bool, Field } from 'o1js';
import { DIRECTION } from './Constants.js';

/**
 * Position: One participant's stake in a prediction market
 *
 * @property direction - DIRECTION.UP or DIRECTION.DOWN
 * @property stakeAmount - Amount staked (nanounits)
 * @property claimed - Whether the winnings have been paid out
 * @property placedAt - Clock value when the position was recorded
 *
 * Example:
 * - User stakes 0.01 token on UP at height 1200:
 *   direction = 1, stakeAmount = 10000000, claimed = false, placedAt = 1200
 */
export class Position extends Struct({
  direction: Field,      // DIRECTION.UP | DIRECTION.DOWN
  stakeAmount: UInt64,   // Stake (nanounits)
  claimed: Bool,         // Payout claimed flag
  placedAt: UInt64,      // Clock value at placement
}) {
  /**
   * Opens a fresh, unclaimed position
   */
  static open(direction: Field, stakeAmount: UInt64, placedAt: UInt64): Position {
    return new Position({
      direction,
      stakeAmount,
      claimed: Bool(false),
      placedAt,
    });
  }

  isUp(): Bool {
    return this.direction.equals(DIRECTION.UP);
  }

  /**
   * Same position with the claimed flag set
   */
  markClaimed(): Position {
    return new Position({
      direction: this.direction,
      stakeAmount: this.stakeAmount,
      claimed: Bool(true),
      placedAt: this.placedAt,
    });
  }
}
