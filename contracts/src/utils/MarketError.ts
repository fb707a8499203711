/**
 * MarketError.ts - Typed failures raised by every market operation
 *
 * Validation runs before any mutation, so a thrown MarketError means no
 * state changed. Store or escrow transport errors are not wrapped.
 */

export const MARKET_ERROR = {
  UNAUTHORIZED: 'UNAUTHORIZED',               // Caller is not the admin/oracle
  NOT_FOUND: 'NOT_FOUND',                     // Market or position missing
  INVALID_PREDICTION: 'INVALID_PREDICTION',   // Unknown direction, or losing claim
  MARKET_INACTIVE: 'MARKET_INACTIVE',         // Outside the operation's time window
  ALREADY_CLAIMED: 'ALREADY_CLAIMED',
  INSUFFICIENT_FUNDS: 'INSUFFICIENT_FUNDS',
  INVALID_PARAMETERS: 'INVALID_PARAMETERS',
  MARKET_UNRESOLVED: 'MARKET_UNRESOLVED',
  INVALID_STATE: 'INVALID_STATE',             // Winning pool is empty
  POSITION_EXISTS: 'POSITION_EXISTS',         // Second prediction on one market
} as const;

export type MarketErrorCode = (typeof MARKET_ERROR)[keyof typeof MARKET_ERROR];

export class MarketError extends Error {
  readonly code: MarketErrorCode;

  constructor(code: MarketErrorCode, message: string) {
    super(message);
    this.name = 'MarketError';
    this.code = code;
  }
}

export function isMarketError(error: unknown): error is MarketError {
  return error instanceof MarketError;
}

/**
 * Throws a MarketError unless the condition holds
 */
export function ensure(condition: boolean, code: MarketErrorCode, message: string): asserts condition {
  if (!condition) {
    throw new MarketError(code, message);
  }
}
