/**
 * Shared HTTP helpers: caller identity, body access, error responses
 */

import type { Request, Response } from 'express';
import { PublicKey } from 'o1js';
import { MARKET_ERROR, isMarketError, type MarketErrorCode } from '../../../contracts/src/index.js';

/** Set by the authenticating gateway in front of the service */
export const CALLER_HEADER = 'x-caller-address';

const STATUS_BY_CODE: Record<MarketErrorCode, number> = {
  [MARKET_ERROR.UNAUTHORIZED]: 403,
  [MARKET_ERROR.NOT_FOUND]: 404,
  [MARKET_ERROR.MARKET_INACTIVE]: 409,
  [MARKET_ERROR.MARKET_UNRESOLVED]: 409,
  [MARKET_ERROR.ALREADY_CLAIMED]: 409,
  [MARKET_ERROR.POSITION_EXISTS]: 409,
  [MARKET_ERROR.INVALID_STATE]: 409,
  [MARKET_ERROR.INSUFFICIENT_FUNDS]: 402,
  [MARKET_ERROR.INVALID_PREDICTION]: 400,
  [MARKET_ERROR.INVALID_PARAMETERS]: 400,
};

export function httpStatusFor(code: MarketErrorCode): number {
  return STATUS_BY_CODE[code];
}

/**
 * Domain errors map to their status; anything else is a 500
 */
export function sendError(res: Response, error: unknown): void {
  if (isMarketError(error)) {
    res.status(httpStatusFor(error.code)).json({
      success: false,
      error: error.message,
      code: error.code,
    });
    return;
  }

  const message = error instanceof Error ? error.message : String(error);
  console.error(' Request failed:', message);
  res.status(500).json({
    success: false,
    error: message,
    code: 'INTERNAL',
  });
}

/**
 * Caller's public key, or a 401 already sent
 */
export function requireCaller(req: Request, res: Response): PublicKey | undefined {
  const header = req.header(CALLER_HEADER);
  if (header) {
    try {
      return PublicKey.fromBase58(header);
    } catch {
      // answered below
    }
  }

  res.status(401).json({
    success: false,
    error: `Missing or invalid ${CALLER_HEADER} header`,
    code: MARKET_ERROR.UNAUTHORIZED,
  });
  return undefined;
}

export function bodyField(body: unknown, name: string): unknown {
  if (typeof body !== 'object' || body === null) return undefined;
  return Object.getOwnPropertyDescriptor(body, name)?.value;
}
