/**
 * Platform Config API Routes
 */

import express from 'express';
import {
  configToRecord,
  type PlatformConfigFields,
  type PredictionMarket,
} from '../../../contracts/src/index.js';
import { parseAddress, parseAmount } from '../services/market-service.js';
import { bodyField, requireCaller, sendError } from './http.js';

const ADDRESS_FIELDS = ['admin', 'oracle', 'treasury'] as const;
const AMOUNT_FIELDS = ['minimumStake', 'platformFeeBasisPoints'] as const;

/**
 * Only the fields present in the body; malformed values are rejected
 */
function parseConfigChanges(body: unknown): Partial<PlatformConfigFields> {
  const changes: Partial<PlatformConfigFields> = {};

  for (const field of ADDRESS_FIELDS) {
    const value = bodyField(body, field);
    if (value !== undefined) changes[field] = parseAddress(value, field);
  }
  for (const field of AMOUNT_FIELDS) {
    const value = bodyField(body, field);
    if (value !== undefined) changes[field] = parseAmount(value, field);
  }

  return changes;
}

export function createConfigRouter(market: PredictionMarket): express.Router {
  const router = express.Router();

  /**
   * GET /api/config
   */
  router.get('/', (req, res) => {
    res.json({
      success: true,
      config: configToRecord(market.getConfig()),
    });
  });

  /**
   * PUT /api/config
   * Admin only; applies every field given, or none of them
   */
  router.put('/', async (req, res) => {
    const caller = requireCaller(req, res);
    if (!caller) return;

    try {
      const changes = parseConfigChanges(req.body);
      const updated = await market.updatePlatformConfig(changes, caller);
      console.log(`    Platform config updated: ${Object.keys(changes).join(', ') || 'no changes'}`);

      res.json({
        success: true,
        config: configToRecord(updated),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
