/**
 * Development Routes (LOCAL_MODE only)
 *
 * Funds accounts in the in-memory escrow so the API can be exercised
 * without a custody backend.
 */

import express from 'express';
import type { MemoryEscrow } from '../../../contracts/src/index.js';
import { parseAddress, parseAmount } from '../services/market-service.js';
import { bodyField, sendError } from './http.js';

export function createDevRouter(escrow: MemoryEscrow): express.Router {
  const router = express.Router();

  /**
   * POST /api/dev/deposit
   * { address: string, amount: string }
   */
  router.post('/deposit', (req, res) => {
    try {
      const account = parseAddress(bodyField(req.body, 'address'), 'address');
      const amount = parseAmount(bodyField(req.body, 'amount'), 'amount');
      escrow.deposit(account, amount);

      res.json({
        success: true,
        balance: escrow.balanceOf(account).toString(),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /api/dev/balance/:address
   */
  router.get('/balance/:address', (req, res) => {
    try {
      const account = parseAddress(req.params.address, 'address');
      res.json({
        success: true,
        balance: escrow.balanceOf(account).toString(),
        held: escrow.heldAmount().toString(),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
