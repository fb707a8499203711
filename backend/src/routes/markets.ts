/**
 * Markets API Routes
 */

import express from 'express';
import {
  MarketError,
  MARKET_ERROR,
  type PredictionMarket,
} from '../../../contracts/src/index.js';
import {
  parseAmount,
  parseAddress,
  parseDirection,
  parseMarketId,
  toMarketView,
  toPositionView,
} from '../services/market-service.js';
import { bodyField, requireCaller, sendError } from './http.js';

export function createMarketsRouter(market: PredictionMarket): express.Router {
  const router = express.Router();

  /**
   * GET /api/markets
   * All markets with their current phase
   */
  router.get('/', async (req, res) => {
    try {
      const markets = await market.listMarkets();
      res.json({
        success: true,
        count: markets.length,
        markets: markets.map(({ marketId, market: m }) => toMarketView(marketId, m, market.phaseOf(m))),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /api/markets/awaiting
   * Closed markets the oracle has not resolved yet
   */
  router.get('/awaiting', async (req, res) => {
    try {
      const marketIds = await market.getMarketsAwaitingResolution();
      res.json({
        success: true,
        count: marketIds.length,
        marketIds: marketIds.map((id) => id.toString()),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /api/markets/:id
   */
  router.get('/:id', async (req, res) => {
    try {
      const marketId = parseMarketId(req.params.id);
      const found = await market.getMarket(marketId);
      if (!found) {
        throw new MarketError(MARKET_ERROR.NOT_FOUND, 'Market not found');
      }

      res.json({
        success: true,
        market: toMarketView(marketId, found, market.phaseOf(found)),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /api/markets/:id/positions
   */
  router.get('/:id/positions', async (req, res) => {
    try {
      const marketId = parseMarketId(req.params.id);
      if (!(await market.getMarket(marketId))) {
        throw new MarketError(MARKET_ERROR.NOT_FOUND, 'Market not found');
      }

      const positions = await market.listPositions(marketId);
      res.json({
        success: true,
        count: positions.length,
        positions: positions.map(({ participant, position }) =>
          toPositionView(marketId, participant, position)
        ),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /api/markets/:id/positions/:address
   */
  router.get('/:id/positions/:address', async (req, res) => {
    try {
      const marketId = parseMarketId(req.params.id);
      const participant = parseAddress(req.params.address, 'address');
      const position = await market.getPosition(marketId, participant);
      if (!position) {
        throw new MarketError(MARKET_ERROR.NOT_FOUND, 'Position not found');
      }

      res.json({
        success: true,
        position: toPositionView(marketId, participant, position),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /api/markets/:id/quote/:address
   * What a claim would pay right now, without paying it
   */
  router.get('/:id/quote/:address', async (req, res) => {
    try {
      const marketId = parseMarketId(req.params.id);
      const participant = parseAddress(req.params.address, 'address');
      const payout = await market.quoteClaim(marketId, participant);

      res.json({
        success: true,
        gross: payout.gross.toString(),
        fee: payout.fee.toString(),
        net: payout.net.toString(),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/markets
   * Create a market (admin only)
   *
   * Request body:
   * {
   *   referencePrice: string,  // fixed-point integer, > 0
   *   openAt: string,          // clock value, inclusive
   *   closeAt: string          // clock value, exclusive
   * }
   */
  router.post('/', async (req, res) => {
    const caller = requireCaller(req, res);
    if (!caller) return;

    try {
      const referencePrice = parseAmount(bodyField(req.body, 'referencePrice'), 'referencePrice');
      const openAt = parseAmount(bodyField(req.body, 'openAt'), 'openAt');
      const closeAt = parseAmount(bodyField(req.body, 'closeAt'), 'closeAt');

      const marketId = await market.createMarket(referencePrice, openAt, closeAt, caller);
      console.log(`    Market #${marketId.toString()} created (closes at ${closeAt.toString()})`);

      res.status(201).json({
        success: true,
        marketId: marketId.toString(),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/markets/:id/positions
   *
   * Request body:
   * {
   *   direction: "UP" | "DOWN",
   *   stakeAmount: string       // nanounits
   * }
   */
  router.post('/:id/positions', async (req, res) => {
    const caller = requireCaller(req, res);
    if (!caller) return;

    try {
      const marketId = parseMarketId(req.params.id);
      const direction = parseDirection(bodyField(req.body, 'direction'));
      const stakeAmount = parseAmount(bodyField(req.body, 'stakeAmount'), 'stakeAmount');

      const position = await market.placePosition(marketId, direction, stakeAmount, caller);

      res.status(201).json({
        success: true,
        position: toPositionView(marketId, caller, position),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/markets/:id/resolve
   * Oracle reports the settlement price
   */
  router.post('/:id/resolve', async (req, res) => {
    const caller = requireCaller(req, res);
    if (!caller) return;

    try {
      const marketId = parseMarketId(req.params.id);
      const settlementPrice = parseAmount(bodyField(req.body, 'settlementPrice'), 'settlementPrice');

      const resolved = await market.resolveMarket(marketId, settlementPrice, caller);
      console.log(`    Market #${marketId.toString()} → RESOLVED at ${settlementPrice.toString()}`);

      res.json({
        success: true,
        market: toMarketView(marketId, resolved, market.phaseOf(resolved)),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /api/markets/:id/claim
   * Pays the caller's net winnings
   */
  router.post('/:id/claim', async (req, res) => {
    const caller = requireCaller(req, res);
    if (!caller) return;

    try {
      const marketId = parseMarketId(req.params.id);
      const payout = await market.claimRewards(marketId, caller);

      res.json({
        success: true,
        payout: payout.toString(),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
