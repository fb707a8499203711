/**
 * Express application
 */

import express from 'express';
import type { MemoryEscrow, PredictionMarket } from '../../contracts/src/index.js';
import { createMarketsRouter } from './routes/markets.js';
import { createConfigRouter } from './routes/config.js';
import { createDevRouter } from './routes/dev.js';

export interface AppOptions {
  // Mounts /api/dev when set
  devEscrow?: MemoryEscrow;
}

export function createApp(market: PredictionMarket, options: AppOptions = {}): express.Express {
  const app = express();
  app.use(express.json());

  app.get('/health', async (req, res) => {
    try {
      res.json({
        success: true,
        status: 'ok',
        totalMarkets: await market.getTotalMarkets(),
      });
    } catch (error) {
      res.status(503).json({
        success: false,
        status: 'unavailable',
        error: error instanceof Error ? error.message : String(error),
      });
    }
  });

  app.use('/api/markets', createMarketsRouter(market));
  app.use('/api/config', createConfigRouter(market));

  if (options.devEscrow) {
    app.use('/api/dev', createDevRouter(options.devEscrow));
  }

  return app;
}
