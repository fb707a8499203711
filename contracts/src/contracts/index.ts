export * from './MarketRegistry.js';
export * from './PositionLedger.js';
export * from './SettlementEngine.js';
export * from './PredictionMarket.js';
