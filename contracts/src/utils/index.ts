export * from './MarketMath.js';
export * from './MarketError.js';
export * from './MarketPhase.js';
export * from './MarketStore.js';
export * from './Escrow.js';
export * from './Clock.js';
export * from './KeyedLock.js';
