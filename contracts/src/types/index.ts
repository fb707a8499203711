export * from './Constants.js';
export * from './Market.js';
export * from './Position.js';
export * from './PlatformConfig.js';
