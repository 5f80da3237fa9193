export * from './types.js';
export * from './utils.js';
export * from './config.js';
export * from './gamma.js';
export * from './position.js';
export * from './percentile.js';
export * from './freshness.js';
