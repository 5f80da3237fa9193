export { BaseAdapter, type BaseAdapterConfig } from './base.adapter.js';
export { GammaAdapter, type MarketPageParams, type MarketPageSource } from './gamma.adapter.js';
