import { extractMarketList, type HttpConfig } from '@freshness/core';
import { BaseAdapter } from './base.adapter.js';

export interface MarketPageParams {
  closed: boolean;
  offset: number;
  limit: number;
  /** Stable sort key so offsets stay meaningful between requests */
  order: string;
  ascending: boolean;
}

/**
 * One page of raw listing records. Records are not validated here.
 */
export interface MarketPageSource {
  fetchPage(params: MarketPageParams, signal?: AbortSignal): Promise<unknown[]>;
}

/**
 * Gamma listing API adapter (GET /markets, offset pagination)
 */
export class GammaAdapter extends BaseAdapter implements MarketPageSource {
  constructor(config: Pick<HttpConfig, 'baseUrl' | 'timeoutMs'>) {
    super({ baseUrl: config.baseUrl, timeoutMs: config.timeoutMs });
  }

  buildPageUrl(params: MarketPageParams): string {
    const query = new URLSearchParams({
      closed: String(params.closed),
      offset: String(params.offset),
      limit: String(params.limit),
      order: params.order,
      ascending: String(params.ascending),
    });
    return `${this.config.baseUrl}/markets?${query.toString()}`;
  }

  async fetchPage(params: MarketPageParams, signal?: AbortSignal): Promise<unknown[]> {
    const payload = await this.fetchJson(this.buildPageUrl(params), signal);
    return extractMarketList(payload);
  }
}
