/**
 * Base Adapter - HTTP plumbing shared by upstream adapters
 */

import { HttpError, parseRetryAfter } from '@freshness/core';

export interface BaseAdapterConfig {
  baseUrl: string;
  timeoutMs: number;
}

/**
 * Single-attempt JSON fetch with a per-request timeout.
 * Retries are the caller's business so it can count them.
 */
export abstract class BaseAdapter {
  protected readonly config: BaseAdapterConfig;

  constructor(config: BaseAdapterConfig) {
    this.config = {
      ...config,
      baseUrl: config.baseUrl.replace(/\/+$/, ''),
    };
  }

  /**
   * GET and decode JSON. Non-2xx responses become HttpError carrying the
   * Retry-After hint.
   */
  protected async fetchJson(url: string, signal?: AbortSignal): Promise<unknown> {
    const response = await this.fetchWithTimeout(url, { headers: { Accept: 'application/json' } }, signal);
    if (!response.ok) {
      const retryAfterMs = parseRetryAfter(response.headers.get('Retry-After'));
      throw new HttpError(response.status, `${response.status} ${response.statusText} from ${url}`, retryAfterMs);
    }
    const body: unknown = await response.json();
    return body;
  }

  /**
   * Fetch with timeout using AbortController, also cancelled by the caller's signal
   */
  protected async fetchWithTimeout(
    url: string,
    options: RequestInit = {},
    signal?: AbortSignal
  ): Promise<Response> {
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      return await fetch(url, {
        ...options,
        signal: controller.signal,
      });
    } catch (error) {
      if (timedOut) {
        throw new Error(`Request timeout after ${this.config.timeoutMs}ms: ${url}`);
      }
      throw error;
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
