/**
 * Upstream Fetcher
 * Performs outbound tile and asset requests with browser-like headers and the
 * Referer/Origin some providers check before honouring an API key.
 * Never retries: failures surface to the caller as typed errors.
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import pLimit, { type LimitFunction } from 'p-limit';
import { TransportError, UpstreamError, getErrorMessage } from '../lib/errors.js';
import { PerformanceTimer, maskUrl, proxyLogger } from '../lib/logger.js';
import type { ProviderKind } from '../lib/types.js';
import { metrics } from './metrics.js';

/** Headers sent with every upstream request */
export const BROWSER_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent': 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36',
  Accept: '*/*',
  'Accept-Language': 'en-US,en;q=0.9',
};

/** Referer/Origin each known provider expects */
export const PROVIDER_HEADERS: Readonly<Record<Exclude<ProviderKind, 'generic'>, Record<string, string>>> = {
  maptiler: { Referer: 'https://www.maptiler.com/', Origin: 'https://www.maptiler.com' },
  mapbox: { Referer: 'https://www.mapbox.com/', Origin: 'https://www.mapbox.com' },
  tracestrack: { Referer: 'https://console.tracestrack.com/', Origin: 'https://console.tracestrack.com' },
};

const MAX_REDIRECTS = 5;

/** Request headers for a provider */
export function requestHeadersFor(kind: ProviderKind): Record<string, string> {
  if (kind === 'generic') return { ...BROWSER_HEADERS };
  return { ...BROWSER_HEADERS, ...PROVIDER_HEADERS[kind] };
}

/** Successful upstream payload */
export interface FetchedAsset {
  body: Buffer;
  /** Absent when the provider sent no content-type header */
  contentType?: string;
}

/** Outbound fetch contract used by the proxy */
export interface TileFetcher {
  fetch(url: string, providerKind: ProviderKind, signal?: AbortSignal): Promise<FetchedAsset>;
}

export interface UpstreamFetcherOptions {
  timeoutMs?: number;
  /** Concurrent requests allowed per provider */
  maxConcurrency?: number;
  client?: AxiosInstance;
}

function headerValue(value: unknown): string | undefined {
  if (typeof value === 'string' && value.length > 0) return value;
  if (Array.isArray(value) && typeof value[0] === 'string' && value[0].length > 0) return value[0];
  return undefined;
}

/** Classify a thrown request failure */
export function toTransportError(error: unknown): TransportError {
  if (axios.isCancel(error)) {
    return new TransportError('Upstream request aborted');
  }
  if (axios.isAxiosError(error)) {
    const timedOut = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
    return new TransportError(`Failed to fetch from upstream: ${error.message}`, timedOut);
  }
  return new TransportError(`Failed to fetch from upstream: ${getErrorMessage(error)}`);
}

export class UpstreamFetcher implements TileFetcher {
  private readonly client: AxiosInstance;
  private readonly timeoutMs: number;
  private readonly maxConcurrency: number;
  private readonly limiters = new Map<ProviderKind, LimitFunction>();

  constructor(options: UpstreamFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.maxConcurrency = options.maxConcurrency ?? 16;
    this.client = options.client ?? axios.create({ maxRedirects: MAX_REDIRECTS });
  }

  /**
   * The timeout is a deadline for the whole call: queueing for a provider
   * slot, connecting, and reading the body.
   */
  async fetch(url: string, providerKind: ProviderKind, signal?: AbortSignal): Promise<FetchedAsset> {
    const deadline = AbortSignal.timeout(this.timeoutMs);
    const combined = signal ? AbortSignal.any([signal, deadline]) : deadline;
    return this.limiterFor(providerKind)(() => this.request(url, providerKind, combined, deadline));
  }

  /** Requests waiting for a slot, per provider */
  pendingCount(providerKind: ProviderKind): number {
    return this.limiters.get(providerKind)?.pendingCount ?? 0;
  }

  private limiterFor(kind: ProviderKind): LimitFunction {
    let limiter = this.limiters.get(kind);
    if (!limiter) {
      limiter = pLimit(this.maxConcurrency);
      this.limiters.set(kind, limiter);
    }
    return limiter;
  }

  private timedOut(): TransportError {
    return new TransportError(`Upstream request timed out after ${this.timeoutMs}ms`, true);
  }

  private async request(
    url: string,
    providerKind: ProviderKind,
    signal: AbortSignal,
    deadline: AbortSignal
  ): Promise<FetchedAsset> {
    if (deadline.aborted) {
      throw this.timedOut();
    }
    if (signal.aborted) {
      throw new TransportError('Upstream request aborted');
    }

    const timer = new PerformanceTimer(`upstream fetch (${providerKind})`);
    let response: AxiosResponse<ArrayBuffer>;
    try {
      response = await this.client.get<ArrayBuffer>(url, {
        headers: requestHeadersFor(providerKind),
        responseType: 'arraybuffer',
        timeout: this.timeoutMs,
        maxRedirects: MAX_REDIRECTS,
        validateStatus: () => true,
        signal,
      });
    } catch (error) {
      const failure = deadline.aborted ? this.timedOut() : toTransportError(error);
      metrics.recordUpstreamLatency(timer.end(false, failure.message));
      metrics.recordTransportError();
      proxyLogger.warn('Upstream transport failure', {
        url: maskUrl(url),
        providerKind,
        timedOut: failure.timedOut,
        error: failure.message,
      });
      throw failure;
    }

    if (response.status !== 200) {
      metrics.recordUpstreamLatency(timer.end(false, `status ${response.status}`));
      metrics.recordUpstreamError(response.status);
      proxyLogger.warn('Upstream returned error status', {
        url: maskUrl(url),
        providerKind,
        status: response.status,
      });
      throw new UpstreamError(response.status);
    }

    metrics.recordUpstreamLatency(timer.end(true));
    return {
      body: Buffer.from(response.data),
      contentType: headerValue(response.headers['content-type']),
    };
  }
}
