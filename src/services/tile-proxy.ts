/**
 * Tile Proxy
 * Per tile request: serve from the cache when fresh, otherwise resolve the
 * source, fetch upstream, store and serve. Also proxies sprites and glyphs
 * (uncached) and exposes cache statistics and invalidation.
 */

import { DEFAULT_CONTENT_TYPES, cacheKeyFor, cacheKeyId } from '../lib/cache-keys.js';
import { setProcessingStage } from '../lib/correlation.js';
import { InvalidRequestError, NotFoundError, getErrorMessage } from '../lib/errors.js';
import { proxyLogger } from '../lib/logger.js';
import type { TileCacheStore } from '../lib/tile-cache.js';
import type {
  AssetDescriptor,
  AssetResult,
  CacheKey,
  CacheStats,
  CacheStatus,
  ProviderAuth,
  SourceDescriptor,
  TileRequest,
  TileResult,
} from '../lib/types.js';
import { InflightRegistry } from './inflight-registry.js';
import { metrics } from './metrics.js';
import type { StyleSourceResolver } from './source-resolver.js';
import type { TileFetcher } from './upstream-fetcher.js';
import { applyAuth, buildTileUrl, expandGlyphTemplate } from './url-builder.js';

export interface TileProxyOptions {
  /** max-age advertised to clients */
  cacheControlMaxAge?: number;
  /** TTL stored with fetched tiles; the cache's default when omitted */
  ttlSeconds?: number;
  /** Share one upstream fetch between concurrent identical misses */
  dedupeInflight?: boolean;
}

/** Sprite sheet variant requested by the client */
export interface SpriteVariant {
  retina: boolean;
  extension: '' | '.json' | '.png';
}

export interface InvalidationResult {
  invalidated: number;
  key: string;
}

const GLYPH_CONTENT_TYPE = 'application/x-protobuf';
const GLYPH_RANGE = /^\d+-\d+$/;

function withAuth(url: string, auth: ProviderAuth): string {
  return Object.keys(auth).length > 0 ? applyAuth(url, auth) : url;
}

export class TileProxy {
  private readonly cache: TileCacheStore;
  private readonly resolver: StyleSourceResolver;
  private readonly fetcher: TileFetcher;
  private readonly cacheControlMaxAge: number;
  private readonly ttlSeconds?: number;
  private readonly inflight: InflightRegistry<TileResult> | null;

  constructor(
    cache: TileCacheStore,
    resolver: StyleSourceResolver,
    fetcher: TileFetcher,
    options: TileProxyOptions = {}
  ) {
    this.cache = cache;
    this.resolver = resolver;
    this.fetcher = fetcher;
    this.cacheControlMaxAge = options.cacheControlMaxAge ?? 86400;
    this.ttlSeconds = options.ttlSeconds;
    this.inflight = options.dedupeInflight === false ? null : new InflightRegistry<TileResult>();
  }

  /** Cache-Control value sent with tiles and assets */
  cacheControl(): string {
    return `public, max-age=${this.cacheControlMaxAge}`;
  }

  async getTile(request: TileRequest, signal?: AbortSignal): Promise<TileResult> {
    const key = cacheKeyFor(request);

    setProcessingStage('cache-lookup');
    const cached = await this.cache.lookup(key);
    if (cached) {
      metrics.recordCacheHit();
      proxyLogger.debug('Tile cache hit', { key: cacheKeyId(key) });
      return {
        content: cached.content,
        contentType: cached.contentType,
        headers: { ...this.tileHeaders('HIT'), ...cached.headers },
        cacheStatus: 'HIT',
      };
    }

    metrics.recordCacheMiss();
    if (!this.inflight) {
      return this.fetchAndStore(key, request, signal);
    }

    const { promise, leader } = this.inflight.run(
      cacheKeyId(key),
      (sharedSignal) => this.fetchAndStore(key, request, sharedSignal),
      signal
    );
    if (!leader) {
      metrics.recordInflightJoin();
      proxyLogger.debug('Joined in-flight tile fetch', { key: cacheKeyId(key) });
    }
    return promise;
  }

  async getSprite(styleName: string, variant: SpriteVariant, signal?: AbortSignal): Promise<AssetResult> {
    const assets = await this.resolveAssetsOrCount(styleName);
    if (!assets.sprite) {
      metrics.recordNotFound();
      throw new NotFoundError(`No sprite source for ${styleName}`);
    }

    const target = `${assets.sprite}${variant.retina ? '@2x' : ''}${variant.extension}`;
    const fetched = await this.fetcher.fetch(withAuth(target, assets.auth), assets.providerKind, signal);
    return {
      content: fetched.body,
      contentType: fetched.contentType ?? 'application/octet-stream',
    };
  }

  async getGlyphs(styleName: string, fontstack: string, rangeFile: string, signal?: AbortSignal): Promise<AssetResult> {
    const range = rangeFile.replace(/\.pbf$/, '');
    if (!GLYPH_RANGE.test(range)) {
      throw new InvalidRequestError(`Invalid glyph range: ${rangeFile}`);
    }

    const assets = await this.resolveAssetsOrCount(styleName);
    if (!assets.glyphs) {
      metrics.recordNotFound();
      throw new NotFoundError(`No glyph source for ${styleName}`);
    }

    const target = expandGlyphTemplate(assets.glyphs, fontstack, range);
    const fetched = await this.fetcher.fetch(withAuth(target, assets.auth), assets.providerKind, signal);
    return { content: fetched.body, contentType: GLYPH_CONTENT_TYPE };
  }

  async getCacheStats(): Promise<CacheStats> {
    return this.cache.stats();
  }

  /** Invalidate one style/source key, or everything for "all" */
  async invalidate(key: string): Promise<InvalidationResult> {
    const invalidated = await this.cache.invalidate(key === 'all' ? undefined : key);
    metrics.recordInvalidation(invalidated);
    proxyLogger.info('Tile cache invalidated', { key, invalidated });
    return { invalidated, key };
  }

  private tileHeaders(status: CacheStatus): Record<string, string> {
    return {
      'X-Cache': status,
      'Cache-Control': this.cacheControl(),
    };
  }

  private async fetchAndStore(key: CacheKey, request: TileRequest, signal?: AbortSignal): Promise<TileResult> {
    setProcessingStage('resolve');
    let descriptor: SourceDescriptor;
    try {
      descriptor = await this.resolver.resolve(request.styleName, request.sourceName);
    } catch (error) {
      if (error instanceof NotFoundError) metrics.recordNotFound();
      throw error;
    }

    const url = buildTileUrl(descriptor.template, request.z, request.x, request.y, descriptor.auth);

    setProcessingStage('upstream-fetch');
    const fetched = await this.fetcher.fetch(url, descriptor.providerKind, signal);
    const contentType = fetched.contentType ?? DEFAULT_CONTENT_TYPES[request.format];

    // Runs to completion even if the client has gone away
    setProcessingStage('cache-write');
    try {
      await this.cache.store(key, fetched.body, contentType, {}, this.ttlSeconds);
    } catch (error) {
      metrics.recordCacheWriteFailure();
      proxyLogger.error('Failed to store tile in cache', {
        key: cacheKeyId(key),
        error: getErrorMessage(error),
      });
    }

    return {
      content: fetched.body,
      contentType,
      headers: this.tileHeaders('MISS'),
      cacheStatus: 'MISS',
    };
  }

  private async resolveAssetsOrCount(styleName: string): Promise<AssetDescriptor> {
    try {
      return await this.resolver.resolveAssets(styleName);
    } catch (error) {
      if (error instanceof NotFoundError) metrics.recordNotFound();
      throw error;
    }
  }
}
