/**
 * Type definitions for the tile cache proxy
 */

// Tile payload formats served by the proxy
export type TileFormat = 'vector' | 'raster' | 'terrain';

// File extension each format is stored and requested under
export type TileExtension = 'pbf' | 'png' | 'webp';

// Tile pyramid address
export interface TileCoordinate {
  z: number;
  x: number;
  y: number;
}

// Identity of one stored artifact: the five-tuple, nothing else
export interface CacheKey extends TileCoordinate {
  styleSourceKey: string;
  format: TileFormat;
}

// Stored tile with its metadata record
export interface CachedArtifact {
  content: Buffer;
  contentType: string;
  headers: Record<string, string>;
  ttl: number;
  /** Epoch seconds */
  cachedAt: number;
}

// Query parameters injected into upstream URLs for one provider
export type ProviderAuth = Readonly<Record<string, string>>;

// Providers that need request fix-ups (spoofed Referer/Origin)
export type ProviderKind = 'maptiler' | 'mapbox' | 'tracestrack' | 'generic';

// Everything needed to fetch one source's tiles
export interface SourceDescriptor {
  styleName: string;
  sourceName: string;
  template: string;
  providerId: string;
  providerKind: ProviderKind;
  auth: ProviderAuth;
}

// Original sprite/glyph locations for a scraped style
export interface AssetDescriptor {
  styleName: string;
  sprite?: string;
  glyphs?: string;
  providerId: string;
  providerKind: ProviderKind;
  auth: ProviderAuth;
}

// Logical tile reference from the client
export interface TileRequest extends TileCoordinate {
  styleName: string;
  sourceName: string;
  format: TileFormat;
}

export type CacheStatus = 'HIT' | 'MISS';

// Tile ready to be written to the client
export interface TileResult {
  content: Buffer;
  contentType: string;
  headers: Record<string, string>;
  cacheStatus: CacheStatus;
}

// Proxied sprite or glyph payload
export interface AssetResult {
  content: Buffer;
  contentType: string;
}

// Per style/source breakdown in cache statistics
export interface CacheKeyStats {
  sizeBytes: number;
  sizeMb: number;
  fileCount: number;
}

export interface CacheStats {
  totalSizeBytes: number;
  totalSizeMb: number;
  totalFileCount: number;
  byKey: Record<string, CacheKeyStats>;
}
