/**
 * Tile Cache Keys
 * Builds the style/source key and maps formats onto file extensions and
 * fallback content types. Every key segment becomes a directory name, so
 * segments are restricted to a filesystem-safe alphabet.
 */

import { InvalidRequestError } from './errors.js';
import type { CacheKey, TileExtension, TileFormat, TileRequest } from './types.js';

/** Extension each format is stored and served under */
export const FORMAT_EXTENSIONS: Readonly<Record<TileFormat, TileExtension>> = {
  vector: 'pbf',
  raster: 'png',
  terrain: 'webp',
};

/** Content type used only when the provider omits one */
export const DEFAULT_CONTENT_TYPES: Readonly<Record<TileFormat, string>> = {
  vector: 'application/x-protobuf',
  raster: 'image/png',
  terrain: 'image/webp',
};

const EXTENSION_FORMATS: Readonly<Record<TileExtension, TileFormat>> = {
  pbf: 'vector',
  png: 'raster',
  webp: 'terrain',
};

const SAFE_SEGMENT = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/** True when the value can be used as a single path segment */
export function isSafeSegment(value: string): boolean {
  return SAFE_SEGMENT.test(value) && !value.includes('..');
}

/** Throw unless the value can be used as a single path segment */
export function assertSafeSegment(value: string, label: string): void {
  if (!isSafeSegment(value)) {
    throw new InvalidRequestError(`Invalid ${label}: ${value}`);
  }
}

/** Conventional `{styleName}_{sourceName}` cache key prefix */
export function styleSourceKey(styleName: string, sourceName: string): string {
  assertSafeSegment(styleName, 'style name');
  assertSafeSegment(sourceName, 'source name');
  return `${styleName}_${sourceName}`;
}

function isTileExtension(ext: string): ext is TileExtension {
  return Object.prototype.hasOwnProperty.call(EXTENSION_FORMATS, ext);
}

/** Resolve a requested extension to its tile format */
export function formatForExtension(ext: string): TileFormat {
  if (isTileExtension(ext)) {
    return EXTENSION_FORMATS[ext];
  }
  throw new InvalidRequestError(`Unsupported tile extension: ${ext}`);
}

/** Parse a non-negative integer tile coordinate */
export function parseCoordinate(value: string, label: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidRequestError(`Invalid ${label} coordinate: ${value}`);
  }
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidRequestError(`Invalid ${label} coordinate: ${value}`);
  }
  return parsed;
}

/** Cache key addressing the artifact for a tile request */
export function cacheKeyFor(request: TileRequest): CacheKey {
  return {
    styleSourceKey: styleSourceKey(request.styleName, request.sourceName),
    z: request.z,
    x: request.x,
    y: request.y,
    format: request.format,
  };
}

/** Stable string form of a cache key, used for in-flight bookkeeping */
export function cacheKeyId(key: CacheKey): string {
  return `${key.styleSourceKey}/${key.z}/${key.x}/${key.y}.${FORMAT_EXTENSIONS[key.format]}`;
}
