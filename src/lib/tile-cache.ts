/**
 * File-based Tile Cache
 * Stores tiles under {cacheDir}/{styleSourceKey}/{z}/{x}/{y}.{ext} with a
 * sibling `.meta` JSON record holding content type, headers, TTL and write time.
 * Expiry is purely time-based; there is no size bound.
 */

import { randomUUID } from 'node:crypto';
import type { Dirent } from 'node:fs';
import { mkdir, readdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { FORMAT_EXTENSIONS, assertSafeSegment, isSafeSegment } from './cache-keys.js';
import { getErrorMessage } from './errors.js';
import { proxyLogger } from './logger.js';
import { CacheMetadataSchema, type CacheMetadata } from './schemas.js';
import type { CacheKey, CacheKeyStats, CachedArtifact, CacheStats } from './types.js';

/** Suffix of the metadata record written next to each payload */
export const META_SUFFIX = '.meta';

/**
 * Tile cache interface consumed by the proxy
 */
export interface TileCacheStore {
  /** Fresh artifact for the key, or null when missing, expired or unreadable */
  lookup(key: CacheKey): Promise<CachedArtifact | null>;
  store(
    key: CacheKey,
    content: Buffer,
    contentType: string,
    headers?: Record<string, string>,
    ttl?: number
  ): Promise<void>;
  /** Remove everything under one style/source key, or everything; returns files removed */
  invalidate(styleSourceKey?: string): Promise<number>;
  stats(): Promise<CacheStats>;
}

export interface FileTileCacheOptions {
  /** TTL in seconds applied when store() is given none */
  defaultTtlSeconds?: number;
  /** Clock in epoch seconds */
  now?: () => number;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function toMegabytes(bytes: number): number {
  return Math.round((bytes / 1024 / 1024) * 100) / 100;
}

/** Recursively list files below a directory; a vanished directory lists as empty */
async function listFiles(dir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return [];
    throw error;
  }

  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}

/** Write to a temp file beside the target, then rename into place */
async function writeFileAtomic(target: string, data: Buffer | string): Promise<void> {
  const temp = `${target}.${process.pid}.${randomUUID()}.tmp`;
  try {
    await writeFile(temp, data);
    await rename(temp, target);
  } catch (error) {
    await rm(temp, { force: true });
    throw error;
  }
}

export class FileTileCache implements TileCacheStore {
  private readonly cacheDir: string;
  private readonly defaultTtlSeconds: number;
  private readonly now: () => number;

  constructor(cacheDir: string, options: FileTileCacheOptions = {}) {
    this.cacheDir = path.resolve(cacheDir);
    this.defaultTtlSeconds = options.defaultTtlSeconds ?? 86400;
    this.now = options.now ?? (() => Date.now() / 1000);
  }

  /** Create the cache root */
  async initialize(): Promise<void> {
    await mkdir(this.cacheDir, { recursive: true });
    proxyLogger.info('Initialized file tile cache', {
      cacheDir: this.cacheDir,
      defaultTtlSeconds: this.defaultTtlSeconds,
    });
  }

  /** Payload path: {cacheDir}/{styleSourceKey}/{z}/{x}/{y}.{ext} */
  payloadPath(key: CacheKey): string {
    assertSafeSegment(key.styleSourceKey, 'cache key');
    return path.join(
      this.cacheDir,
      key.styleSourceKey,
      String(key.z),
      String(key.x),
      `${key.y}.${FORMAT_EXTENSIONS[key.format]}`
    );
  }

  metaPath(key: CacheKey): string {
    return `${this.payloadPath(key)}${META_SUFFIX}`;
  }

  async lookup(key: CacheKey): Promise<CachedArtifact | null> {
    const payloadPath = this.payloadPath(key);
    const meta = await this.readMetadata(`${payloadPath}${META_SUFFIX}`);
    if (!meta) return null;

    const age = this.now() - meta.cached_at;
    if (meta.ttl <= 0 || age > meta.ttl) {
      return null;
    }

    try {
      const content = await readFile(payloadPath);
      return {
        content,
        contentType: meta.content_type,
        headers: meta.headers,
        ttl: meta.ttl,
        cachedAt: meta.cached_at,
      };
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        proxyLogger.warn('Cached tile unreadable, treating as miss', {
          path: payloadPath,
          error: getErrorMessage(error),
        });
      }
      return null;
    }
  }

  async store(
    key: CacheKey,
    content: Buffer,
    contentType: string,
    headers: Record<string, string> = {},
    ttl?: number
  ): Promise<void> {
    const payloadPath = this.payloadPath(key);
    const metaPath = `${payloadPath}${META_SUFFIX}`;
    const meta: CacheMetadata = {
      content_type: contentType,
      headers: { ...headers },
      ttl: ttl ?? this.defaultTtlSeconds,
      cached_at: this.now(),
    };

    await mkdir(path.dirname(payloadPath), { recursive: true });

    // The old record must not vouch for a payload that is being replaced
    await rm(metaPath, { force: true });
    try {
      await writeFileAtomic(payloadPath, content);
      await writeFileAtomic(metaPath, JSON.stringify(meta));
    } catch (error) {
      await this.discardMetadata(metaPath);
      throw error;
    }
  }

  async invalidate(styleSourceKey?: string): Promise<number> {
    if (styleSourceKey !== undefined) {
      assertSafeSegment(styleSourceKey, 'cache key');
      return this.removeKeyDir(path.join(this.cacheDir, styleSourceKey));
    }

    let count = 0;
    for (const keyDir of await this.listKeyDirs()) {
      count += await this.removeKeyDir(path.join(this.cacheDir, keyDir));
    }
    return count;
  }

  async stats(): Promise<CacheStats> {
    const byKey: Record<string, CacheKeyStats> = {};
    let totalSizeBytes = 0;
    let totalFileCount = 0;

    for (const keyDir of await this.listKeyDirs()) {
      let sizeBytes = 0;
      let fileCount = 0;
      for (const file of await listFiles(path.join(this.cacheDir, keyDir))) {
        if (file.endsWith(META_SUFFIX)) continue;
        const size = await this.fileSize(file);
        if (size === null) continue;
        sizeBytes += size;
        fileCount += 1;
      }
      byKey[keyDir] = { sizeBytes, sizeMb: toMegabytes(sizeBytes), fileCount };
      totalSizeBytes += sizeBytes;
      totalFileCount += fileCount;
    }

    return {
      totalSizeBytes,
      totalSizeMb: toMegabytes(totalSizeBytes),
      totalFileCount,
      byKey,
    };
  }

  /** Parse a metadata record; any fault reads as absent */
  private async readMetadata(metaPath: string): Promise<CacheMetadata | null> {
    let raw: string;
    try {
      raw = await readFile(metaPath, 'utf8');
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        proxyLogger.warn('Cache metadata unreadable, treating as miss', {
          path: metaPath,
          error: getErrorMessage(error),
        });
      }
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      proxyLogger.warn('Corrupt cache metadata, treating as miss', {
        path: metaPath,
        error: getErrorMessage(error),
      });
      return null;
    }

    const result = CacheMetadataSchema.safeParse(parsed);
    if (!result.success) {
      proxyLogger.warn('Malformed cache metadata, treating as miss', {
        path: metaPath,
        error: result.error.message,
      });
      return null;
    }
    return result.data;
  }

  private async discardMetadata(metaPath: string): Promise<void> {
    try {
      await rm(metaPath, { force: true });
    } catch (error) {
      proxyLogger.error('Could not remove metadata after failed cache write', {
        path: metaPath,
        error: getErrorMessage(error),
      });
    }
  }

  private async listKeyDirs(): Promise<string[]> {
    try {
      const entries = await readdir(this.cacheDir, { withFileTypes: true });
      return entries.filter((e) => e.isDirectory() && isSafeSegment(e.name)).map((e) => e.name);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return [];
      throw error;
    }
  }

  private async removeKeyDir(keyDir: string): Promise<number> {
    const count = (await listFiles(keyDir)).length;
    await rm(keyDir, { recursive: true, force: true });
    return count;
  }

  private async fileSize(file: string): Promise<number | null> {
    try {
      return (await stat(file)).size;
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return null;
      throw error;
    }
  }
}
