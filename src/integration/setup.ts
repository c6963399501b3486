/**
 * Integration Test Setup
 * Sets env vars before any module imports, and provides temporary style and
 * cache directories plus a scripted upstream.
 */

// Must set env vars BEFORE any modules that import config are loaded
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'error';

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { vi, type Mock } from 'vitest';
import { TransportError, UpstreamError } from '../lib/errors.js';
import type { ProviderKind } from '../lib/types.js';
import type { FetchedAsset, TileFetcher } from '../services/upstream-fetcher.js';

export const TEST_API_KEY = 'test-secret';

/** Scraped styles written into every fixture */
export const FIXTURE_STYLES: Record<string, unknown> = {
  'maptiler-outdoor': {
    version: 8,
    _meta: {
      source: 'https://api.maptiler.com/maps/outdoor-v2/style.json',
      original_sprite: 'https://api.maptiler.com/maps/outdoor-v2/sprite',
      original_glyphs: 'https://api.maptiler.com/fonts/{fontstack}/{range}.pbf',
      tile_sources: {
        planet: 'https://api.maptiler.com/tiles/v3/{z}/{x}/{y}.pbf',
        hillshade: 'https://api.maptiler.com/tiles/hillshade/{z}/{x}/{y}.png',
      },
    },
  },
  'tracestrack-topo': {
    version: 8,
    _meta: {
      tile_sources: { topo: 'https://tile.tracestrack.com/topo__/{z}/{y}/{x}.png' },
      tile_auth: { key: 'embedded-test-key' },
    },
  },
};

export interface TestFixture {
  root: string;
  stylesDir: string;
  cacheDir: string;
  cleanup(): Promise<void>;
}

/** Create temporary styles and cache directories */
export async function createFixture(): Promise<TestFixture> {
  const root = await mkdtemp(path.join(os.tmpdir(), 'tile-integration-'));
  const stylesDir = path.join(root, 'styles');
  const cacheDir = path.join(root, 'cache');
  await mkdir(path.join(stylesDir, 'scraped'), { recursive: true });

  for (const [name, document] of Object.entries(FIXTURE_STYLES)) {
    await writeFile(path.join(stylesDir, 'scraped', `${name}.json`), JSON.stringify(document));
  }

  return {
    root,
    stylesDir,
    cacheDir,
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
}

/** Scripted upstream: responses keyed by URL path, everything else 404 */
export class ScriptedUpstream implements TileFetcher {
  readonly calls: Mock<TileFetcher['fetch']>;
  private readonly responses = new Map<string, FetchedAsset | UpstreamError | TransportError>();

  constructor() {
    this.calls = vi.fn<TileFetcher['fetch']>(async (url: string) => this.respond(url));
  }

  /** Register a response for an upstream path (query ignored) */
  on(pathname: string, response: FetchedAsset | UpstreamError | TransportError): this {
    this.responses.set(pathname, response);
    return this;
  }

  fetch(url: string, providerKind: ProviderKind, signal?: AbortSignal): Promise<FetchedAsset> {
    return this.calls(url, providerKind, signal);
  }

  private respond(url: string): FetchedAsset {
    const response = this.responses.get(new URL(url).pathname);
    if (!response) throw new UpstreamError(404);
    if (response instanceof Error) throw response;
    return response;
  }
}
