import { describe, it, expect, vi, beforeEach } from 'vitest';
import request from 'supertest';
import { HttpServer, type ServerConfig } from './server.js';
import { proxyLogger } from './lib/logger.js';
import type { TileCacheStore } from './lib/tile-cache.js';
import { metrics } from './services/metrics.js';
import type { StyleSourceResolver } from './services/source-resolver.js';
import { TileProxy } from './services/tile-proxy.js';
import type { TileFetcher } from './services/upstream-fetcher.js';

// Mock dependencies
vi.mock('./lib/logger.js', () => ({
  proxyLogger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

function createProxy(): TileProxy {
  const cache: TileCacheStore = {
    lookup: vi.fn(async () => null),
    store: vi.fn(async () => undefined),
    invalidate: vi.fn(async () => 0),
    stats: vi.fn(async () => ({ totalSizeBytes: 0, totalSizeMb: 0, totalFileCount: 0, byKey: {} })),
  };
  const resolver: StyleSourceResolver = {
    resolve: vi.fn(async () => Promise.reject(new Error('resolver exploded'))),
    resolveAssets: vi.fn(async () => Promise.reject(new Error('resolver exploded'))),
  };
  const fetcher: TileFetcher = { fetch: vi.fn() };
  return new TileProxy(cache, resolver, fetcher);
}

function createServer(server: ServerConfig['server']): HttpServer {
  return new HttpServer(createProxy(), { server });
}

describe('HttpServer', () => {
  let server: HttpServer;

  beforeEach(() => {
    metrics.reset();
    server = createServer({ port: 0, environment: 'test', adminApiKey: 'test-secret' });
  });

  describe('Health Check Endpoint', () => {
    it('should return healthy status', async () => {
      const res = await request(server.getApp()).get('/health').expect(200);

      expect(res.body.status).toBe('healthy');
      expect(res.body.timestamp).toBeDefined();
      expect(res.body.uptime).toBeGreaterThanOrEqual(0);
    });

    it('should tag responses with a request ID', async () => {
      const res = await request(server.getApp()).get('/health');
      expect(res.headers['x-request-id']).toMatch(/^req-/);
      expect(res.headers['x-powered-by']).toBeUndefined();
    });
  });

  describe('Request Logging', () => {
    function responseLogFor(requestId: string) {
      return vi
        .mocked(proxyLogger.debug)
        .mock.calls.find(([message, meta]) => message === 'HTTP response' && meta?.requestId === requestId);
    }

    it('should log completed requests with their status', async () => {
      const res = await request(server.getApp()).get('/health').expect(200);
      const requestId = String(res.headers['x-request-id']);

      await vi.waitFor(() => expect(responseLogFor(requestId)).toBeDefined());
      expect(responseLogFor(requestId)?.[1]).toMatchObject({ status: 200, stage: 'completed' });
    });

    it('should keep the failed stage for errored requests', async () => {
      const res = await request(server.getApp()).get('/api/proxy/tiles/outdoor/planet/1/0/0.pbf').expect(500);
      const requestId = String(res.headers['x-request-id']);

      await vi.waitFor(() => expect(responseLogFor(requestId)).toBeDefined());
      expect(responseLogFor(requestId)?.[1]).toMatchObject({ status: 500, stage: 'failed' });
    });
  });

  describe('Metrics Endpoint', () => {
    it('should require the admin key', async () => {
      await request(server.getApp()).get('/metrics').expect(401);
    });

    it('should return Prometheus text by default', async () => {
      const res = await request(server.getApp()).get('/metrics').set('x-api-key', 'test-secret').expect(200);

      expect(res.headers['content-type']).toMatch(/^text\/plain/);
      expect(res.text).toContain('tile_proxy_cache_hits_total 0');
    });

    it('should return JSON when requested', async () => {
      const res = await request(server.getApp())
        .get('/metrics')
        .set('Authorization', 'Bearer test-secret')
        .set('Accept', 'application/json')
        .expect(200);

      expect(res.body.counters.cacheHits).toBe(0);
      expect(res.body.hitRatio).toBe(0);
    });

    it('should leave metrics open in development without a key', async () => {
      const open = createServer({ port: 0, environment: 'development' });
      await request(open.getApp()).get('/metrics').expect(200);
    });

    it('should block admin endpoints in production without a key', async () => {
      const locked = createServer({ port: 0, environment: 'production' });

      const res = await request(locked.getApp()).get('/metrics').expect(503);
      expect(res.body).toEqual({ status: 'unavailable', message: 'API key not configured' });
      await request(locked.getApp()).delete('/api/cache/all').expect(503);
    });
  });

  describe('Error Handling', () => {
    it('should hide unexpected errors behind a 500', async () => {
      const res = await request(server.getApp()).get('/api/proxy/tiles/outdoor/planet/1/0/0.pbf').expect(500);

      expect(res.body).toEqual({ error: 'Internal server error', status: 500 });
    });

    it('should report typed failures with their status', async () => {
      const res = await request(server.getApp()).get('/api/proxy/glyphs/outdoor/Noto%20Sans/latin.pbf').expect(400);

      expect(res.body).toEqual({ error: 'Invalid glyph range: latin.pbf', status: 400 });
    });
  });

  describe('Lifecycle', () => {
    it('should start and stop', async () => {
      await server.start();
      await server.stop();
    });

    it('should ignore stop before start', async () => {
      await expect(server.stop()).resolves.toBeUndefined();
    });
  });
});
