import { createServer, type Server } from 'node:http';
import { AxiosError, type AxiosInstance } from 'axios';
import { describe, it, expect, vi, beforeEach, beforeAll, afterAll } from 'vitest';
import { TransportError, UpstreamError } from '../lib/errors.js';
import { metrics } from './metrics.js';
import { UpstreamFetcher, requestHeadersFor, toTransportError } from './upstream-fetcher.js';

vi.mock('../lib/logger.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../lib/logger.js')>();
  return {
    ...actual,
    proxyLogger: {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    },
  };
});

function okResponse(body: string, contentType?: string) {
  const bytes = Buffer.from(body);
  return {
    status: 200,
    data: bytes.buffer.slice(bytes.byteOffset, bytes.byteOffset + bytes.byteLength),
    headers: contentType ? { 'content-type': contentType } : {},
  };
}

describe('requestHeadersFor', () => {
  it('should add Referer and Origin for known providers', () => {
    const headers = requestHeadersFor('maptiler');
    expect(headers.Referer).toBe('https://www.maptiler.com/');
    expect(headers.Origin).toBe('https://www.maptiler.com');
    expect(headers.Accept).toBe('*/*');
  });

  it('should send only browser headers for generic providers', () => {
    const headers = requestHeadersFor('generic');
    expect(headers.Referer).toBeUndefined();
    expect(headers['User-Agent']).toContain('Mozilla/5.0');
  });
});

describe('toTransportError', () => {
  it('should flag axios timeouts', () => {
    const error = toTransportError(new AxiosError('timeout of 30000ms exceeded', 'ECONNABORTED'));
    expect(error.timedOut).toBe(true);
    expect(error.message).toBe('Failed to fetch from upstream: timeout of 30000ms exceeded');
  });

  it('should wrap other failures', () => {
    const error = toTransportError(new Error('socket hang up'));
    expect(error.timedOut).toBe(false);
    expect(error.message).toBe('Failed to fetch from upstream: socket hang up');
  });
});

describe('UpstreamFetcher', () => {
  let get: ReturnType<typeof vi.fn>;
  let fetcher: UpstreamFetcher;

  beforeEach(() => {
    metrics.reset();
    get = vi.fn();
    fetcher = new UpstreamFetcher({ timeoutMs: 5000, client: { get } as unknown as AxiosInstance });
  });

  it('should return the body and content type on 200', async () => {
    get.mockResolvedValue(okResponse('tile-bytes', 'application/x-protobuf'));

    const result = await fetcher.fetch('https://api.maptiler.com/tiles/v3/5/10/12.pbf?key=test-secret', 'maptiler');

    expect(result.body.toString()).toBe('tile-bytes');
    expect(result.contentType).toBe('application/x-protobuf');
  });

  it('should send provider headers with a binary response type', async () => {
    get.mockResolvedValue(okResponse('tile'));

    await fetcher.fetch('https://tile.tracestrack.com/topo/5/12/10.png', 'tracestrack');

    const [url, options] = get.mock.calls[0];
    expect(url).toBe('https://tile.tracestrack.com/topo/5/12/10.png');
    expect(options.headers.Referer).toBe('https://console.tracestrack.com/');
    expect(options.responseType).toBe('arraybuffer');
    expect(options.timeout).toBe(5000);
    expect(options.maxRedirects).toBe(5);
  });

  it('should leave the content type undefined when the provider sends none', async () => {
    get.mockResolvedValue(okResponse('tile'));

    const result = await fetcher.fetch('https://t/1/2/3.png', 'generic');

    expect(result.contentType).toBeUndefined();
  });

  it('should throw UpstreamError for non-200 statuses', async () => {
    get.mockResolvedValue({ status: 403, data: new ArrayBuffer(0), headers: {} });

    const error = await fetcher.fetch('https://t/1/2/3.png', 'generic').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({ upstreamStatus: 403, statusCode: 403 });
    expect(metrics.getMetrics().upstreamStatuses).toEqual({ '403': 1 });
  });

  it('should throw TransportError when the request fails', async () => {
    get.mockRejectedValue(new Error('connect ECONNREFUSED'));

    await expect(fetcher.fetch('https://t/1/2/3.png', 'generic')).rejects.toThrow(
      new TransportError('Failed to fetch from upstream: connect ECONNREFUSED')
    );
    expect(metrics.getMetrics().counters.transportErrors).toBe(1);
  });

  it('should not start a request for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(fetcher.fetch('https://t/1/2/3.png', 'generic', controller.signal)).rejects.toThrow(
      'Upstream request aborted'
    );
    expect(get).not.toHaveBeenCalled();
  });

  it('should abort the client request when the caller aborts', async () => {
    get.mockResolvedValue(okResponse('tile'));
    const controller = new AbortController();

    await fetcher.fetch('https://t/1/2/3.png', 'generic', controller.signal);
    const passed: AbortSignal = get.mock.calls[0][1].signal;
    expect(passed.aborted).toBe(false);

    controller.abort();
    expect(passed.aborted).toBe(true);
  });

  it('should count time spent waiting for a provider slot against the timeout', async () => {
    const hanging = vi.fn(
      (_url: string, options: { signal: AbortSignal }) =>
        new Promise((_resolve, reject) => {
          options.signal.addEventListener('abort', () => reject(new Error('canceled')), { once: true });
        })
    );
    const limited = new UpstreamFetcher({
      timeoutMs: 50,
      maxConcurrency: 1,
      client: { get: hanging } as unknown as AxiosInstance,
    });

    const results = await Promise.allSettled([
      limited.fetch('https://t/1/0/0.png', 'generic'),
      limited.fetch('https://t/1/0/1.png', 'generic'),
    ]);

    for (const result of results) {
      expect(result.status).toBe('rejected');
      if (result.status === 'rejected') {
        expect(result.reason).toBeInstanceOf(TransportError);
        expect(result.reason).toMatchObject({ timedOut: true, message: 'Upstream request timed out after 50ms' });
      }
    }
  });

  it('should bound concurrent requests per provider', async () => {
    const limited = new UpstreamFetcher({ maxConcurrency: 1, client: { get } as unknown as AxiosInstance });
    let release: () => void = () => undefined;
    get.mockImplementationOnce(
      () =>
        new Promise((resolve) => {
          release = () => resolve(okResponse('first'));
        })
    );
    get.mockResolvedValue(okResponse('second'));

    const first = limited.fetch('https://t/1/0/0.png', 'generic');
    const second = limited.fetch('https://t/1/0/1.png', 'generic');
    const other = limited.fetch('https://api.mapbox.com/1/0/0.mvt', 'mapbox');

    await vi.waitFor(() => expect(get).toHaveBeenCalledTimes(2));
    expect(limited.pendingCount('generic')).toBe(1);
    expect(limited.pendingCount('mapbox')).toBe(0);

    release();
    const results = await Promise.all([first, second, other]);
    expect(results.map((r) => r.body.toString())).toEqual(['first', 'second', 'second']);
  });
});

describe('UpstreamFetcher against a slow server', () => {
  let server: Server;
  let baseUrl: string;
  const timers: NodeJS.Timeout[] = [];

  beforeAll(async () => {
    // Sends one byte every 20ms for two seconds, so the socket never idles
    server = createServer((_req, res) => {
      res.writeHead(200, { 'Content-Type': 'image/png' });
      let sent = 0;
      const timer = setInterval(() => {
        res.write('x');
        sent += 1;
        if (sent === 100) {
          clearInterval(timer);
          res.end();
        }
      }, 20);
      timers.push(timer);
      res.on('close', () => clearInterval(timer));
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server has no TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    timers.forEach((timer) => clearInterval(timer));
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('should cut off a response that trickles in past the timeout', async () => {
    const fetcher = new UpstreamFetcher({ timeoutMs: 200 });
    const started = Date.now();

    const error = await fetcher.fetch(`${baseUrl}/1/0/0.png`, 'generic').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ timedOut: true, message: 'Upstream request timed out after 200ms' });
    expect(Date.now() - started).toBeLessThan(1500);
  });
});
