/**
 * Metrics Service
 * Tracks cache and upstream counters for observability
 * Prometheus-compatible text output
 */

export interface ProxyCounters {
  cacheHits: number;
  cacheMisses: number;
  inflightJoins: number;
  notFound: number;
  upstreamErrors: number;
  transportErrors: number;
  cacheWriteFailures: number;
  invalidatedFiles: number;
}

export interface LatencyMetrics {
  upstreamLatencyMs: number[];
}

const MAX_SAMPLES = 1000;

export class MetricsService {
  private startTime: Date;
  private counters: ProxyCounters;
  private latency: LatencyMetrics;
  private upstreamStatuses: Map<number, number>;

  constructor() {
    this.startTime = new Date();
    this.counters = {
      cacheHits: 0,
      cacheMisses: 0,
      inflightJoins: 0,
      notFound: 0,
      upstreamErrors: 0,
      transportErrors: 0,
      cacheWriteFailures: 0,
      invalidatedFiles: 0,
    };
    this.latency = { upstreamLatencyMs: [] };
    this.upstreamStatuses = new Map();
  }

  recordCacheHit(): void {
    this.counters.cacheHits++;
  }

  recordCacheMiss(): void {
    this.counters.cacheMisses++;
  }

  /** A miss that waited on another request's fetch instead of starting one */
  recordInflightJoin(): void {
    this.counters.inflightJoins++;
  }

  recordNotFound(): void {
    this.counters.notFound++;
  }

  recordUpstreamError(status: number): void {
    this.counters.upstreamErrors++;
    this.upstreamStatuses.set(status, (this.upstreamStatuses.get(status) ?? 0) + 1);
  }

  recordTransportError(): void {
    this.counters.transportErrors++;
  }

  recordCacheWriteFailure(): void {
    this.counters.cacheWriteFailures++;
  }

  recordInvalidation(fileCount: number): void {
    this.counters.invalidatedFiles += fileCount;
  }

  recordUpstreamLatency(durationMs: number): void {
    this.latency.upstreamLatencyMs.push(durationMs);
    if (this.latency.upstreamLatencyMs.length > MAX_SAMPLES) {
      this.latency.upstreamLatencyMs.shift();
    }
  }

  /**
   * Get all metrics
   */
  getMetrics(): {
    uptime: number;
    counters: ProxyCounters;
    hitRatio: number;
    upstreamStatuses: Record<string, number>;
    latency: { upstreamP50: number; upstreamP95: number; upstreamP99: number };
  } {
    const lookups = this.counters.cacheHits + this.counters.cacheMisses;
    return {
      uptime: Date.now() - this.startTime.getTime(),
      counters: { ...this.counters },
      hitRatio: lookups > 0 ? this.counters.cacheHits / lookups : 0,
      upstreamStatuses: Object.fromEntries([...this.upstreamStatuses].map(([s, n]) => [String(s), n])),
      latency: {
        upstreamP50: this.calculatePercentile(this.latency.upstreamLatencyMs, 50),
        upstreamP95: this.calculatePercentile(this.latency.upstreamLatencyMs, 95),
        upstreamP99: this.calculatePercentile(this.latency.upstreamLatencyMs, 99),
      },
    };
  }

  /**
   * Get Prometheus-formatted metrics
   */
  getPrometheusMetrics(): string {
    const m = this.getMetrics();
    const statusLines = Object.entries(m.upstreamStatuses)
      .map(([status, count]) => `tile_proxy_upstream_errors_total{status="${status}"} ${count}`)
      .join('\n');

    return `
# HELP tile_proxy_uptime_ms Service uptime in milliseconds
# TYPE tile_proxy_uptime_ms gauge
tile_proxy_uptime_ms ${m.uptime}

# HELP tile_proxy_cache_hits_total Tiles served from the cache
# TYPE tile_proxy_cache_hits_total counter
tile_proxy_cache_hits_total ${m.counters.cacheHits}

# HELP tile_proxy_cache_misses_total Tile requests that missed the cache
# TYPE tile_proxy_cache_misses_total counter
tile_proxy_cache_misses_total ${m.counters.cacheMisses}

# HELP tile_proxy_inflight_joins_total Misses served by another request's fetch
# TYPE tile_proxy_inflight_joins_total counter
tile_proxy_inflight_joins_total ${m.counters.inflightJoins}

# HELP tile_proxy_not_found_total Requests for unknown styles or sources
# TYPE tile_proxy_not_found_total counter
tile_proxy_not_found_total ${m.counters.notFound}

# HELP tile_proxy_upstream_errors_total Upstream non-200 responses by status
# TYPE tile_proxy_upstream_errors_total counter
${statusLines || 'tile_proxy_upstream_errors_total 0'}

# HELP tile_proxy_transport_errors_total Upstream network failures and timeouts
# TYPE tile_proxy_transport_errors_total counter
tile_proxy_transport_errors_total ${m.counters.transportErrors}

# HELP tile_proxy_cache_write_failures_total Fetched tiles that could not be stored
# TYPE tile_proxy_cache_write_failures_total counter
tile_proxy_cache_write_failures_total ${m.counters.cacheWriteFailures}

# HELP tile_proxy_invalidated_files_total Files removed by cache invalidation
# TYPE tile_proxy_invalidated_files_total counter
tile_proxy_invalidated_files_total ${m.counters.invalidatedFiles}

# HELP tile_proxy_upstream_latency_ms Upstream fetch latency percentiles
# TYPE tile_proxy_upstream_latency_ms gauge
tile_proxy_upstream_latency_ms{quantile="0.5"} ${m.latency.upstreamP50}
tile_proxy_upstream_latency_ms{quantile="0.95"} ${m.latency.upstreamP95}
tile_proxy_upstream_latency_ms{quantile="0.99"} ${m.latency.upstreamP99}
`.trim();
  }

  /**
   * Calculate percentile
   */
  private calculatePercentile(values: number[], percentile: number): number {
    if (values.length === 0) return 0;
    const sorted = [...values].sort((a, b) => a - b);
    const index = Math.ceil((percentile / 100) * sorted.length) - 1;
    return sorted[Math.max(0, index)];
  }

  /**
   * Reset metrics (for testing)
   */
  reset(): void {
    this.startTime = new Date();
    this.counters = {
      cacheHits: 0,
      cacheMisses: 0,
      inflightJoins: 0,
      notFound: 0,
      upstreamErrors: 0,
      transportErrors: 0,
      cacheWriteFailures: 0,
      invalidatedFiles: 0,
    };
    this.latency = { upstreamLatencyMs: [] };
    this.upstreamStatuses.clear();
  }
}

// Singleton instance
export const metrics = new MetricsService();
