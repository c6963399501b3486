/**
 * Tile Cache Proxy - Main Entry Point
 * Caching proxy for map tiles, sprites and glyphs
 */

import { config as dotenvConfig } from 'dotenv';

// Load .env before config is validated
dotenvConfig();

// Static imports would evaluate the logger before .env is loaded, leaving LOG_LEVEL unread
async function bootstrap(): Promise<{
  proxyLogger: typeof import('./lib/logger.js').proxyLogger;
  config: typeof import('./lib/config.js').config;
  loadSecretTable: typeof import('./lib/secrets.js').loadSecretTable;
  FileTileCache: typeof import('./lib/tile-cache.js').FileTileCache;
  SourceResolver: typeof import('./services/source-resolver.js').SourceResolver;
  UpstreamFetcher: typeof import('./services/upstream-fetcher.js').UpstreamFetcher;
  TileProxy: typeof import('./services/tile-proxy.js').TileProxy;
  HttpServer: typeof import('./server.js').HttpServer;
}> {
  const { proxyLogger } = await import('./lib/logger.js');
  const { config } = await import('./lib/config.js');
  const { loadSecretTable } = await import('./lib/secrets.js');
  const { FileTileCache } = await import('./lib/tile-cache.js');
  const { SourceResolver } = await import('./services/source-resolver.js');
  const { UpstreamFetcher } = await import('./services/upstream-fetcher.js');
  const { TileProxy } = await import('./services/tile-proxy.js');
  const { HttpServer } = await import('./server.js');

  return { proxyLogger, config, loadSecretTable, FileTileCache, SourceResolver, UpstreamFetcher, TileProxy, HttpServer };
}

// Type definitions for bootstrapped modules
type BootstrappedModules = Awaited<ReturnType<typeof bootstrap>>;

/**
 * Main application
 */
class Application {
  private modules: BootstrappedModules;
  private resolver!: InstanceType<BootstrappedModules['SourceResolver']>;
  private httpServer!: InstanceType<BootstrappedModules['HttpServer']>;

  constructor(modules: BootstrappedModules) {
    this.modules = modules;
  }

  /**
   * Initialize application
   */
  async initialize(): Promise<void> {
    const { proxyLogger, config, loadSecretTable, FileTileCache, SourceResolver, UpstreamFetcher, TileProxy, HttpServer } =
      this.modules;

    proxyLogger.info('Initializing Tile Cache Proxy...');

    const secrets = await loadSecretTable(config.paths.secretsFile);

    const cache = new FileTileCache(config.paths.cacheDir, {
      defaultTtlSeconds: config.cache.defaultTtlSeconds,
    });
    await cache.initialize();

    this.resolver = new SourceResolver(config.paths.stylesDir, secrets, {
      styleCacheTtlSeconds: config.cache.styleCacheTtlSeconds,
    });

    const fetcher = new UpstreamFetcher({
      timeoutMs: config.upstream.timeoutMs,
      maxConcurrency: config.upstream.maxConcurrency,
    });

    const proxy = new TileProxy(cache, this.resolver, fetcher, {
      cacheControlMaxAge: config.cache.cacheControlMaxAge,
      dedupeInflight: config.cache.dedupeInflight,
    });

    this.httpServer = new HttpServer(proxy, config);

    proxyLogger.info('Tile Cache Proxy initialized successfully', {
      cacheDir: config.paths.cacheDir,
      stylesDir: config.paths.stylesDir,
    });
  }

  /**
   * Start application
   */
  async start(): Promise<void> {
    const { proxyLogger, config } = this.modules;

    await this.httpServer.start();

    proxyLogger.info('Tile Cache Proxy started successfully', {
      port: config.server.port,
      environment: config.server.environment,
    });
  }

  /**
   * Stop application
   */
  async stop(): Promise<void> {
    const { proxyLogger } = this.modules;

    proxyLogger.info('Stopping Tile Cache Proxy...');
    await this.httpServer.stop();
    this.resolver.close();
    proxyLogger.info('Tile Cache Proxy stopped');
  }

  /**
   * Setup signal handlers
   */
  setupSignalHandlers(): void {
    const { proxyLogger } = this.modules;

    const shutdown = async (signal: string): Promise<void> => {
      proxyLogger.info(`Received ${signal}, shutting down gracefully...`);
      try {
        await this.stop();
        process.exit(0);
      } catch (error) {
        proxyLogger.error('Shutdown failed', error);
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
  }

  /**
   * Handle errors
   */
  setupErrorHandlers(): void {
    const { proxyLogger } = this.modules;

    process.on('uncaughtException', (error) => {
      proxyLogger.error('Uncaught exception', { error: error.message, stack: error.stack });
      process.exit(1);
    });

    process.on('unhandledRejection', (reason) => {
      proxyLogger.error('Unhandled rejection', { reason });
      process.exit(1);
    });
  }
}

/**
 * Main function
 */
async function main(): Promise<void> {
  try {
    const modules = await bootstrap();
    const { proxyLogger } = modules;

    const app = new Application(modules);

    app.setupSignalHandlers();
    app.setupErrorHandlers();

    await app.initialize();
    await app.start();

    proxyLogger.info('Tile Cache Proxy is running');
  } catch (error: unknown) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    const errorStack = error instanceof Error ? error.stack : undefined;
    console.error('Failed to start Tile Cache Proxy:', errorMessage, errorStack);
    process.exit(1);
  }
}

// Run application
void main();
