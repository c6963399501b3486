/**
 * HTTP Server
 * Express server exposing the tile proxy, cache management and operational
 * endpoints
 */

import type { Server } from 'node:http';
import express, { type NextFunction, type Request, type Response } from 'express';
import { proxyLogger } from './lib/logger.js';
import type { AppConfig } from './lib/config.js';
import {
  finishRequest,
  generateCorrelationId,
  getCorrelationContext,
  runWithCorrelation,
  setProcessingStage,
} from './lib/correlation.js';
import { ProxyError, getErrorMessage, statusCodeFor } from './lib/errors.js';
import { metrics } from './services/metrics.js';
import { createCacheRouter, createProxyRouter } from './services/proxy-routes.js';
import type { TileProxy } from './services/tile-proxy.js';

export type ServerConfig = Pick<AppConfig, 'server'>;

export class HttpServer {
  private app: express.Application;
  private server?: Server;
  private proxy: TileProxy;
  private config: ServerConfig;

  constructor(proxy: TileProxy, config: ServerConfig) {
    this.proxy = proxy;
    this.config = config;
    this.app = express();
    this.app.disable('x-powered-by');
    this.setupMiddleware();
    this.setupRoutes();
    this.app.use(this.handleError.bind(this));
  }

  /** Express application (for tests and embedding) */
  getApp(): express.Application {
    return this.app;
  }

  /**
   * Setup middleware
   */
  private setupMiddleware(): void {
    this.app.use((req, res, next) => {
      const requestId = generateCorrelationId();
      res.setHeader('X-Request-Id', requestId);
      runWithCorrelation(requestId, () => {
        const context = getCorrelationContext();
        res.on('finish', () => {
          if (!context) return;
          const durationMs = finishRequest(context);
          proxyLogger.debug('HTTP response', {
            requestId,
            status: res.statusCode,
            stage: context.stage,
            durationMs,
          });
        });
        proxyLogger.debug('HTTP request', {
          method: req.method,
          path: req.path,
          ip: req.ip,
        });
        next();
      });
    });
  }

  /**
   * Setup routes
   */
  private setupRoutes(): void {
    const adminGuard = this.authenticateRequest.bind(this);

    this.app.get('/health', this.handleHealth.bind(this));
    this.app.get('/metrics', adminGuard, this.handleMetrics.bind(this));

    this.app.use('/api/proxy', createProxyRouter(this.proxy));
    this.app.use('/api', createCacheRouter(this.proxy, adminGuard));
  }

  /**
   * Handle health check
   */
  private handleHealth(req: Request, res: Response): void {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  }

  /**
   * Handle metrics endpoint
   */
  private handleMetrics(req: Request, res: Response): void {
    const accept = req.headers.accept || '';

    if (accept.includes('application/json')) {
      res.json(metrics.getMetrics());
    } else {
      res.type('text/plain').send(metrics.getPrometheusMetrics());
    }
  }

  /**
   * Map typed failures onto status codes; unexpected errors become 500
   */
  private handleError(err: unknown, req: Request, res: Response, next: NextFunction): void {
    const stage = getCorrelationContext()?.stage;
    setProcessingStage('failed');
    const status = statusCodeFor(err);

    if (err instanceof ProxyError) {
      const log = status >= 500 ? proxyLogger.warn.bind(proxyLogger) : proxyLogger.debug.bind(proxyLogger);
      log('Request failed', { method: req.method, path: req.path, status, stage, error: err.message });
    } else {
      proxyLogger.error('Unhandled request error', {
        stage,
        error: getErrorMessage(err),
        stack: err instanceof Error ? err.stack : undefined,
      });
    }

    if (res.headersSent) {
      next(err);
      return;
    }

    const message = err instanceof ProxyError ? err.message : 'Internal server error';
    res.status(status).json({ error: message, status });
  }

  /**
   * Authentication middleware for cache invalidation and metrics
   */
  private authenticateRequest(req: Request, res: Response, next: NextFunction): void {
    const apiKey = this.config.server.adminApiKey;
    const authHeader = req.headers.authorization || '';
    const headerToken = authHeader.startsWith('Bearer ') ? authHeader.slice(7) : undefined;
    const apiKeyHeader = req.headers['x-api-key'];
    const providedKey = headerToken || (typeof apiKeyHeader === 'string' ? apiKeyHeader : undefined);

    // Fail secure in production if no key configured
    if (!apiKey && this.config.server.environment === 'production') {
      proxyLogger.error('Admin endpoint blocked - missing API key configuration');
      res.status(503).json({ status: 'unavailable', message: 'API key not configured' });
      return;
    }

    if (apiKey && providedKey !== apiKey) {
      res.status(401).json({ status: 'unauthorized' });
      return;
    }

    next();
  }

  /**
   * Start server
   */
  async start(): Promise<void> {
    const port = this.config.server.port;

    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, () => {
        proxyLogger.info('HTTP server started', { port });
        resolve();
      });
      server.once('error', (error) => {
        reject(new Error(`HTTP server failed to start: ${getErrorMessage(error)}`));
      });
      this.server = server;
    });
  }

  /**
   * Stop accepting connections and wait for in-flight requests
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = undefined;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    proxyLogger.info('HTTP server stopped');
  }
}
