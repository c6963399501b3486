/**
 * Proxy Express Routes
 * GET  /tiles/:style/:source/:z/:x/:y.:ext - cached tile proxy
 * GET  /sprites/:file                      - sprite sheets (json/png, @2x)
 * GET  /glyphs/:style/:fontstack/:range    - glyph ranges
 * GET  /cache/stats, DELETE /cache/:key    - cache management
 */

import { Router, type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import { formatForExtension, parseCoordinate } from '../lib/cache-keys.js';
import { NotFoundError } from '../lib/errors.js';
import type { TileRequest } from '../lib/types.js';
import type { SpriteVariant, TileProxy } from './tile-proxy.js';

type AsyncRoute = (req: Request, res: Response, signal: AbortSignal) => Promise<void>;

/**
 * Wrap an async handler: rejections go to the error middleware, and the
 * handler gets a signal that aborts when the client disconnects early.
 */
export function asyncRoute(handler: AsyncRoute): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });
    handler(req, res, controller.signal).catch(next);
  };
}

/** Parse the tile route parameters into a logical tile request */
export function parseTileRequest(params: Record<string, string>): TileRequest {
  return {
    styleName: params.style,
    sourceName: params.source,
    z: parseCoordinate(params.z, 'z'),
    x: parseCoordinate(params.x, 'x'),
    y: parseCoordinate(params.y, 'y'),
    format: formatForExtension(params.ext),
  };
}

const SPRITE_FILE = /^(.+?)(@2x)?(\.json|\.png)?$/;

/** Split a sprite file name like `style@2x.png` into style and variant */
export function parseSpriteFile(file: string): { styleName: string; variant: SpriteVariant } {
  const match = SPRITE_FILE.exec(file);
  if (!match) {
    throw new NotFoundError(`No sprite source for ${file}`);
  }
  const extension = match[3] === '.json' || match[3] === '.png' ? match[3] : '';
  return {
    styleName: match[1],
    variant: { retina: match[2] === '@2x', extension },
  };
}

/** Create router for tile, sprite and glyph proxying */
export function createProxyRouter(proxy: TileProxy): Router {
  const router = Router();

  router.get(
    '/tiles/:style/:source/:z/:x/:y.:ext',
    asyncRoute(async (req, res, signal) => {
      const tile = await proxy.getTile(parseTileRequest(req.params), signal);
      res.status(200).set(tile.headers).type(tile.contentType).send(tile.content);
    })
  );

  router.get(
    '/sprites/:file',
    asyncRoute(async (req, res, signal) => {
      const { styleName, variant } = parseSpriteFile(req.params.file);
      const asset = await proxy.getSprite(styleName, variant, signal);
      res.status(200).set('Cache-Control', proxy.cacheControl()).type(asset.contentType).send(asset.content);
    })
  );

  router.get(
    '/glyphs/:style/:fontstack/:range',
    asyncRoute(async (req, res, signal) => {
      const asset = await proxy.getGlyphs(req.params.style, req.params.fontstack, req.params.range, signal);
      res.status(200).set('Cache-Control', proxy.cacheControl()).type(asset.contentType).send(asset.content);
    })
  );

  return router;
}

/** Create router for cache statistics and invalidation */
export function createCacheRouter(proxy: TileProxy, adminGuard: RequestHandler): Router {
  const router = Router();

  router.get(
    '/cache/stats',
    asyncRoute(async (req, res) => {
      res.json(await proxy.getCacheStats());
    })
  );

  router.delete(
    '/cache/:key',
    adminGuard,
    asyncRoute(async (req, res) => {
      res.json(await proxy.invalidate(req.params.key));
    })
  );

  return router;
}
