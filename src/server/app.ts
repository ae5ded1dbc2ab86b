/**
 * HTTP application: GET/HEAD static delivery, nothing else.
 */

import { Hono } from 'hono';
import type { HttpBindings } from '@hono/node-server';
import { AssetResolver } from '../static/resolve.js';
import { errorResponse, requestPathname, serveStaticAsset } from '../static/server.js';
import { EMPTY_PRELOAD } from '../static/asset-cache.js';
import type { PreloadedAssetMap } from '../static/types.js';
import type { ServerConfig } from '../config/index.js';
import { logAccess } from './access-log.js';

export interface AppOptions {
  config: Pick<ServerConfig, 'root' | 'entryPage' | 'cacheControl' | 'compressibleExtensions'>;
  preloaded?: PreloadedAssetMap;
}

/** Node bindings are absent when the app is called through `app.request()`. */
type AppEnv = { Bindings: Partial<HttpBindings> };

function pathnameOf(request: Request, env: AppEnv['Bindings'] | undefined): string {
  return requestPathname(request, env?.incoming?.url);
}

export function createResolver(config: AppOptions['config']): AssetResolver {
  return new AssetResolver({
    root: config.root,
    entryPage: config.entryPage,
    compressibleExtensions: config.compressibleExtensions,
  });
}

export function createApp({ config, preloaded = EMPTY_PRELOAD }: AppOptions) {
  const resolver = createResolver(config);
  const app = new Hono<AppEnv>();

  app.use('*', async (c, next) => {
    const startedAt = performance.now();
    await next();
    logAccess({
      method: c.req.method,
      pathname: pathnameOf(c.req.raw, c.env),
      status: c.res.status,
      encoding: c.res.headers.get('Content-Encoding') ?? 'identity',
      durationMs: Math.round(performance.now() - startedAt),
    });
  });

  // Hono routes HEAD through GET handlers; the raw request keeps its method
  app.get('*', c =>
    serveStaticAsset(
      c.req.raw,
      { resolver, cacheControl: config.cacheControl, preloaded },
      pathnameOf(c.req.raw, c.env)
    )
  );

  app.all('*', c =>
    c.text('Method not allowed', 405, {
      Allow: 'GET, HEAD',
      'Cache-Control': config.cacheControl,
    })
  );

  app.onError((error, c) =>
    errorResponse(error, pathnameOf(c.req.raw, c.env), config.cacheControl)
  );

  return app;
}
