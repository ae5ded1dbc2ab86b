/**
 * Binds the HTTP application to a Node server through @hono/node-server.
 */

import { createServer, type Server } from 'node:http';
import { getRequestListener } from '@hono/node-server';
import type { ServerConfig } from '../config/index.js';
import { preloadAssets } from '../static/asset-cache.js';
import { createApp, createResolver } from './app.js';

export interface RunningServer {
  server: Server;
  port: number;
  close(): Promise<void>;
}

/**
 * Preload configured assets, then listen. Rejects on bind failure
 * (EADDRINUSE, EACCES).
 */
export async function startServer(config: ServerConfig): Promise<RunningServer> {
  const resolver = createResolver(config);
  const preloaded = await preloadAssets(resolver, config.preload);
  const app = createApp({ config, preloaded });

  const server = createServer(getRequestListener(app.fetch));
  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.port, config.host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const port = typeof address === 'object' && address !== null ? address.port : config.port;

  console.log(`Serving ${config.root} on http://${config.host}:${port}`, {
    compressibleExtensions: config.compressibleExtensions,
    preloaded: [...preloaded.keys()],
  });

  return {
    server,
    port,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
      }),
  };
}
