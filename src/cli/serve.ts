import { Command, InvalidArgumentError } from 'commander';
import { loadServerConfig } from '../config/index.js';
import { logError, toError } from '../errors/index.js';
import { startServer, type RunningServer } from '../server/start.js';

export interface ServeOptions {
  port?: number;
  host?: string;
  root?: string;
  preload?: string[];
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 0 and 65535.');
  }
  return port;
}

export interface SignalSource {
  once(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

/** Close the server on SIGINT/SIGTERM; the process then exits with 0. */
export function closeOnSignals(running: RunningServer, signals: SignalSource = process): void {
  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`Received ${signal}, shutting down`);
    running.close().then(
      () => console.log('Server closed'),
      (error: unknown) => {
        logError(toError(error), { phase: 'shutdown' });
        process.exitCode = 1;
      }
    );
  };

  signals.once('SIGINT', shutdown);
  signals.once('SIGTERM', shutdown);
}

const createServe = (program: Command) => {
  program
    .command('serve', { isDefault: true })
    .description('Serve the asset root over HTTP with precompressed gzip negotiation')
    .option('-p, --port <port>', 'port to listen on (default 5000, or $PORT)', parsePort)
    .option('-H, --host <host>', 'interface to bind (default 0.0.0.0, or $HOST)')
    .option('-r, --root <dir>', 'asset root directory (default ./public, or $ASSET_ROOT)')
    .option('--preload <paths...>', 'URL paths to keep in memory, e.g. /catalog/catalog.json')
    .action(async (options: ServeOptions) => {
      const config = loadServerConfig({
        port: options.port,
        host: options.host,
        root: options.root,
        preload: options.preload,
      });
      const running = await startServer(config);
      closeOnSignals(running);
    });
};

export default createServe;
