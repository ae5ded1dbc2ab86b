/**
 * Static asset responses with precompressed gzip negotiation.
 */

import type { ReadStream } from 'node:fs';
import { open, type FileHandle } from 'node:fs/promises';
import {
  AssetReadError,
  errnoCode,
  httpStatusFor,
  logError,
  toError,
} from '../errors/index.js';
import { chooseEncoding } from './negotiate.js';
import type { AssetResolver } from './resolve.js';
import type { EncodingDecision, FileVariant, PreloadedAssetMap, ResolvedAsset } from './types.js';

export interface StaticServerOptions {
  resolver: Pick<AssetResolver, 'resolve'>;
  /** Cache-Control value sent with every response */
  cacheControl: string;
  /** Bytes loaded at startup, keyed by logical path */
  preloaded?: PreloadedAssetMap;
}

const ERROR_BODIES: Record<number, string> = {
  400: 'Bad request',
  404: 'Not found',
  500: 'Internal server error',
};

/**
 * Path of the request as the client sent it. `rawTarget` is the request-target
 * from the Node request; `new URL` would drop its `..` segments.
 */
export function requestPathname(request: Request, rawTarget?: string): string {
  if (!rawTarget) {
    return new URL(request.url).pathname;
  }
  const [path] = rawTarget.replace(/^[a-z][a-z0-9+.-]*:\/\/[^/?#]*/i, '').split(/[?#]/, 1);
  return path.startsWith('/') ? path : `/${path}`;
}

/** Create HTTP response for a static asset (supports conditional requests). */
export async function serveStaticAsset(
  request: Request,
  options: StaticServerOptions,
  pathname: string = requestPathname(request)
): Promise<Response> {

  let asset: ResolvedAsset;
  try {
    asset = await options.resolver.resolve(pathname);
  } catch (error) {
    return errorResponse(toError(error), pathname, options.cacheControl);
  }

  const decision = chooseEncoding(asset, request.headers.get('Accept-Encoding'));
  const headers = buildHeaders(asset, decision, options.cacheControl);

  if (headerContainsTag(request.headers.get('If-None-Match'), etagFor(decision))) {
    headers.delete('Content-Length');
    return new Response(null, { status: 304, headers });
  }

  if (request.method === 'HEAD') {
    return new Response(null, { status: 200, headers });
  }

  const cached = options.preloaded?.get(asset.logicalPath);
  const cachedBody = decision.kind === 'precompressed-gzip' ? cached?.gzip : cached?.original;
  if (cachedBody) {
    return new Response(cachedBody, { status: 200, headers });
  }

  try {
    return new Response(await openVariantStream(decision.variant, asset.logicalPath), {
      status: 200,
      headers,
    });
  } catch (error) {
    return errorResponse(toError(error), pathname, options.cacheControl);
  }
}

/** Plain-text response for a failed request; server errors are logged. */
export function errorResponse(error: Error, pathname: string, cacheControl: string): Response {
  const status = httpStatusFor(error);

  if (status === 500) {
    logError(error, { pathname });
  }

  return new Response(ERROR_BODIES[status], {
    status,
    headers: {
      'Content-Type': 'text/plain; charset=utf-8',
      ...noCacheHeaders(cacheControl),
    },
  });
}

/** Strong ETag from size and mtime; the gzip twin gets its own tag. */
export function etagFor(decision: EncodingDecision): string {
  const { size, mtimeMs } = decision.variant;
  const suffix = decision.kind === 'precompressed-gzip' ? '-gz' : '';
  return `"${size.toString(16)}-${Math.floor(mtimeMs).toString(16)}${suffix}"`;
}

function noCacheHeaders(cacheControl: string): Record<string, string> {
  return {
    'Cache-Control': cacheControl,
    Pragma: 'no-cache',
    Expires: '0',
  };
}

function buildHeaders(
  asset: ResolvedAsset,
  decision: EncodingDecision,
  cacheControl: string
): Headers {
  const headers = new Headers({
    'Content-Type': asset.contentType,
    'Content-Length': decision.variant.size.toString(),
    'Last-Modified': new Date(decision.variant.mtimeMs).toUTCString(),
    ETag: etagFor(decision),
    ...noCacheHeaders(cacheControl),
  });

  if (decision.kind === 'precompressed-gzip') {
    headers.set('Content-Encoding', 'gzip');
  }
  if (asset.compressible) {
    headers.set('Vary', 'Accept-Encoding');
  }

  return headers;
}

function headerContainsTag(headerValue: string | null, tag: string): boolean {
  if (!headerValue) {
    return false;
  }

  return headerValue
    .split(',')
    .map(value => value.trim().replace(/^W\//, ''))
    .some(value => value === tag || value === '*');
}

/**
 * Open before responding so a failing read becomes a 500 instead of a
 * truncated body. The handle closes when the stream ends or is destroyed
 * (client disconnect).
 */
async function openVariantStream(variant: FileVariant, logicalPath: string): Promise<ReadStream> {
  let handle: FileHandle;
  try {
    handle = await open(variant.filePath, 'r');
  } catch (error) {
    throw new AssetReadError('Failed to open asset', { logicalPath, errno: errnoCode(error) });
  }

  const stream = handle.createReadStream();
  stream.on('error', error => {
    logError(new AssetReadError(error.message, { logicalPath, errno: errnoCode(error) }));
  });
  return stream;
}
