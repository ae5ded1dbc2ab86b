/**
 * Process-wide read-only cache of selected assets.
 *
 * Built once at startup from the configured preload list and never mutated
 * afterwards; assets outside the list are streamed from disk per request.
 */

import { readFile } from 'node:fs/promises';
import { AssetReadError, errnoCode } from '../errors/index.js';
import type { AssetResolver } from './resolve.js';
import type { FileVariant, PreloadedAsset, PreloadedAssetMap } from './types.js';

export const EMPTY_PRELOAD: PreloadedAssetMap = new Map();

async function readVariant(variant: FileVariant, logicalPath: string): Promise<Uint8Array> {
  try {
    return new Uint8Array(await readFile(variant.filePath));
  } catch (error) {
    throw new AssetReadError('Failed to preload asset', { logicalPath, errno: errnoCode(error) });
  }
}

/**
 * Load the given URL paths (e.g. `/catalog/catalog.json`) and their gzip
 * twins into memory. Fails startup when a listed asset is missing.
 */
export async function preloadAssets(
  resolver: AssetResolver,
  pathnames: readonly string[]
): Promise<PreloadedAssetMap> {
  const entries = new Map<string, Readonly<PreloadedAsset>>();

  for (const pathname of pathnames) {
    const asset = await resolver.resolve(pathname.startsWith('/') ? pathname : `/${pathname}`);
    const preloaded: PreloadedAsset = {
      original: await readVariant(asset.original, asset.logicalPath),
    };
    if (asset.gzip) {
      preloaded.gzip = await readVariant(asset.gzip, asset.logicalPath);
    }

    entries.set(asset.logicalPath, Object.freeze(preloaded));
    console.log(`Preloaded ${asset.logicalPath}`, {
      bytes: preloaded.original.byteLength,
      gzipBytes: preloaded.gzip?.byteLength ?? null,
    });
  }

  return entries;
}
