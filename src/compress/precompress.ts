/**
 * Builds precompressed gzip twins (`<file>.gz`) beside source files.
 *
 * Output is deterministic (fixed level, zlib writes a zero mtime), verified
 * by decompression, and published by rename so the server never observes a
 * half-written twin.
 */

import { readFile, rename, rm, writeFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { promisify } from 'node:util';
import { constants, gunzip, gzip } from 'node:zlib';
import { validateDataset, type DatasetKind } from '../catalog/schema.js';
import { CompressionError, errnoCode } from '../errors/index.js';

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

export const TWIN_SUFFIX = '.gz';

export interface PrecompressTarget {
  /** Source file path */
  path: string;
  /** Dataset schema the source must satisfy */
  schema?: DatasetKind;
}

export interface PrecompressResult {
  source: string;
  target: string;
  sourceBytes: number;
  compressedBytes: number;
  /** compressedBytes / sourceBytes, 0 for an empty source */
  ratio: number;
}

export type TwinStatus = 'fresh' | 'stale' | 'missing';

export function twinPathFor(source: string): string {
  return `${source}${TWIN_SUFFIX}`;
}

async function readSource(source: string): Promise<Buffer> {
  try {
    return await readFile(source);
  } catch (error) {
    throw new CompressionError(`Cannot read source file: ${source}`, {
      source,
      errno: errnoCode(error),
    });
  }
}

function assertValidJson(source: string, bytes: Buffer, schema?: DatasetKind): void {
  let parsed: unknown;
  try {
    parsed = JSON.parse(bytes.toString('utf8'));
  } catch (error) {
    throw new CompressionError(`Source is not valid JSON: ${source}`, {
      source,
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  if (!schema) {
    return;
  }

  const validation = validateDataset(schema, parsed);
  if (!validation.success) {
    throw new CompressionError(`Source does not match the ${schema} schema: ${source}`, {
      source,
      issues: validation.issues.slice(0, 5),
      issueCount: validation.issues.length,
    });
  }
}

/** Compress with fixed settings; identical input gives identical bytes. */
export async function compressBytes(bytes: Buffer): Promise<Buffer> {
  return gzipAsync(bytes, { level: constants.Z_BEST_COMPRESSION });
}

/**
 * Write `<source>.gz` for one source file.
 */
export async function precompressFile(
  source: string,
  options: Omit<PrecompressTarget, 'path'> = {}
): Promise<PrecompressResult> {
  const bytes = await readSource(source);

  if (extname(source).toLowerCase() === '.json') {
    assertValidJson(source, bytes, options.schema);
  }

  const compressed = await compressBytes(bytes);
  const roundTrip = await gunzipAsync(compressed);
  if (!roundTrip.equals(bytes)) {
    throw new CompressionError(`Compressed twin does not round-trip: ${source}`, { source });
  }

  const target = twinPathFor(source);
  const temporary = `${target}.${process.pid}.tmp`;
  try {
    await writeFile(temporary, compressed);
    await rename(temporary, target);
  } catch (error) {
    await rm(temporary, { force: true });
    throw new CompressionError(`Cannot write compressed twin: ${target}`, {
      source,
      target,
      errno: errnoCode(error),
    });
  }

  return {
    source,
    target,
    sourceBytes: bytes.length,
    compressedBytes: compressed.length,
    ratio: bytes.length === 0 ? 0 : compressed.length / bytes.length,
  };
}

/**
 * Compare an existing twin with its source. A twin that cannot be
 * decompressed counts as stale.
 */
export async function checkTwin(source: string): Promise<TwinStatus> {
  const bytes = await readSource(source);

  let compressed: Buffer;
  try {
    compressed = await readFile(twinPathFor(source));
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return 'missing';
    }
    throw new CompressionError(`Cannot read compressed twin: ${twinPathFor(source)}`, {
      source,
      errno: errnoCode(error),
    });
  }

  try {
    return (await gunzipAsync(compressed)).equals(bytes) ? 'fresh' : 'stale';
  } catch {
    return 'stale';
  }
}

/**
 * Compress every target in order. Stops at the first failure.
 */
export async function precompressAll(
  targets: readonly PrecompressTarget[]
): Promise<PrecompressResult[]> {
  const results: PrecompressResult[] = [];

  for (const target of targets) {
    const result = await precompressFile(target.path, { schema: target.schema });
    console.log(`Compressed ${result.source} -> ${result.target}`, {
      sourceBytes: result.sourceBytes,
      compressedBytes: result.compressedBytes,
      ratio: Number(result.ratio.toFixed(3)),
    });
    results.push(result);
  }

  return results;
}
