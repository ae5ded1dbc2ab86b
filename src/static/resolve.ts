/**
 * Maps request paths to files confined to the asset root.
 *
 * Every candidate is canonicalized with realpath and must stay a descendant
 * of the (canonical) root, so `..` segments, encoded separators and symlinks
 * pointing elsewhere all end in PathTraversalError.
 */

import { realpath, stat } from 'node:fs/promises';
import { extname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import {
  AssetNotFoundError,
  AssetReadError,
  BadRequestError,
  PathTraversalError,
  errnoCode,
} from '../errors/index.js';
import { contentTypeFor, isCompressible } from './content-type.js';
import type { FileVariant, ResolvedAsset } from './types.js';

export interface AssetResolverOptions {
  /** Canonical absolute asset root */
  root: string;
  /** Entry page file name, e.g. `index.html` */
  entryPage: string;
  compressibleExtensions: readonly string[];
}

type Located = { type: 'file'; variant: FileVariant } | { type: 'directory'; path: string };

const MISSING_CODES = new Set(['ENOENT', 'ENOTDIR', 'ENAMETOOLONG', 'ELOOP']);

/** Percent-decode a URL path, rejecting malformed escapes and NUL bytes. */
export function decodeRequestPath(pathname: string): string {
  let decoded: string;
  try {
    decoded = decodeURIComponent(pathname);
  } catch {
    throw new BadRequestError('Malformed percent-encoding in request path', { pathname });
  }

  if (decoded.includes('\0')) {
    throw new BadRequestError('NUL byte in request path', { pathname });
  }

  return decoded;
}

export class AssetResolver {
  constructor(private readonly options: AssetResolverOptions) {}

  /**
   * Resolve a URL pathname to an asset and its optional gzip twin.
   */
  async resolve(pathname: string): Promise<ResolvedAsset> {
    const decoded = decodeRequestPath(pathname);
    if (decoded.split('/').includes('..')) {
      throw new PathTraversalError('Parent segment in request path', { pathname });
    }

    const relativePath = decoded.replace(/^\/+/, '');
    const wantsDirectory = relativePath === '' || relativePath.endsWith('/');

    const candidate = this.confine(
      wantsDirectory ? `${relativePath}${this.options.entryPage}` : relativePath,
      pathname
    );

    const located = await this.locate(candidate);

    if (located?.type === 'file') {
      return this.describe(candidate, located.variant);
    }

    if (located?.type === 'directory') {
      const indexPath = join(candidate, this.options.entryPage);
      const index = await this.locate(indexPath);
      if (index?.type === 'file') {
        return this.describe(indexPath, index.variant);
      }
    }

    // Extensionless routes belong to the single-page bundle, directories included
    if (!wantsDirectory && extname(candidate) === '') {
      const entryPath = join(this.options.root, this.options.entryPage);
      const entry = await this.locate(entryPath);
      if (entry?.type === 'file') {
        return this.describe(entryPath, entry.variant);
      }
    }

    throw new AssetNotFoundError('Asset not found', { pathname });
  }

  /** Absolute path for a root-relative path, or PathTraversalError. */
  confine(relativePath: string, pathname: string = relativePath): string {
    if (relativePath.includes('\\')) {
      throw new PathTraversalError('Backslash in request path', { pathname });
    }

    const candidate = resolve(this.options.root, relativePath);
    if (!this.isInsideRoot(candidate)) {
      throw new PathTraversalError('Request path escapes the asset root', { pathname });
    }
    return candidate;
  }

  private isInsideRoot(absolutePath: string): boolean {
    const rel = relative(this.options.root, absolutePath);
    return rel === '' || (rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel));
  }

  private async describe(filePath: string, original: FileVariant): Promise<ResolvedAsset> {
    const compressible = isCompressible(filePath, this.options.compressibleExtensions);
    const asset: ResolvedAsset = {
      logicalPath: relative(this.options.root, filePath).split(sep).join('/'),
      contentType: contentTypeFor(filePath),
      compressible,
      original,
    };

    if (compressible) {
      const twin = await this.locateTwin(`${filePath}.gz`);
      if (twin) {
        asset.gzip = twin;
      }
    }

    return asset;
  }

  /** A twin that is missing, not a file, or escapes the root is ignored. */
  private async locateTwin(twinPath: string): Promise<FileVariant | undefined> {
    try {
      const located = await this.locate(twinPath);
      return located?.type === 'file' ? located.variant : undefined;
    } catch (error) {
      if (error instanceof PathTraversalError) {
        return undefined;
      }
      throw error;
    }
  }

  private async locate(candidate: string): Promise<Located | null> {
    let canonical: string;
    try {
      canonical = await realpath(candidate);
    } catch (error) {
      return this.missingOrThrow(error, candidate);
    }

    if (!this.isInsideRoot(canonical)) {
      throw new PathTraversalError('Symbolic link escapes the asset root', {
        path: relative(this.options.root, candidate),
      });
    }

    try {
      const stats = await stat(canonical);
      if (stats.isDirectory()) {
        return { type: 'directory', path: canonical };
      }
      if (!stats.isFile()) {
        return null;
      }
      return {
        type: 'file',
        variant: { filePath: canonical, size: stats.size, mtimeMs: stats.mtimeMs },
      };
    } catch (error) {
      return this.missingOrThrow(error, candidate);
    }
  }

  private missingOrThrow(error: unknown, candidate: string): null {
    const code = errnoCode(error);
    if (code !== undefined && MISSING_CODES.has(code)) {
      return null;
    }
    throw new AssetReadError('Failed to inspect asset', {
      path: relative(this.options.root, candidate),
      errno: code,
    });
  }
}
