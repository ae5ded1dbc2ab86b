export interface FileVariant {
  /** Absolute path on disk */
  filePath: string;
  /** Size in bytes */
  size: number;
  /** Last modification time in milliseconds */
  mtimeMs: number;
}

/**
 * A file under the asset root, located for one request.
 */
export interface ResolvedAsset {
  /** Root-relative path with forward slashes, e.g. `catalog/catalog.json` */
  logicalPath: string;
  /** HTTP content-type of the uncompressed file */
  contentType: string;
  /** Whether a gzip twin may be negotiated for this file */
  compressible: boolean;
  original: FileVariant;
  /** `<file>.gz` beside the original, when it exists */
  gzip?: FileVariant;
}

/**
 * Representation chosen once per request.
 */
export type EncodingDecision =
  | { kind: 'original'; variant: FileVariant }
  | { kind: 'precompressed-gzip'; variant: FileVariant };

/**
 * Bytes of one asset kept resident for the process lifetime.
 */
export interface PreloadedAsset {
  original: Uint8Array;
  gzip?: Uint8Array;
}

export type PreloadedAssetMap = ReadonlyMap<string, Readonly<PreloadedAsset>>;
