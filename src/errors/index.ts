/**
 * Custom error classes and error handling utilities
 */

/**
 * Base error class for catalog server errors
 */
export class CatalogServerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CatalogServerError';
  }
}

/**
 * Requested path does not map to a servable file
 */
export class AssetNotFoundError extends CatalogServerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'ASSET_NOT_FOUND', context);
    this.name = 'AssetNotFoundError';
  }
}

/**
 * Requested path resolves outside the asset root
 */
export class PathTraversalError extends CatalogServerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'PATH_TRAVERSAL', context);
    this.name = 'PathTraversalError';
  }
}

/**
 * Request path cannot be decoded
 */
export class BadRequestError extends CatalogServerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'BAD_REQUEST', context);
    this.name = 'BadRequestError';
  }
}

/**
 * Unexpected disk or I/O failure while reading an asset
 */
export class AssetReadError extends CatalogServerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'ASSET_READ_ERROR', context);
    this.name = 'AssetReadError';
  }
}

/**
 * Precompressed twin could not be produced or verified
 */
export class CompressionError extends CatalogServerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'COMPRESSION_ERROR', context);
    this.name = 'CompressionError';
  }
}

/**
 * Invalid server or build configuration
 */
export class ConfigError extends CatalogServerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}

/**
 * Map an error to the HTTP status answered for it.
 * Traversal attempts are indistinguishable from missing files.
 */
export function httpStatusFor(error: Error): 400 | 404 | 500 {
  if (error instanceof AssetNotFoundError || error instanceof PathTraversalError) {
    return 404;
  }
  if (error instanceof BadRequestError) {
    return 400;
  }
  return 500;
}

/**
 * Normalize a thrown value into an Error instance
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  if (typeof value === 'string') {
    return new Error(value);
  }
  try {
    return new Error(JSON.stringify(value));
  } catch {
    return new Error(String(value));
  }
}

/**
 * Node's system errors carry a string `code` (ENOENT, EACCES, ...)
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Log structured error
 */
export function logError(error: Error, context?: Record<string, unknown>): void {
  const errorData: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
    timestamp: new Date().toISOString(),
    ...context,
  };

  if (error instanceof CatalogServerError) {
    errorData.code = error.code;
    errorData.context = error.context;
  }

  console.error('Error occurred:', JSON.stringify(errorData, null, 2));
}
