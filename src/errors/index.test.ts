/**
 * Tests for Error Handling utilities
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  CatalogServerError,
  AssetNotFoundError,
  PathTraversalError,
  BadRequestError,
  AssetReadError,
  CompressionError,
  ConfigError,
  httpStatusFor,
  toError,
  errnoCode,
  logError,
} from './index.js';

describe('Custom Error Classes', () => {
  it('should create CatalogServerError with code and context', () => {
    const error = new CatalogServerError('Test error', 'TEST_CODE', { path: '/a.json' });

    expect(error.message).toBe('Test error');
    expect(error.code).toBe('TEST_CODE');
    expect(error.context).toEqual({ path: '/a.json' });
    expect(error.name).toBe('CatalogServerError');
  });

  it('should create AssetNotFoundError', () => {
    const error = new AssetNotFoundError('Asset not found', { pathname: '/missing.json' });

    expect(error.code).toBe('ASSET_NOT_FOUND');
    expect(error.name).toBe('AssetNotFoundError');
    expect(error).toBeInstanceOf(CatalogServerError);
  });

  it('should assign codes to every subclass', () => {
    expect(new PathTraversalError('x').code).toBe('PATH_TRAVERSAL');
    expect(new BadRequestError('x').code).toBe('BAD_REQUEST');
    expect(new AssetReadError('x').code).toBe('ASSET_READ_ERROR');
    expect(new CompressionError('x').code).toBe('COMPRESSION_ERROR');
    expect(new ConfigError('x').code).toBe('CONFIG_ERROR');
  });
});

describe('httpStatusFor', () => {
  it('should answer traversal attempts like missing files', () => {
    expect(httpStatusFor(new AssetNotFoundError('missing'))).toBe(404);
    expect(httpStatusFor(new PathTraversalError('escape'))).toBe(404);
  });

  it('should map bad requests to 400', () => {
    expect(httpStatusFor(new BadRequestError('malformed'))).toBe(400);
  });

  it('should map read failures and unknown errors to 500', () => {
    expect(httpStatusFor(new AssetReadError('EIO'))).toBe(500);
    expect(httpStatusFor(new Error('boom'))).toBe(500);
  });
});

describe('toError', () => {
  it('should return Error instances unchanged', () => {
    const error = new Error('original');
    expect(toError(error)).toBe(error);
  });

  it('should wrap strings and plain values', () => {
    expect(toError('failed').message).toBe('failed');
    expect(toError({ reason: 'x' }).message).toBe('{"reason":"x"}');
  });
});

describe('errnoCode', () => {
  it('should read the code of system errors', () => {
    const error = Object.assign(new Error('no such file'), { code: 'ENOENT' });
    expect(errnoCode(error)).toBe('ENOENT');
  });

  it('should return undefined for other values', () => {
    expect(errnoCode(new Error('plain'))).toBeUndefined();
    expect(errnoCode('ENOENT')).toBeUndefined();
  });
});

describe('logError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should log structured error with code and context', () => {
    const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    logError(new AssetReadError('EIO while reading', { logicalPath: 'catalog/catalog.json' }), {
      pathname: '/catalog/catalog.json',
    });

    expect(consoleSpy).toHaveBeenCalledTimes(1);
    const [label, payload] = consoleSpy.mock.calls[0];
    expect(label).toBe('Error occurred:');
    const logged = JSON.parse(String(payload));
    expect(logged.name).toBe('AssetReadError');
    expect(logged.code).toBe('ASSET_READ_ERROR');
    expect(logged.context).toEqual({ logicalPath: 'catalog/catalog.json' });
    expect(logged.pathname).toBe('/catalog/catalog.json');
  });

  it('should omit code for plain errors', () => {
    const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    logError(new Error('plain'));

    const logged = JSON.parse(String(consoleSpy.mock.calls[0][1]));
    expect(logged.message).toBe('plain');
    expect(logged.code).toBeUndefined();
  });
});
