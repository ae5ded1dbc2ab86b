/**
 * Tests for the HTTP application, driven in-process through Hono's app.request()
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { gunzipSync } from 'node:zlib';
import { createApp } from './app.js';
import { loadServerConfig } from '../config/index.js';
import { precompressFile } from '../compress/precompress.js';
import {
  createAssetRoot,
  INDEX_HTML,
  sampleCatalogJson,
  type TempAssetRoot,
} from '../test/asset-root.js';

describe('createApp', () => {
  let store: TempAssetRoot;
  let app: ReturnType<typeof createApp>;
  let catalog: Buffer;
  let consoleLog: MockInstance;

  beforeEach(async () => {
    store = await createAssetRoot({
      'index.html': INDEX_HTML,
      'catalog/catalog.json': sampleCatalogJson(2000),
      'catalog/images.json': '{}',
    });
    await precompressFile(join(store.root, 'catalog/catalog.json'), { schema: 'catalog' });
    catalog = await readFile(join(store.root, 'catalog/catalog.json'));

    app = createApp({ config: loadServerConfig({ root: store.root }, {}) });
    consoleLog = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await store.cleanup();
  });

  describe('catalog delivery', () => {
    it('should serve the compressed catalog to gzip clients', async () => {
      const twin = await readFile(join(store.root, 'catalog/catalog.json.gz'));

      const response = await app.request('/catalog/catalog.json', {
        headers: { 'Accept-Encoding': 'gzip' },
      });

      expect(response.status).toBe(200);
      expect(response.headers.get('Content-Encoding')).toBe('gzip');
      expect(response.headers.get('Content-Type')).toBe('application/json');
      expect(response.headers.get('Content-Length')).toBe(String(twin.length));
      expect(twin.length).toBeLessThan(catalog.length);

      const body = Buffer.from(await response.arrayBuffer());
      expect(gunzipSync(body).equals(catalog)).toBe(true);
    });

    it('should serve the raw catalog to identity clients', async () => {
      const response = await app.request('/catalog/catalog.json', {
        headers: { 'Accept-Encoding': 'identity' },
      });

      expect(response.status).toBe(200);
      expect(response.headers.get('Content-Encoding')).toBeNull();
      expect(response.headers.get('Content-Length')).toBe(String(catalog.length));
      expect(Buffer.from(await response.arrayBuffer()).equals(catalog)).toBe(true);
    });

    it('should answer HEAD with headers only', async () => {
      const response = await app.request('/catalog/catalog.json', {
        method: 'HEAD',
        headers: { 'Accept-Encoding': 'gzip' },
      });

      expect(response.status).toBe(200);
      expect(response.headers.get('Content-Encoding')).toBe('gzip');
      expect(await response.text()).toBe('');
    });

    it('should serve a regenerated twin after the catalog changes', async () => {
      const updated = sampleCatalogJson(10);
      await writeFile(join(store.root, 'catalog/catalog.json'), updated);
      await precompressFile(join(store.root, 'catalog/catalog.json'));

      const response = await app.request('/catalog/catalog.json', {
        headers: { 'Accept-Encoding': 'gzip' },
      });

      expect(gunzipSync(Buffer.from(await response.arrayBuffer())).toString('utf8')).toBe(updated);
    });
  });

  describe('entry page', () => {
    it('should serve / as html', async () => {
      const response = await app.request('/');

      expect(response.status).toBe(200);
      expect(response.headers.get('Content-Type')).toMatch(/^text\/html/);
      expect(await response.text()).toBe(INDEX_HTML);
    });

    it('should serve the entry page for client-side routes', async () => {
      const response = await app.request('/compare');

      expect(response.status).toBe(200);
      expect(await response.text()).toBe(INDEX_HTML);
    });
  });

  describe('errors', () => {
    it('should answer 404 for missing files', async () => {
      const response = await app.request('/does-not-exist.json');

      expect(response.status).toBe(404);
      expect(await response.text()).toBe('Not found');
    });

    it('should never serve files outside the root', async () => {
      await writeFile(join(store.base, 'secret.txt'), 'outside the root');

      for (const path of ['/../secret.txt', '/..%2fsecret.txt', '/catalog/..%2f..%2fsecret.txt']) {
        const response = await app.request(path);

        expect(response.status).toBe(404);
        expect(await response.text()).toBe('Not found');
      }
    });

    it('should answer 400 for malformed escapes', async () => {
      const response = await app.request('/%E0%A4%A');

      expect(response.status).toBe(400);
    });

    it.each(['POST', 'PUT', 'DELETE'])('should refuse %s with 405', async method => {
      const response = await app.request('/catalog/catalog.json', { method });

      expect(response.status).toBe(405);
      expect(response.headers.get('Allow')).toBe('GET, HEAD');
      expect(await response.text()).toBe('Method not allowed');
    });
  });

  describe('access log', () => {
    it('should log one line per request with the encoding', async () => {
      const response = await app.request('/catalog/catalog.json', {
        headers: { 'Accept-Encoding': 'gzip' },
      });
      await response.arrayBuffer();

      expect(consoleLog).toHaveBeenCalledTimes(1);
      expect(consoleLog).toHaveBeenCalledWith(
        expect.stringMatching(/^GET \/catalog\/catalog\.json 200 gzip \d+ms$/)
      );
    });

    it('should log misses', async () => {
      await app.request('/missing.json');

      expect(consoleLog).toHaveBeenCalledWith(
        expect.stringMatching(/^GET \/missing\.json 404 identity \d+ms$/)
      );
    });

    it('should not log favicon misses', async () => {
      const response = await app.request('/favicon.ico');

      expect(response.status).toBe(404);
      expect(consoleLog).not.toHaveBeenCalled();
    });
  });
});
