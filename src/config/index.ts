/**
 * Server configuration: CLI overrides > environment > defaults,
 * validated with zod.
 */

import { realpathSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError, errnoCode } from '../errors/index.js';

export const DEFAULT_PORT = 5000;
export const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_ASSET_ROOT = 'public';
export const DEFAULT_ENTRY_PAGE = 'index.html';
export const DEFAULT_CACHE_CONTROL = 'no-cache, no-store, must-revalidate';
export const DEFAULT_COMPRESSIBLE_EXTENSIONS = ['.json'] as const;

/** Files the build step compresses when none are named. */
export const DEFAULT_DATASETS = [
  { path: 'catalog/catalog.json', schema: 'catalog' },
  { path: 'catalog/images.json', schema: 'images' },
] as const;

const extensionSchema = z
  .string()
  .trim()
  .min(2)
  .transform(ext => (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase());

export const serverConfigSchema = z.object({
  port: z.number().int().min(0).max(65535).default(DEFAULT_PORT),
  host: z.string().min(1).default(DEFAULT_HOST),
  root: z.string().min(1).default(DEFAULT_ASSET_ROOT),
  entryPage: z.string().min(1).default(DEFAULT_ENTRY_PAGE),
  cacheControl: z.string().min(1).default(DEFAULT_CACHE_CONTROL),
  compressibleExtensions: z.array(extensionSchema).default([...DEFAULT_COMPRESSIBLE_EXTENSIONS]),
  preload: z.array(z.string().min(1)).default([]),
});

export type ServerConfigInput = z.input<typeof serverConfigSchema>;

/** Validated config; `root` is the canonical absolute asset root. */
export type ServerConfig = z.output<typeof serverConfigSchema>;

/**
 * Read the supported environment variables into config input.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): ServerConfigInput {
  const input: ServerConfigInput = {};

  if (env.PORT) input.port = Number(env.PORT);
  if (env.HOST) input.host = env.HOST;
  if (env.ASSET_ROOT) input.root = env.ASSET_ROOT;
  if (env.CACHE_CONTROL) input.cacheControl = env.CACHE_CONTROL;
  if (env.COMPRESSIBLE_EXTENSIONS) {
    input.compressibleExtensions = env.COMPRESSIBLE_EXTENSIONS.split(',').filter(ext => ext.trim());
  }

  return input;
}

/**
 * Build the server config. Undefined overrides do not mask environment values.
 */
export function loadServerConfig(
  overrides: ServerConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): ServerConfig {
  const definedOverrides = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );

  const parsed = serverConfigSchema.safeParse({ ...configFromEnv(env), ...definedOverrides });
  if (!parsed.success) {
    const fields = parsed.error.issues.map(issue => issue.path.join('.') || '(root)');
    throw new ConfigError(
      `Invalid configuration: ${parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join(', ')}`,
      { fields }
    );
  }

  return { ...parsed.data, root: canonicalRoot(parsed.data.root) };
}

function canonicalRoot(root: string): string {
  const absolute = resolve(root);
  try {
    return realpathSync(absolute);
  } catch (error) {
    throw new ConfigError(`Asset root is not accessible: ${absolute}`, {
      root: absolute,
      errno: errnoCode(error),
    });
  }
}
