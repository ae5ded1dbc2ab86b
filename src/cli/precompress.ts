import { isAbsolute, join, relative, resolve, sep } from 'node:path';
import { Command } from 'commander';
import { DEFAULT_ASSET_ROOT, DEFAULT_DATASETS } from '../config/index.js';
import { checkTwin, precompressAll, type PrecompressTarget } from '../compress/precompress.js';

export interface PrecompressOptions {
  root?: string;
  check?: boolean;
}

/**
 * Files to compress. With no names, the catalog and image mapping under the
 * root; named files are taken relative to the root and keep the dataset
 * schema when they are one of the defaults.
 */
export function resolveTargets(root: string, files: readonly string[]): PrecompressTarget[] {
  const absoluteRoot = resolve(root);

  if (files.length === 0) {
    return DEFAULT_DATASETS.map(dataset => ({
      path: join(absoluteRoot, dataset.path),
      schema: dataset.schema,
    }));
  }

  return files.map(file => {
    const path = isAbsolute(file) ? file : join(absoluteRoot, file);
    const logical = relative(absoluteRoot, path).split(sep).join('/');
    const dataset = DEFAULT_DATASETS.find(candidate => candidate.path === logical);
    return dataset ? { path, schema: dataset.schema } : { path };
  });
}

const createPrecompress = (program: Command) => {
  program
    .command('precompress')
    .description('Write deterministic .gz twins beside the catalog data files')
    .argument('[files...]', 'source files relative to the root (default: catalog and image mapping)')
    .option('-r, --root <dir>', 'asset root directory (default ./public, or $ASSET_ROOT)')
    .option('--check', 'only report whether each twin is fresh; exit 1 otherwise', false)
    .action(async (files: string[], options: PrecompressOptions) => {
      const root = options.root ?? process.env.ASSET_ROOT ?? DEFAULT_ASSET_ROOT;
      const targets = resolveTargets(root, files);

      if (options.check) {
        let allFresh = true;
        for (const target of targets) {
          const status = await checkTwin(target.path);
          console.log(`${status.padEnd(7)} ${target.path}`);
          if (status !== 'fresh') {
            allFresh = false;
          }
        }
        if (!allFresh) {
          process.exitCode = 1;
        }
        return;
      }

      await precompressAll(targets);
    });
};

export default createPrecompress;
