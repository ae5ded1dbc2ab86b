import { Command } from 'commander';
import createPrecompress from './precompress.js';
import createServe from './serve.js';

export const setupCLI = (program: Command) => {
  createServe(program);
  createPrecompress(program);
};

export function createProgram(): Command {
  const program = new Command();
  program
    .name('scent-catalog')
    .description('Static delivery of the scent catalog with precompressed JSON');
  setupCLI(program);
  return program;
}
