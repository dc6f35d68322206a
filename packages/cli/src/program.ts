/**
 * @module program
 * Commander program definition for imageforge.
 */

import { Command } from 'commander';
import { registerBuild, type BuildCommandDeps } from './commands/build.js';

export const VERSION = '0.1.0';

export function createProgram(deps: BuildCommandDeps = {}): Command {
  const program = new Command();

  program
    .name('imageforge')
    .description('Manifest-driven multi-platform container image builds')
    .version(VERSION)
    .option('--verbose', 'enable verbose output');

  registerBuild(program, deps);

  return program;
}
