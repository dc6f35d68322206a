/**
 * @module commands/build
 * `imageforge build` — Build, tag and push the images of a manifest.
 *
 * Loads the manifest, applies the selection filters, and runs the build
 * orchestrator against the Docker CLI.
 */

import { Command } from 'commander';
import type { CommandRunner } from '@imageforge/core';

// ── ANSI colours ──────────────────────────────────────────────────────
const RED = '\x1b[31m';
const BOLD = '\x1b[1m';
const GRAY = '\x1b[90m';
const RESET = '\x1b[0m';

export interface BuildCommandOptions {
  manifest?: string;
  path: string[];
  osType?: string;
  architecture?: string;
  repo: string[];
  push?: boolean;
  skipPulling?: boolean;
  retry?: boolean;
  dryRun?: boolean;
  registry?: string;
  repoPrefix?: string;
  var: string[];
}

/** Injection points used by tests. */
export interface BuildCommandDeps {
  runner?: CommandRunner;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Parse repeated `--var key=value` options into a record.
 *
 * @throws {Error} If an entry has no `=`
 */
export function parseVars(entries: string[]): Record<string, string> {
  const vars: Record<string, string> = {};
  for (const entry of entries) {
    const eq = entry.indexOf('=');
    if (eq <= 0) {
      throw new Error(`Invalid --var "${entry}". Expected key=value`);
    }
    vars[entry.slice(0, eq)] = entry.slice(eq + 1);
  }
  return vars;
}

export function registerBuild(program: Command, deps: BuildCommandDeps = {}): void {
  program
    .command('build')
    .description('Build the images described by a manifest')
    .option('-m, --manifest <path>', 'manifest.yaml path')
    .option('--path <path>', 'only build Dockerfiles under this directory (repeatable)', collect, [])
    .option('--os-type <os>', 'only build platforms for this OS')
    .option('--architecture <arch>', 'only build platforms for this architecture')
    .option('--repo <name>', 'only build images of this repo (repeatable)', collect, [])
    .option('--push', 'push the built images')
    .option('--skip-pulling', 'do not pull base images before building')
    .option('--retry', 'retry failed builds')
    .option('--dry-run', 'print commands without running them')
    .option('--registry <registry>', 'registry override for every repo')
    .option('--repo-prefix <prefix>', 'prefix prepended to every repo name')
    .option('--var <key=value>', 'manifest variable override (repeatable)', collect, [])
    .action(async (opts: BuildCommandOptions) => {
      // Lazy import to keep --help/--version fast
      const {
        loadManifest,
        filterManifest,
        createBuildOrchestrator,
        ConsoleBuildLogger,
        DEFAULT_RETRY_POLICY,
        isImageForgeError,
      } = await import('@imageforge/core');

      const verbose = program.opts().verbose === true;
      const logger = new ConsoleBuildLogger({ verbose, plain: !process.stdout.isTTY });

      try {
        const manifest = await loadManifest(opts.manifest, {
          registry: opts.registry,
          repoPrefix: opts.repoPrefix,
          vars: parseVars(opts.var),
        });

        const filtered = filterManifest(manifest, {
          paths: opts.path,
          osType: opts.osType,
          architecture: opts.architecture,
          repos: opts.repo,
        });

        const orchestrator = createBuildOrchestrator(
          filtered,
          {
            isPushEnabled: opts.push === true,
            isSkipPullingEnabled: opts.skipPulling === true,
            isRetryEnabled: opts.retry === true,
            isDryRun: opts.dryRun === true,
          },
          {
            runner: deps.runner,
            logger,
            retryPolicy: manifest.retryPolicy ?? DEFAULT_RETRY_POLICY,
          },
        );

        await orchestrator.run();
      } catch (err) {
        console.error(`${RED}${BOLD}Build failed${RESET}${RED}: ${err instanceof Error ? err.message : String(err)}${RESET}`);
        if (isImageForgeError(err)) {
          for (const action of err.suggestedActions) {
            console.error(`${GRAY}  - ${action}${RESET}`);
          }
        }
        process.exitCode = 1;
      }
    });
}
