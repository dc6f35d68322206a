/**
 * @module hook-invoker
 * Discovers and runs the optional `pre-build` / `post-build` scripts kept in
 * a build context's `hooks/` directory.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import type { CommandExecutor } from './command-executor.js';
import { ImageForgeError, isImageForgeError } from './error-codes.js';

export type HookName = 'pre-build' | 'post-build';

/** Extension of hook scripts that need an interpreter. */
export const HOOK_SCRIPT_EXTENSION = '.ps1';

/** Script interpreter per host OS; `default` covers every OS not listed. */
export const HOOK_INTERPRETERS: Readonly<Record<string, string>> = {
  win32: 'PowerShell',
  default: 'pwsh',
};

/** A discovered hook, ready to run. */
export type HookScript =
  | { kind: 'executable'; path: string }
  | { kind: 'interpreted'; path: string; interpreter: string };

/** Interpreter binary used on the given host OS. */
export function resolveInterpreter(hostPlatform: NodeJS.Platform): string {
  return HOOK_INTERPRETERS[hostPlatform] ?? HOOK_INTERPRETERS['default'] ?? 'pwsh';
}

/** Command and arguments that run a discovered hook. */
export function hookCommand(script: HookScript): { command: string; args: string[] } {
  switch (script.kind) {
    case 'executable':
      return { command: script.path, args: [] };
    case 'interpreted':
      return { command: script.interpreter, args: ['-NoProfile', '-File', script.path] };
  }
}

async function exists(filePath: string, kind: 'file' | 'directory'): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return kind === 'file' ? stat.isFile() : stat.isDirectory();
  } catch {
    return false;
  }
}

export class HookInvoker {
  constructor(
    private readonly executor: CommandExecutor,
    private readonly hostPlatform: NodeJS.Platform = process.platform,
  ) {}

  /**
   * Find the script for a hook, preferring a file named exactly after the hook
   * over one with the script extension.
   *
   * @returns The script, or `null` when the context defines no such hook
   */
  async discover(hookName: HookName, buildContextPath: string): Promise<HookScript | null> {
    const hooksDir = path.resolve(buildContextPath, 'hooks');
    if (!(await exists(hooksDir, 'directory'))) {
      return null;
    }

    const scriptPath = path.join(hooksDir, hookName);
    if (await exists(scriptPath, 'file')) {
      return { kind: 'executable', path: scriptPath };
    }

    const interpretedPath = scriptPath + HOOK_SCRIPT_EXTENSION;
    if (await exists(interpretedPath, 'file')) {
      return { kind: 'interpreted', path: interpretedPath, interpreter: resolveInterpreter(this.hostPlatform) };
    }

    return null;
  }

  /**
   * Run a hook with the build context as working directory. A missing hook is
   * not an error.
   *
   * @throws {ImageForgeError} `HOOK_FAILED` when the script cannot start or exits non-zero
   */
  async invoke(hookName: HookName, buildContextPath: string): Promise<void> {
    const script = await this.discover(hookName, buildContextPath);
    if (!script) {
      return;
    }

    const { command, args } = hookCommand(script);
    try {
      await this.executor.execute(command, args, {
        cwd: buildContextPath,
        errorMessage: `Failed to execute build hook '${script.path}'`,
      });
    } catch (err) {
      if (isImageForgeError(err)) {
        throw new ImageForgeError(
          'HOOK_FAILED',
          err.message,
          { ...err.details, hook: hookName, scriptPath: script.path },
          { cause: err },
        );
      }
      throw err;
    }
  }
}
