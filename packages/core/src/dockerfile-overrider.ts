/**
 * @module dockerfile-overrider
 * Rewrites `FROM` references of a Dockerfile to overridden repositories.
 *
 * The original Dockerfile is never modified: the rewritten text goes to a
 * private copy at `<dockerfile>.temp`, owned by a {@link PrivateDockerfile}
 * guard that deletes it on release.
 */

import fs from 'node:fs/promises';
import type { Platform, Repo } from './types.js';
import { ImageForgeError } from './error-codes.js';
import { silentLogger, type BuildLogger } from './logger.js';

/** Suffix appended to the Dockerfile path for the rewritten copy. */
export const PRIVATE_DOCKERFILE_SUFFIX = '.temp';

/** One base-image substitution. */
export interface FromOverride {
  from: string;
  to: string;
}

export interface DockerfileRewrite {
  didRewrite: boolean;
  /** Path to build with: the private copy if one was written, else the original */
  path: string;
}

// =====================================================================
// Image Reference Helpers
// =====================================================================

/**
 * Repository portion of an image reference, without tag or digest.
 *
 * `registry:5000/app:1.0` → `registry:5000/app`, `app:1.0@sha256:ab` → `app`.
 */
export function getRepo(image: string): string {
  const at = image.indexOf('@');
  const name = at >= 0 ? image.slice(0, at) : image;

  const colon = name.lastIndexOf(':');
  return colon > name.lastIndexOf('/') ? name.slice(0, colon) : name;
}

/** Swap the repository of a reference, keeping its tag / digest suffix. */
export function replaceRepo(image: string, newRepo: string): string {
  return newRepo + image.slice(getRepo(image).length);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Apply overrides to Dockerfile text, in order. Each override replaces every
 * `FROM <from>` (any whitespace after `FROM`, trailing same-line whitespace
 * consumed) with `FROM <to>` across the whole document.
 */
export function rewriteFromReferences(text: string, overrides: readonly FromOverride[]): string {
  let result = text;
  for (const { from, to } of overrides) {
    const fromRegex = new RegExp(`FROM\\s+${escapeRegExp(from)}[^\\S\\r\\n]*`, 'g');
    result = result.replace(fromRegex, () => `FROM ${to}`);
  }
  return result;
}

// =====================================================================
// Private Dockerfile Guard
// =====================================================================

/**
 * Handle on the Dockerfile used for one platform build. Releasing it deletes
 * the private copy when one was written; releasing twice is a no-op.
 */
export class PrivateDockerfile {
  private released = false;

  constructor(readonly path: string, readonly isPrivate: boolean) {}

  async release(): Promise<void> {
    if (!this.isPrivate || this.released) {
      return;
    }
    this.released = true;
    try {
      await fs.unlink(this.path);
    } catch (err) {
      throw ioError(`Failed to delete private Dockerfile ${this.path}`, this.path, err);
    }
  }
}

// =====================================================================
// Overrider
// =====================================================================

export class DockerfileOverrider {
  constructor(
    private readonly repos: readonly Repo[],
    private readonly logger: BuildLogger = silentLogger,
  ) {}

  /**
   * Resolve the overrides declared by a platform against the known repos.
   *
   * @throws {ImageForgeError} `UNKNOWN_REPO` when a base image's repository is not declared
   */
  resolveOverrides(platform: Pick<Platform, 'overriddenBaseImages' | 'dockerfilePath'>): FromOverride[] {
    return platform.overriddenBaseImages.map((fromImage) => {
      const fromRepo = getRepo(fromImage);
      const repo = this.repos.find((r) => r.name === fromRepo);
      if (!repo) {
        throw new ImageForgeError(
          'UNKNOWN_REPO',
          `Unknown repo '${fromRepo}' referenced by overridden base image '${fromImage}'`,
          { repo: fromRepo, image: fromImage, dockerfile: platform.dockerfilePath },
        );
      }
      return { from: fromImage, to: replaceRepo(fromImage, repo.qualifiedName) };
    });
  }

  /**
   * Write the overridden Dockerfile for a platform, if it declares overrides.
   * Without overrides no I/O is performed.
   */
  async rewrite(platform: Pick<Platform, 'overriddenBaseImages' | 'dockerfilePath'>): Promise<DockerfileRewrite> {
    if (platform.overriddenBaseImages.length === 0) {
      return { didRewrite: false, path: platform.dockerfilePath };
    }

    let contents: string;
    try {
      contents = await fs.readFile(platform.dockerfilePath, 'utf-8');
    } catch (err) {
      throw ioError(`Failed to read Dockerfile ${platform.dockerfilePath}`, platform.dockerfilePath, err);
    }

    const overrides = this.resolveOverrides(platform);
    for (const { from, to } of overrides) {
      this.logger.message(`Replacing FROM \`${from}\` with \`${to}\``);
    }
    const updated = rewriteFromReferences(contents, overrides);

    const privatePath = platform.dockerfilePath + PRIVATE_DOCKERFILE_SUFFIX;
    this.logger.message(`Writing updated Dockerfile: ${privatePath}`);
    this.logger.verbose(updated);
    try {
      await fs.writeFile(privatePath, updated, 'utf-8');
    } catch (err) {
      throw ioError(`Failed to write Dockerfile ${privatePath}`, privatePath, err);
    }

    return { didRewrite: true, path: privatePath };
  }

  /** {@link rewrite}, wrapped in a guard the caller must release. */
  async acquire(platform: Pick<Platform, 'overriddenBaseImages' | 'dockerfilePath'>): Promise<PrivateDockerfile> {
    const { didRewrite, path } = await this.rewrite(platform);
    return new PrivateDockerfile(path, didRewrite);
  }
}

function ioError(message: string, filePath: string, err: unknown): ImageForgeError {
  const errno = err instanceof Error && 'code' in err ? String(err.code) : undefined;
  return new ImageForgeError(
    'DOCKERFILE_IO',
    `${message}: ${err instanceof Error ? err.message : String(err)}`,
    { path: filePath, errno },
    { cause: err },
  );
}
