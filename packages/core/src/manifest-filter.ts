/**
 * @module manifest-filter
 * Produces the filtered manifest view the build engine consumes.
 */

import path from 'node:path';
import type { FilteredManifest, Image, Platform } from './types.js';
import type { LoadedManifest } from './manifest-loader.js';
import { ImageForgeError } from './error-codes.js';

export interface ManifestFilter {
  /** Dockerfile directories (relative to the manifest) to include, with their subdirectories */
  paths?: string[];
  osType?: string;
  architecture?: string;
  /** Repo names to include */
  repos?: string[];
}

function isWithin(dir: string, root: string): boolean {
  const relative = path.relative(root, dir);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

function matchesPlatform(platform: Platform, baseDir: string, filter: ManifestFilter): boolean {
  if (filter.osType && filter.osType !== '*' && platform.os !== filter.osType) {
    return false;
  }
  if (filter.architecture && filter.architecture !== '*' && platform.architecture !== filter.architecture) {
    return false;
  }
  if (filter.paths && filter.paths.length > 0) {
    const dockerfileDir = path.dirname(platform.dockerfilePath);
    return filter.paths.some((p) => isWithin(dockerfileDir, path.resolve(baseDir, p)));
  }
  return true;
}

/**
 * Apply selection criteria to a loaded manifest. Images left without
 * platforms drop out; declaration order is preserved throughout.
 *
 * @throws {ImageForgeError} `MANIFEST_ENTRY_MISSING` when a requested repo is not declared
 */
export function filterManifest(manifest: LoadedManifest, filter: ManifestFilter = {}): FilteredManifest {
  const repoNames = filter.repos && filter.repos.length > 0 ? new Set(filter.repos) : null;

  if (repoNames) {
    for (const name of repoNames) {
      if (!manifest.repos.some((repo) => repo.name === name)) {
        throw new ImageForgeError('MANIFEST_ENTRY_MISSING', `Repo '${name}' is not declared in ${manifest.path}`, {
          repo: name,
        });
      }
    }
  }

  const repos = manifest.repos.filter((repo) => !repoNames || repoNames.has(repo.name));
  const images: Image[] = [];

  for (const image of manifest.images) {
    if (repoNames && !repoNames.has(image.repo)) {
      continue;
    }
    const platforms = image.platforms.filter((p) => matchesPlatform(p, manifest.baseDir, filter));
    if (platforms.length > 0) {
      images.push({ ...image, platforms });
    }
  }

  return { images, repos };
}
