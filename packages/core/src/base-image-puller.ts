/**
 * @module base-image-puller
 * Pulls the external base images of the platforms about to be built.
 */

import fs from 'node:fs/promises';
import type { FilteredManifest } from './types.js';
import type { ContainerEngine } from './docker-engine.js';
import { formatPlatform } from './docker-engine.js';
import { getRepo } from './dockerfile-overrider.js';
import { ImageForgeError } from './error-codes.js';
import { silentLogger, type BuildLogger } from './logger.js';

// Any `--flag` before the image (e.g. `--platform=...`) is skipped.
const FROM_LINE = /^[^\S\r\n]*FROM(?:[^\S\r\n]+--\S+)*[^\S\r\n]+(\S+)(?:[^\S\r\n]+AS[^\S\r\n]+(\S+))?/gim;

/**
 * Base-image references of a Dockerfile in order of appearance. `scratch`,
 * earlier build stages and references built from `ARG` values are skipped.
 */
export function parseFromImages(dockerfileText: string): string[] {
  const stages = new Set<string>();
  const images: string[] = [];

  for (const match of dockerfileText.matchAll(FROM_LINE)) {
    const [, image = '', stage] = match;
    const isStageRef = stages.has(image.toLowerCase());
    if (stage) {
      stages.add(stage.toLowerCase());
    }
    if (isStageRef || image === 'scratch' || image.includes('$')) {
      continue;
    }
    images.push(image);
  }

  return images;
}

export interface BaseImagePull {
  image: string;
  platform: string;
}

export class BaseImagePuller {
  constructor(
    private readonly engine: ContainerEngine,
    private readonly logger: BuildLogger = silentLogger,
  ) {}

  /**
   * Distinct (external base image, platform) pairs of the manifest in
   * discovery order. Images from the manifest's own repos are left out.
   */
  async collect(manifest: FilteredManifest): Promise<BaseImagePull[]> {
    const internalRepos = new Set(manifest.repos.flatMap((repo) => [repo.name, repo.qualifiedName]));
    const pulls = new Map<string, BaseImagePull>();

    for (const image of manifest.images) {
      for (const platform of image.platforms) {
        let text: string;
        try {
          text = await fs.readFile(platform.dockerfilePath, 'utf-8');
        } catch (err) {
          throw new ImageForgeError(
            'DOCKERFILE_IO',
            `Failed to read Dockerfile ${platform.dockerfilePath}: ${err instanceof Error ? err.message : String(err)}`,
            { path: platform.dockerfilePath },
            { cause: err },
          );
        }

        const platformSpec = formatPlatform(platform.os, platform.architecture, platform.variant);
        for (const fromImage of parseFromImages(text)) {
          const key = `${fromImage}|${platformSpec}`;
          if (internalRepos.has(getRepo(fromImage)) || pulls.has(key)) {
            continue;
          }
          pulls.set(key, { image: fromImage, platform: platformSpec });
        }
      }
    }

    return [...pulls.values()];
  }

  /** Pull every external base image once, in discovery order. */
  async pull(manifest: FilteredManifest): Promise<BaseImagePull[]> {
    const pulls = await this.collect(manifest);
    if (pulls.length === 0) {
      this.logger.message('No external base images to pull');
      return pulls;
    }

    for (const { image, platform } of pulls) {
      await this.engine.pullImage(image, platform);
    }
    return pulls;
  }
}
