/**
 * @module orchestrator
 * BuildOrchestrator — runs one build of a filtered manifest: pull base images,
 * build every platform in manifest order, push what was built, report a summary.
 *
 * Every phase is sequential; an error in any phase rejects {@link BuildOrchestrator.run}
 * and skips the phases after it.
 */

import type { BuildOptions, BuildSummary, CommandRunner, FilteredManifest, Image, Platform, RetryPolicy, Tag } from './types.js';
import { DockerService, type ContainerEngine } from './docker-engine.js';
import { CommandExecutor } from './command-executor.js';
import { DockerfileOverrider } from './dockerfile-overrider.js';
import { HookInvoker } from './hook-invoker.js';
import { BaseImagePuller } from './base-image-puller.js';
import { passthroughIdentity, type IdentityScope } from './identity.js';
import { resolveTags, pushableTags } from './tag-resolver.js';
import { silentLogger, type BuildLogger } from './logger.js';
import type { SleepFn } from './retry-engine.js';

export interface BuildOrchestratorDeps {
  engine: ContainerEngine;
  overrider: DockerfileOverrider;
  hooks: HookInvoker;
  puller: BaseImagePuller;
  identity?: IdentityScope;
  logger?: BuildLogger;
}

export class BuildOrchestrator {
  private readonly identity: IdentityScope;
  private readonly logger: BuildLogger;

  constructor(
    private readonly manifest: FilteredManifest,
    private readonly options: BuildOptions,
    private readonly deps: BuildOrchestratorDeps,
  ) {
    this.identity = deps.identity ?? passthroughIdentity;
    this.logger = deps.logger ?? silentLogger;
  }

  async run(): Promise<BuildSummary> {
    await this.pullBaseImages();
    const builtTags = await this.buildImages();
    const pushedTags = builtTags.length > 0 ? await this.pushImages(builtTags) : [];
    this.writeBuildSummary(builtTags);

    return {
      builtTags: builtTags.map((tag) => tag.fullyQualifiedName),
      pushedTags,
    };
  }

  private async pullBaseImages(): Promise<void> {
    if (this.options.isSkipPullingEnabled) {
      return;
    }
    this.logger.heading('PULLING BASE IMAGES');
    await this.deps.puller.pull(this.manifest);
  }

  /**
   * Build every filtered platform in order.
   *
   * @returns Tags of all successful builds, in build order
   */
  async buildImages(): Promise<readonly Tag[]> {
    this.logger.heading('BUILDING IMAGES');
    const built: Tag[] = [];

    for (const image of this.manifest.images) {
      for (const platform of image.platforms) {
        built.push(...(await this.buildPlatform(image, platform)));
      }
    }

    return Object.freeze(built);
  }

  private async buildPlatform(image: Image, platform: Platform): Promise<Tag[]> {
    const dockerfile = await this.deps.overrider.acquire(platform);

    try {
      await this.deps.hooks.invoke('pre-build', platform.buildContextPath);

      // Shared tags are applied here but only platform tags are recorded as built.
      const tags = resolveTags(image, platform.tags.map((tag) => tag.fullyQualifiedName));

      await this.deps.engine.buildImage(
        {
          dockerfile: dockerfile.path,
          context: platform.buildContextPath,
          tags,
          buildArgs: platform.buildArgs,
        },
        this.options.isRetryEnabled,
      );

      await this.deps.hooks.invoke('post-build', platform.buildContextPath);
      return platform.tags;
    } finally {
      await dockerfile.release();
    }
  }

  private async pushImages(builtTags: readonly Tag[]): Promise<string[]> {
    if (!this.options.isPushEnabled) {
      return [];
    }

    this.logger.heading('PUSHING IMAGES');
    return this.identity.run(async () => {
      const pushed: string[] = [];
      for (const tag of pushableTags(builtTags)) {
        await this.deps.engine.pushImage(tag);
        pushed.push(tag);
      }
      return pushed;
    });
  }

  private writeBuildSummary(builtTags: readonly Tag[]): void {
    this.logger.heading('IMAGES BUILT');

    if (builtTags.length > 0) {
      for (const tag of builtTags) {
        this.logger.message(tag.fullyQualifiedName);
      }
    } else {
      this.logger.message('No images built');
    }

    this.logger.message();
  }
}

// =====================================================================
// Factory
// =====================================================================

export interface CreateBuildOrchestratorOptions {
  runner?: CommandRunner;
  logger?: BuildLogger;
  retryPolicy?: RetryPolicy;
  identity?: IdentityScope;
  sleep?: SleepFn;
  hostPlatform?: NodeJS.Platform;
}

/**
 * Wire a {@link BuildOrchestrator} onto the Docker CLI.
 */
export function createBuildOrchestrator(
  manifest: FilteredManifest,
  options: BuildOptions,
  wiring: CreateBuildOrchestratorOptions = {},
): BuildOrchestrator {
  const logger = wiring.logger ?? silentLogger;
  const executor = new CommandExecutor({
    runner: wiring.runner,
    logger,
    isDryRun: options.isDryRun,
    retryPolicy: wiring.retryPolicy,
    sleep: wiring.sleep,
  });
  const engine = new DockerService(executor);

  return new BuildOrchestrator(manifest, options, {
    engine,
    overrider: new DockerfileOverrider(manifest.repos, logger),
    hooks: new HookInvoker(executor, wiring.hostPlatform),
    puller: new BaseImagePuller(engine, logger),
    identity: wiring.identity,
    logger,
  });
}
