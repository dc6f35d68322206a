/**
 * @module docker-engine
 * Docker Engine - image build, push and pull through the Docker CLI.
 *
 * Uses the `docker` binary via the {@link CommandExecutor} instead of
 * dockerode for zero native-dependency operation.
 */

import type { CommandExecutor } from './command-executor.js';
import { buildTagArgs } from './tag-resolver.js';

// =====================================================================
// Public Interfaces
// =====================================================================

/** Options for building a Docker image */
export interface DockerBuildOptions {
  /** Path to the Dockerfile */
  dockerfile: string;
  /** Build context directory */
  context: string;
  /** Tags applied to the built image, in order */
  tags: readonly string[];
  /** Build arguments, applied in insertion order */
  buildArgs?: Record<string, string>;
}

/** Container engine operations the build orchestrator depends on. */
export interface ContainerEngine {
  buildImage(options: DockerBuildOptions, retry: boolean): Promise<void>;
  pushImage(tag: string): Promise<void>;
  pullImage(image: string, platform?: string): Promise<void>;
}

// =====================================================================
// Command Builders (exported for testing)
// =====================================================================

/**
 * Build the argument list for `docker build`.
 *
 * Shape: `build -t <tag>... -f <dockerfile> --build-arg k=v... <context>`.
 */
export function buildBuildArgs(options: DockerBuildOptions): string[] {
  const args: string[] = ['build'];

  args.push(...buildTagArgs(options.tags));
  args.push('-f', options.dockerfile);

  if (options.buildArgs) {
    for (const [key, value] of Object.entries(options.buildArgs)) {
      args.push('--build-arg', `${key}=${value}`);
    }
  }

  args.push(options.context);

  return args;
}

/** Argument list for `docker push`. */
export function buildPushArgs(tag: string): string[] {
  return ['push', tag];
}

/**
 * Argument list for `docker pull`.
 *
 * @param platform - Optional `os/arch[/variant]` selector
 */
export function buildPullArgs(image: string, platform?: string): string[] {
  const args = ['pull'];
  if (platform) {
    args.push('--platform', platform);
  }
  args.push(image);
  return args;
}

/** `os/arch[/variant]` platform selector understood by `docker pull`. */
export function formatPlatform(os: string, architecture: string, variant?: string): string {
  return variant ? `${os}/${architecture}/${variant}` : `${os}/${architecture}`;
}

// =====================================================================
// Docker CLI Service
// =====================================================================

/**
 * {@link ContainerEngine} backed by the Docker CLI.
 *
 * Pushes and pulls always retry; builds retry when asked to.
 */
export class DockerService implements ContainerEngine {
  constructor(private readonly executor: CommandExecutor) {}

  async buildImage(options: DockerBuildOptions, retry: boolean): Promise<void> {
    await this.executor.execute('docker', buildBuildArgs(options), {
      retry,
      errorMessage: `Failed to build ${options.dockerfile}`,
    });
  }

  async pushImage(tag: string): Promise<void> {
    await this.executor.executeWithRetry('docker', buildPushArgs(tag), {
      errorMessage: `Failed to push ${tag}`,
    });
  }

  async pullImage(image: string, platform?: string): Promise<void> {
    await this.executor.executeWithRetry('docker', buildPullArgs(image, platform), {
      errorMessage: `Failed to pull ${image}`,
    });
  }
}
