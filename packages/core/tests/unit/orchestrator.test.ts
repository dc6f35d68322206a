/**
 * Unit tests for BuildOrchestrator.
 *
 * Tests cover:
 * - Phase order: pull, build, push, summary
 * - Tag order and private Dockerfile lifecycle during builds
 * - Cleanup after build and hook failures
 * - Push filtering inside the identity scope
 * - Retry exhaustion and push retries
 * - Dry-run and empty manifests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { createBuildOrchestrator } from '../../src/orchestrator.js';
import { ImageForgeError } from '../../src/error-codes.js';
import type { IdentityScope } from '../../src/identity.js';
import type { BuildOptions, FilteredManifest, Platform, Tag } from '../../src/types.js';
import { FakeCommandRunner, RecordingLogger, type CallHandler } from '../helpers/fakes.js';

const REGISTRY = 'reg.example.com';

const tag = (name: string, isLocal = false): Tag => ({ fullyQualifiedName: `${REGISTRY}/${name}`, isLocal });

const defaultOptions: BuildOptions = {
  isPushEnabled: true,
  isSkipPullingEnabled: false,
  isRetryEnabled: false,
  isDryRun: false,
};

describe('BuildOrchestrator', () => {
  let tmpDir: string;
  let basePlatform: Platform;
  let appPlatform: Platform;
  let manifest: FilteredManifest;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'imageforge-build-'));
    await fs.mkdir(path.join(tmpDir, 'base'));
    await fs.mkdir(path.join(tmpDir, 'app'));
    await fs.writeFile(path.join(tmpDir, 'base', 'Dockerfile'), 'FROM alpine:3.20\n', 'utf-8');
    await fs.writeFile(path.join(tmpDir, 'app', 'Dockerfile'), 'FROM sample/base:1.0\nCOPY . /app\n', 'utf-8');

    basePlatform = {
      dockerfilePath: path.join(tmpDir, 'base', 'Dockerfile'),
      buildContextPath: path.join(tmpDir, 'base'),
      buildArgs: {},
      tags: [tag('sample/base:1.0-amd64'), tag('sample/base:dev', true)],
      overriddenBaseImages: [],
      os: 'linux',
      architecture: 'amd64',
    };
    appPlatform = {
      dockerfilePath: path.join(tmpDir, 'app', 'Dockerfile'),
      buildContextPath: path.join(tmpDir, 'app'),
      buildArgs: { VERSION: '1.0' },
      tags: [tag('sample/app:1.0')],
      overriddenBaseImages: ['sample/base:1.0'],
      os: 'linux',
      architecture: 'amd64',
    };
    manifest = {
      repos: [
        { name: 'sample/base', qualifiedName: `${REGISTRY}/sample/base` },
        { name: 'sample/app', qualifiedName: `${REGISTRY}/sample/app` },
      ],
      images: [
        { repo: 'sample/base', sharedTags: [tag('sample/base:1.0')], platforms: [basePlatform] },
        { repo: 'sample/app', sharedTags: [], platforms: [appPlatform] },
      ],
    };
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  function setup(
    options: Partial<BuildOptions> = {},
    handler?: CallHandler,
    extra: { identity?: IdentityScope; buildManifest?: FilteredManifest } = {},
  ) {
    const runner = new FakeCommandRunner(handler);
    const logger = new RecordingLogger();
    const delays: number[] = [];
    const orchestrator = createBuildOrchestrator(extra.buildManifest ?? manifest, { ...defaultOptions, ...options }, {
      runner,
      logger,
      retryPolicy: { maxAttempts: 3, delay: '10ms' },
      identity: extra.identity,
      sleep: async (ms) => {
        delays.push(ms);
      },
      hostPlatform: 'linux',
    });
    return { runner, logger, delays, orchestrator };
  }

  const privatePath = (platform: Platform): string => `${platform.dockerfilePath}.temp`;

  async function fileExists(filePath: string): Promise<boolean> {
    return fs.access(filePath).then(
      () => true,
      () => false,
    );
  }

  it('should pull, build, push and summarise in order', async () => {
    const { runner, logger, orchestrator } = setup();

    const summary = await orchestrator.run();

    expect(runner.calls.map((c) => c.args)).toEqual([
      ['pull', '--platform', 'linux/amd64', 'alpine:3.20'],
      [
        'build',
        '-t', `${REGISTRY}/sample/base:1.0`,
        '-t', `${REGISTRY}/sample/base:1.0-amd64`,
        '-t', `${REGISTRY}/sample/base:dev`,
        '-f', basePlatform.dockerfilePath,
        basePlatform.buildContextPath,
      ],
      [
        'build',
        '-t', `${REGISTRY}/sample/app:1.0`,
        '-f', privatePath(appPlatform),
        '--build-arg', 'VERSION=1.0',
        appPlatform.buildContextPath,
      ],
      ['push', `${REGISTRY}/sample/base:1.0-amd64`],
      ['push', `${REGISTRY}/sample/app:1.0`],
    ]);
    expect(summary).toEqual({
      builtTags: [`${REGISTRY}/sample/base:1.0-amd64`, `${REGISTRY}/sample/base:dev`, `${REGISTRY}/sample/app:1.0`],
      pushedTags: [`${REGISTRY}/sample/base:1.0-amd64`, `${REGISTRY}/sample/app:1.0`],
    });
    expect(logger.lines.filter((line) => line.startsWith('# '))).toEqual([
      '# PULLING BASE IMAGES',
      '# BUILDING IMAGES',
      '# PUSHING IMAGES',
      '# IMAGES BUILT',
    ]);
    expect(logger.lines.slice(-5)).toEqual([
      '# IMAGES BUILT',
      `${REGISTRY}/sample/base:1.0-amd64`,
      `${REGISTRY}/sample/base:dev`,
      `${REGISTRY}/sample/app:1.0`,
      '',
    ]);
  });

  it('should build from the private Dockerfile and delete it afterwards', async () => {
    const seen: string[] = [];
    const { orchestrator } = setup({ isPushEnabled: false, isSkipPullingEnabled: true }, async (call) => {
      const dockerfile = call.args[call.args.indexOf('-f') + 1];
      if (call.args[0] === 'build' && dockerfile === privatePath(appPlatform)) {
        seen.push(await fs.readFile(dockerfile, 'utf-8'));
      }
      return 0;
    });

    await orchestrator.run();

    expect(seen).toEqual([`FROM ${REGISTRY}/sample/base:1.0\nCOPY . /app\n`]);
    expect(await fileExists(privatePath(appPlatform))).toBe(false);
    await expect(fs.readFile(appPlatform.dockerfilePath, 'utf-8')).resolves.toBe('FROM sample/base:1.0\nCOPY . /app\n');
  });

  it('should delete the private Dockerfile when the build fails', async () => {
    const { runner, logger, orchestrator } = setup({ isSkipPullingEnabled: true }, (call) =>
      call.args.includes(privatePath(appPlatform)) ? 1 : 0,
    );

    const error = await orchestrator.run().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ImageForgeError);
    expect((error as ImageForgeError).code).toBe('COMMAND_FAILED');
    expect((error as ImageForgeError).message).toBe(`Failed to build ${privatePath(appPlatform)} (exit code 1)`);
    expect(await fileExists(privatePath(appPlatform))).toBe(false);
    expect(runner.docker('push')).toHaveLength(0);
    expect(logger.lines).not.toContain('# IMAGES BUILT');
  });

  it('should let a failed private Dockerfile deletion replace the build error', async () => {
    const { runner, orchestrator } = setup({ isSkipPullingEnabled: true }, async (call) => {
      if (call.args.includes(privatePath(appPlatform))) {
        await fs.unlink(privatePath(appPlatform));
        return 1;
      }
      return 0;
    });

    const error = await orchestrator.run().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ImageForgeError);
    expect((error as ImageForgeError).code).toBe('DOCKERFILE_IO');
    expect((error as ImageForgeError).message.startsWith(
      `Failed to delete private Dockerfile ${privatePath(appPlatform)}: `,
    )).toBe(true);
    expect((error as ImageForgeError).details).toMatchObject({ path: privatePath(appPlatform), errno: 'ENOENT' });
    expect(runner.docker('push')).toHaveLength(0);
  });

  it('should delete the private Dockerfile when a hook fails', async () => {
    const hookPath = path.join(appPlatform.buildContextPath, 'hooks', 'pre-build');
    await fs.mkdir(path.dirname(hookPath));
    await fs.writeFile(hookPath, '#!/bin/sh\nexit 1\n', { mode: 0o755 });
    const { runner, orchestrator } = setup({ isSkipPullingEnabled: true }, (call) => (call.command === hookPath ? 1 : 0));

    const error = await orchestrator.run().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ImageForgeError);
    expect((error as ImageForgeError).code).toBe('HOOK_FAILED');
    expect((error as ImageForgeError).details).toMatchObject({ hook: 'pre-build', scriptPath: hookPath });
    expect(runner.docker('build')).toHaveLength(1);
    expect(await fileExists(privatePath(appPlatform))).toBe(false);
  });

  it('should run hooks around the build from the build context', async () => {
    const hooksDir = path.join(basePlatform.buildContextPath, 'hooks');
    await fs.mkdir(hooksDir);
    await fs.writeFile(path.join(hooksDir, 'pre-build'), '#!/bin/sh\n', { mode: 0o755 });
    await fs.writeFile(path.join(hooksDir, 'post-build.ps1'), 'Write-Host done\n', 'utf-8');
    const buildManifest: FilteredManifest = { repos: manifest.repos, images: manifest.images.slice(0, 1) };
    const { runner, orchestrator } = setup({ isPushEnabled: false, isSkipPullingEnabled: true }, undefined, { buildManifest });

    await orchestrator.run();

    expect(runner.calls.map((c) => [c.command, c.args[0], c.cwd])).toEqual([
      [path.join(hooksDir, 'pre-build'), undefined, basePlatform.buildContextPath],
      ['docker', 'build', undefined],
      ['pwsh', '-NoProfile', basePlatform.buildContextPath],
    ]);
  });

  it('should fail on an override of an undeclared repo before building that platform', async () => {
    appPlatform.overriddenBaseImages = ['other/base:1.0'];
    const { runner, orchestrator } = setup({ isSkipPullingEnabled: true });

    await expect(orchestrator.run()).rejects.toMatchObject({ code: 'UNKNOWN_REPO' });
    expect(runner.docker('build')).toHaveLength(1);
  });

  it('should push each pushable tag once inside the identity scope', async () => {
    let isInScope = false;
    const identity: IdentityScope = {
      run: async (work) => {
        isInScope = true;
        try {
          return await work();
        } finally {
          isInScope = false;
        }
      },
    };
    const pushedInScope: boolean[] = [];
    const { runner, orchestrator } = setup(
      { isSkipPullingEnabled: true },
      (call) => {
        if (call.args[0] === 'push') {
          pushedInScope.push(isInScope);
        }
        return 0;
      },
      { identity },
    );

    await orchestrator.run();

    expect(runner.docker('push').map((c) => c.args[1])).toEqual([
      `${REGISTRY}/sample/base:1.0-amd64`,
      `${REGISTRY}/sample/app:1.0`,
    ]);
    expect(pushedInScope).toEqual([true, true]);
  });

  it('should not push when push is disabled', async () => {
    const { runner, logger, orchestrator } = setup({ isPushEnabled: false, isSkipPullingEnabled: true });

    const summary = await orchestrator.run();

    expect(runner.docker('push')).toHaveLength(0);
    expect(summary.pushedTags).toEqual([]);
    expect(logger.lines).not.toContain('# PUSHING IMAGES');
  });

  it('should skip pulling when asked to', async () => {
    const { runner, logger, orchestrator } = setup({ isSkipPullingEnabled: true });

    await orchestrator.run();

    expect(runner.docker('pull')).toHaveLength(0);
    expect(logger.lines).not.toContain('# PULLING BASE IMAGES');
  });

  it('should give up on a failing build after the policy attempts', async () => {
    const { runner, delays, orchestrator } = setup({ isRetryEnabled: true, isSkipPullingEnabled: true }, (call) =>
      call.args[0] === 'build' ? 1 : 0,
    );

    const error = await orchestrator.run().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ImageForgeError);
    expect((error as ImageForgeError).code).toBe('RETRY_EXHAUSTED');
    expect((error as ImageForgeError).message).toBe(
      `Failed to build ${basePlatform.dockerfilePath} (gave up after 3 attempts)`,
    );
    expect(runner.docker('build')).toHaveLength(3);
    expect(delays).toEqual([10, 10]);
  });

  it('should not retry a failing build when retry is disabled', async () => {
    const { runner, orchestrator } = setup({ isSkipPullingEnabled: true }, (call) => (call.args[0] === 'build' ? 1 : 0));

    await expect(orchestrator.run()).rejects.toMatchObject({ code: 'COMMAND_FAILED' });
    expect(runner.docker('build')).toHaveLength(1);
  });

  it('should retry pushes even when build retry is disabled', async () => {
    let pushFailures = 1;
    const { runner, orchestrator } = setup({ isSkipPullingEnabled: true }, (call) => {
      if (call.args[0] === 'push' && pushFailures > 0) {
        pushFailures--;
        return 1;
      }
      return 0;
    });

    const summary = await orchestrator.run();

    expect(runner.docker('push').map((c) => c.args[1])).toEqual([
      `${REGISTRY}/sample/base:1.0-amd64`,
      `${REGISTRY}/sample/base:1.0-amd64`,
      `${REGISTRY}/sample/app:1.0`,
    ]);
    expect(summary.pushedTags).toHaveLength(2);
  });

  it('should only echo commands in dry-run mode', async () => {
    const { runner, logger, orchestrator } = setup({ isDryRun: true });

    const summary = await orchestrator.run();

    expect(runner.calls).toHaveLength(0);
    expect(logger.lines).toContain('$ docker pull --platform linux/amd64 alpine:3.20');
    expect(logger.lines).toContain(`$ docker push ${REGISTRY}/sample/app:1.0`);
    expect(summary.builtTags).toHaveLength(3);
    expect(logger.lines.slice(-5, -3)).toEqual(['# IMAGES BUILT', `${REGISTRY}/sample/base:1.0-amd64`]);
    expect(await fileExists(privatePath(appPlatform))).toBe(false);
  });

  it('should report an empty build', async () => {
    const { runner, logger, orchestrator } = setup({}, undefined, { buildManifest: { repos: [], images: [] } });

    const summary = await orchestrator.run();

    expect(summary).toEqual({ builtTags: [], pushedTags: [] });
    expect(runner.calls).toHaveLength(0);
    expect(logger.lines).toEqual([
      '# PULLING BASE IMAGES',
      'No external base images to pull',
      '# BUILDING IMAGES',
      '# IMAGES BUILT',
      'No images built',
      '',
    ]);
  });

  it('should return the built tags as a frozen list', async () => {
    const { orchestrator } = setup({ isPushEnabled: false, isSkipPullingEnabled: true });

    const built = await orchestrator.buildImages();

    expect(Object.isFrozen(built)).toBe(true);
    expect(built.map((t) => t.fullyQualifiedName)).toEqual([
      `${REGISTRY}/sample/base:1.0-amd64`,
      `${REGISTRY}/sample/base:dev`,
      `${REGISTRY}/sample/app:1.0`,
    ]);
  });
});
