// @imageforge/core - build engine

// Types
export * from './types.js';

// Errors
export { ImageForgeError, isImageForgeError } from './error-codes.js';
export type { ImageForgeErrorCode, ErrorCategory, StructuredError } from './error-codes.js';

// Logger
export { ConsoleBuildLogger, silentLogger } from './logger.js';
export type { BuildLogger, ConsoleBuildLoggerOptions } from './logger.js';

// Manifest
export {
  loadManifest,
  toLoadedManifest,
  qualifyRepoName,
  ManifestSchema,
  RetryPolicySchema,
} from './manifest-loader.js';
export type { LoadedManifest, LoadManifestOptions, ManifestDocument } from './manifest-loader.js';
export { filterManifest } from './manifest-filter.js';
export type { ManifestFilter } from './manifest-filter.js';
export { resolveVariables, resolveObjectVariables } from './variable-resolver.js';
export type { VariableContext } from './variable-resolver.js';

// Retry Engine
export {
  RetryExecutor,
  DEFAULT_RETRY_POLICY,
  parseDelay,
  computeBackoffDelay,
} from './retry-engine.js';
export type { RetryResult, SleepFn } from './retry-engine.js';

// Command Executor
export { CommandExecutor, SpawnCommandRunner, formatCommandLine } from './command-executor.js';
export type { ExecuteOptions, CommandExecutorOptions } from './command-executor.js';

// Docker Engine
export {
  DockerService,
  buildBuildArgs,
  buildPushArgs,
  buildPullArgs,
  formatPlatform,
} from './docker-engine.js';
export type { ContainerEngine, DockerBuildOptions } from './docker-engine.js';

// Tags
export { resolveTags, buildTagArgs, pushableTags } from './tag-resolver.js';

// Dockerfile Overrider
export {
  DockerfileOverrider,
  PrivateDockerfile,
  PRIVATE_DOCKERFILE_SUFFIX,
  getRepo,
  replaceRepo,
  rewriteFromReferences,
} from './dockerfile-overrider.js';
export type { FromOverride, DockerfileRewrite } from './dockerfile-overrider.js';

// Hooks
export {
  HookInvoker,
  HOOK_INTERPRETERS,
  HOOK_SCRIPT_EXTENSION,
  resolveInterpreter,
  hookCommand,
} from './hook-invoker.js';
export type { HookName, HookScript } from './hook-invoker.js';

// Base Image Puller
export { BaseImagePuller, parseFromImages } from './base-image-puller.js';
export type { BaseImagePull } from './base-image-puller.js';

// Identity
export { passthroughIdentity } from './identity.js';
export type { IdentityScope } from './identity.js';

// Build Orchestrator
export { BuildOrchestrator, createBuildOrchestrator } from './orchestrator.js';
export type { BuildOrchestratorDeps, CreateBuildOrchestratorOptions } from './orchestrator.js';
