/**
 * @module types
 * Shared domain types for imageforge.
 */

// ==================== Manifest View ====================

/** A fully-qualified image reference applied to a build. */
export interface Tag {
  /** e.g. `registry.example.com/sample/app:1.0-amd64` */
  fullyQualifiedName: string;
  /** Local-only tags are applied at build time but never pushed */
  isLocal: boolean;
}

/** A repository declared in the manifest. */
export interface Repo {
  /** Name as declared in the manifest; override lookups match on this */
  name: string;
  /** Name after the registry / repo-prefix override is applied */
  qualifiedName: string;
}

/** One concrete, buildable unit within an image. */
export interface Platform {
  /** Absolute path to the Dockerfile */
  dockerfilePath: string;
  /** Absolute path to the build context directory */
  buildContextPath: string;
  /** Build arguments, applied in insertion order */
  buildArgs: Record<string, string>;
  tags: Tag[];
  /** Base-image references whose repository is replaced before building */
  overriddenBaseImages: string[];
  os: string;
  architecture: string;
  variant?: string;
}

/** A logical image made of one or more platform variants. */
export interface Image {
  /** Name of the owning repo */
  repo: string;
  sharedTags: Tag[];
  platforms: Platform[];
}

/** Read-only, filtered view of the manifest consumed by the build engine. */
export interface FilteredManifest {
  images: readonly Image[];
  repos: readonly Repo[];
}

// ==================== Build Options ====================

/** Retry configuration for external commands. */
export interface RetryPolicy {
  /** Maximum attempts including the first one */
  maxAttempts: number;
  /** Delay between attempts, e.g. "2s", "500ms" */
  delay: string;
  backoff?: 'linear' | 'exponential';
  backoffMultiplier?: number;
}

/** Switches controlling one build run. */
export interface BuildOptions {
  isPushEnabled: boolean;
  isSkipPullingEnabled: boolean;
  isRetryEnabled: boolean;
  isDryRun: boolean;
}

/** Outcome of a completed build run. */
export interface BuildSummary {
  /** Every built tag in build order */
  builtTags: string[];
  /** Tags that were pushed (empty when push is disabled) */
  pushedTags: string[];
}

// ==================== Command Execution ====================

/** Result of running an external command to completion. */
export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandRunOptions {
  /** Working directory for the process */
  cwd?: string;
}

/** Capability that runs an external process and reports its exit status. */
export interface CommandRunner {
  run(command: string, args: string[], options?: CommandRunOptions): Promise<CommandResult>;
}

/** Result of a single attempt made by the retry executor. */
export interface AttemptResult {
  attempt: number;
  passed: boolean;
  error?: string;
  duration: number;
  timestamp: number;
}
