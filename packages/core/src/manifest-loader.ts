/**
 * @module manifest-loader
 * Manifest loader for imageforge.
 *
 * Loads `manifest.yaml`, validates it with Zod schemas, supports `.env` file
 * loading and `{{variable}}` substitution, and produces the resolved manifest
 * model (absolute paths, fully-qualified tags).
 */

import { z } from 'zod';
import yaml from 'js-yaml';
import fs from 'node:fs/promises';
import path from 'node:path';
import dotenv from 'dotenv';
import type { Image, Platform, Repo, RetryPolicy, Tag } from './types.js';
import { ImageForgeError } from './error-codes.js';
import { resolveObjectVariables } from './variable-resolver.js';

// =====================================================================
// Zod Sub-Schemas
// =====================================================================

/** Tag schema */
export const TagSchema = z.object({
  name: z.string().min(1).describe('Tag name, appended to the qualified repo name'),
  local: z.boolean().default(false).describe('Apply at build time but never push'),
}).describe('Image tag');

/** Retry policy schema */
export const RetryPolicySchema = z.object({
  maxAttempts: z.number().int().min(1).max(10).describe('Maximum attempts including first try'),
  delay: z.string().describe('Delay between attempts, e.g. "2s", "500ms"'),
  backoff: z.enum(['linear', 'exponential']).optional().describe('Backoff strategy'),
  backoffMultiplier: z.number().optional().default(2).describe('Multiplier for backoff'),
}).describe('Retry policy for docker build / push / pull');

/** Platform schema */
export const PlatformSchema = z.object({
  dockerfile: z.string().describe('Dockerfile path (relative to the manifest directory)'),
  context: z.string().optional().describe('Build context directory; defaults to the Dockerfile directory'),
  os: z.string().default('linux').describe('Target OS'),
  architecture: z.string().default('amd64').describe('Target CPU architecture'),
  variant: z.string().optional().describe('Architecture variant, e.g. "v8"'),
  buildArgs: z.record(z.coerce.string()).default({}).describe('Docker build-time arguments (--build-arg)'),
  tags: z.array(TagSchema).default([]).describe('Platform-specific tags'),
  overriddenBaseImages: z.array(z.string()).default([])
    .describe('FROM references whose repository is replaced by the qualified manifest repo'),
}).describe('One buildable platform variant');

/** Image schema */
export const ImageSchema = z.object({
  sharedTags: z.array(TagSchema).default([]).describe('Tags applied to every platform build of the image'),
  platforms: z.array(PlatformSchema).min(1).describe('Platform variants'),
}).describe('Logical image');

/** Repo schema */
export const RepoSchema = z.object({
  name: z.string().min(1).describe('Repository name'),
  images: z.array(ImageSchema).default([]).describe('Images published to this repository'),
}).describe('Repository');

// =====================================================================
// Complete Manifest Schema
// =====================================================================

export const ManifestSchema = z.object({
  registry: z.string().optional().describe('Registry prepended to every repo name'),
  repoPrefix: z.string().optional().describe('Prefix prepended to every repo name'),
  variables: z.record(z.coerce.string()).optional().describe('Values for {{var.xxx}} substitution'),
  settings: z.object({
    retry: RetryPolicySchema.optional(),
  }).optional().describe('Build settings'),
  repos: z.array(RepoSchema).describe('Repositories'),
}).superRefine((manifest, ctx) => {
  const seen = new Set<string>();
  manifest.repos.forEach((repo, index) => {
    if (seen.has(repo.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['repos', index, 'name'],
        message: `Duplicate repo name '${repo.name}'`,
      });
    }
    seen.add(repo.name);
  });
}).describe('imageforge manifest');

export type ManifestDocument = z.infer<typeof ManifestSchema>;

/** Resolved manifest: the full catalog before filtering. */
export interface LoadedManifest {
  /** Absolute path of the manifest file */
  path: string;
  /** Directory that relative manifest paths resolve against */
  baseDir: string;
  repos: Repo[];
  images: Image[];
  retryPolicy?: RetryPolicy;
}

export interface LoadManifestOptions {
  registry?: string;
  repoPrefix?: string;
  /** Variables overriding the manifest's `variables` */
  vars?: Record<string, string>;
  /** Environment for {{env.XXX}}; defaults to process.env after `.env` loading */
  env?: Record<string, string | undefined>;
}

// =====================================================================
// Loader
// =====================================================================

/**
 * Load and validate a manifest file.
 *
 * Steps:
 * 1. Load `.env` from the manifest's directory
 * 2. Read and parse the YAML file
 * 3. Substitute `{{env.XXX}}` and `{{var.xxx}}` variables
 * 4. Validate with the Zod schema
 * 5. Resolve paths, qualified repo names and tags
 *
 * @param manifestPath - Defaults to `manifest.yaml` or `manifest.yml` in the cwd
 * @throws {ImageForgeError} `CONFIG_INVALID` on a missing file, YAML syntax error or failed validation
 */
export async function loadManifest(manifestPath?: string, options: LoadManifestOptions = {}): Promise<LoadedManifest> {
  const resolvedPath = await resolveManifestPath(manifestPath);
  const baseDir = path.dirname(resolvedPath);

  if (!options.env) {
    dotenv.config({ path: path.resolve(baseDir, '.env') });
  }

  let rawContent: string;
  try {
    rawContent = await fs.readFile(resolvedPath, 'utf-8');
  } catch (err) {
    throw new ImageForgeError('CONFIG_INVALID', `Manifest file could not be read: ${resolvedPath}`, { path: resolvedPath }, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(rawContent);
  } catch (err) {
    throw new ImageForgeError(
      'CONFIG_INVALID',
      `YAML syntax error in ${resolvedPath}: ${err instanceof Error ? err.message : String(err)}`,
      { path: resolvedPath },
      { cause: err },
    );
  }

  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ImageForgeError('CONFIG_INVALID', `Manifest is empty or not a valid object: ${resolvedPath}`, { path: resolvedPath });
  }

  const context = {
    vars: { ...extractVariables(parsed), ...options.vars },
    env: options.env ?? { ...process.env },
  };
  const resolved = resolveObjectVariables(parsed, context);

  const result = ManifestSchema.safeParse(resolved);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ImageForgeError('CONFIG_INVALID', `Manifest validation failed:\n${issues}`, {
      path: resolvedPath,
      issues: result.error.issues,
    });
  }

  return toLoadedManifest(result.data, resolvedPath, options);
}

/**
 * Build the manifest model from a validated document.
 */
export function toLoadedManifest(
  doc: ManifestDocument,
  manifestPath: string,
  overrides: Pick<LoadManifestOptions, 'registry' | 'repoPrefix'> = {},
): LoadedManifest {
  const baseDir = path.dirname(path.resolve(manifestPath));
  const registry = overrides.registry ?? doc.registry;
  const repoPrefix = overrides.repoPrefix ?? doc.repoPrefix;

  const repos: Repo[] = [];
  const images: Image[] = [];

  for (const repoDoc of doc.repos) {
    const repo: Repo = {
      name: repoDoc.name,
      qualifiedName: qualifyRepoName(repoDoc.name, registry, repoPrefix),
    };
    repos.push(repo);

    const toTag = (tag: { name: string; local: boolean }): Tag => ({
      fullyQualifiedName: `${repo.qualifiedName}:${tag.name}`,
      isLocal: tag.local,
    });

    for (const imageDoc of repoDoc.images) {
      images.push({
        repo: repo.name,
        sharedTags: imageDoc.sharedTags.map(toTag),
        platforms: imageDoc.platforms.map((p): Platform => {
          const dockerfilePath = path.resolve(baseDir, p.dockerfile);
          return {
            dockerfilePath,
            buildContextPath: p.context ? path.resolve(baseDir, p.context) : path.dirname(dockerfilePath),
            buildArgs: p.buildArgs,
            tags: p.tags.map(toTag),
            overriddenBaseImages: p.overriddenBaseImages,
            os: p.os,
            architecture: p.architecture,
            variant: p.variant,
          };
        }),
      });
    }
  }

  return {
    path: path.resolve(manifestPath),
    baseDir,
    repos,
    images,
    retryPolicy: doc.settings?.retry,
  };
}

/** `registry/prefix + name`, with either part optional. */
export function qualifyRepoName(name: string, registry?: string, repoPrefix?: string): string {
  const prefixed = `${repoPrefix ?? ''}${name}`;
  return registry ? `${registry.replace(/\/+$/, '')}/${prefixed}` : prefixed;
}

// =====================================================================
// Internal Helpers
// =====================================================================

async function resolveManifestPath(manifestPath?: string): Promise<string> {
  if (manifestPath) {
    return path.resolve(manifestPath);
  }

  const candidates = ['manifest.yaml', 'manifest.yml'].map((name) => path.resolve(process.cwd(), name));
  for (const candidate of candidates) {
    if (await isAccessible(candidate)) {
      return candidate;
    }
  }

  throw new ImageForgeError(
    'CONFIG_INVALID',
    `Manifest file not found. Looked for:\n${candidates.map((c) => `  - ${c}`).join('\n')}`,
    { candidates },
  );
}

async function isAccessible(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/** `variables` of the raw document, before substitution and validation. */
function extractVariables(raw: object): Record<string, string> {
  const result: Record<string, string> = {};
  const variables: unknown = Object.entries(raw).find(([key]) => key === 'variables')?.[1];
  if (variables && typeof variables === 'object') {
    for (const [key, value] of Object.entries(variables)) {
      result[key] = String(value);
    }
  }
  return result;
}
