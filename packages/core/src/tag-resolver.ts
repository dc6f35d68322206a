/**
 * @module tag-resolver
 * Tag composition for platform builds.
 */

import type { Image, Tag } from './types.js';

/**
 * Full tag list for one platform build: the image's shared tags in declared
 * order, then the platform tags in declared order. Duplicates are kept.
 */
export function resolveTags(image: Pick<Image, 'sharedTags'>, platformTags: readonly string[]): string[] {
  return [...image.sharedTags.map((tag) => tag.fullyQualifiedName), ...platformTags];
}

/** `['-t', tag1, '-t', tag2, ...]`; empty for an empty tag list. */
export function buildTagArgs(tags: readonly string[]): string[] {
  return tags.flatMap((tag) => ['-t', tag]);
}

/** Tags that may be pushed to a registry. */
export function pushableTags(tags: readonly Tag[]): string[] {
  return tags.filter((tag) => !tag.isLocal).map((tag) => tag.fullyQualifiedName);
}
