/**
 * @module identity
 * Identity scope wrapped around the push phase.
 */

/** Runs a block of work under some registry identity. */
export interface IdentityScope {
  run<T>(work: () => Promise<T>): Promise<T>;
}

/** Runs the work under the current identity. */
export const passthroughIdentity: IdentityScope = {
  run: (work) => work(),
};
