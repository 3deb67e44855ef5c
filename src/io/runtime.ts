/**
 * Effect platform layer selection
 *
 * The viewer runs on Node.js; the file reader asks this module for its
 * platform layer so the FileSystem service comes from one place.
 */

import { NodeContext } from "@effect/platform-node";

/**
 * Get the Effect platform layer providing FileSystem, Path and friends
 *
 * @example
 * ```typescript
 * await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
 * ```
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}
