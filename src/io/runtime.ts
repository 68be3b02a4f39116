/**
 * Effect platform layer selection
 *
 * Builds run under Node.js; the Node context supplies FileSystem, Path
 * and CommandExecutor to every build effect.
 */

import { NodeContext } from "@effect/platform-node";

/**
 * Get the Effect platform layer for the build
 *
 * @returns Layer providing FileSystem, Path and CommandExecutor
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}
