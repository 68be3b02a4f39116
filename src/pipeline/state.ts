/**
 * Pipeline state derived from artifacts on disk
 *
 * The filesystem is probed once at startup. The resulting value is passed
 * through the stages, each of which returns an updated copy; stages never
 * re-probe for their skip decisions.
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import type { FileError } from "../errors";
import { exists, isNonEmpty, listDirectory } from "../io/file-reader";
import { removeIfExists } from "../io/file-writer";
import type { PipelineState } from "../types";
import { type ArtifactPaths, isRebuildTarget } from "./artifacts";
import { join } from "path";

/**
 * State of a directory with no artifacts
 */
export const EMPTY_STATE: PipelineState = {
  rawTable: false,
  reducedBackup: false,
  sortedTable: false,
  taxonMap: false,
  taxDB: false,
  lcaDatabase: false,
  uidDatabase: false,
  lcaReport: false,
  uidReport: false,
};

/**
 * Probe artifact presence
 *
 * Tables and sentinels count when they exist; the map, taxDB and reports
 * must also be non-empty.
 */
export function probePipelineState(
  paths: ArtifactPaths
): Effect.Effect<PipelineState, FileError, FileSystem.FileSystem> {
  return Effect.all({
    rawTable: exists(paths.path("rawTable")),
    reducedBackup: exists(paths.path("reducedBackup")),
    sortedTable: exists(paths.path("sortedTable")),
    taxonMap: isNonEmpty(paths.path("taxonMap")),
    taxDB: isNonEmpty(paths.path("taxDB")),
    lcaDatabase: exists(paths.path("lcaDatabase")),
    uidDatabase: exists(paths.path("uidComplete")),
    lcaReport: isNonEmpty(paths.lcaReport),
    uidReport: isNonEmpty(paths.uidReport),
  });
}

/**
 * Delete every artifact of a previous build
 *
 * @returns Names of the removed entries
 */
export function clearArtifacts(
  paths: ArtifactPaths
): Effect.Effect<string[], FileError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const entries = yield* listDirectory(paths.databaseDir);
    const removed: string[] = [];
    for (const entry of [...entries].sort()) {
      if (!isRebuildTarget(entry, paths.base)) continue;
      if (yield* removeIfExists(join(paths.databaseDir, entry))) {
        removed.push(entry);
      }
    }
    return removed;
  });
}
