/**
 * Artifact writing operations using Effect Platform
 *
 * Artifacts are written under a temporary name and renamed into place only
 * once complete, so an artifact at its canonical path is either fully
 * written or absent.
 *
 * @module file-writer
 */

import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";

/**
 * Suffix of the in-progress path for an artifact
 */
export const TEMP_SUFFIX = ".tmp";

/**
 * In-progress path for a canonical artifact path
 */
export function tempPath(path: string): string {
  return `${path}${TEMP_SUFFIX}`;
}

/**
 * Rename a file, replacing any file already at the destination
 */
export function renameArtifact(
  from: string,
  to: string
): Effect.Effect<void, FileError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.rename(from, to);
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("rename", `${from} -> ${to}`, error)));
}

/**
 * Write string content to a temporary file, then rename it into place
 */
export function writeAtomically(
  path: string,
  content: string
): Effect.Effect<void, FileError, FileSystem.FileSystem> {
  const pending = tempPath(path);

  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs
      .writeFileString(pending, content)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("write", pending, error)));
    yield* renameArtifact(pending, path);
  });
}

/**
 * Create an empty marker file
 */
export function touch(path: string): Effect.Effect<void, FileError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.writeFileString(path, "");
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("write", path, error)));
}

/**
 * Remove a file if it exists
 *
 * @returns true when a file was removed
 */
export function removeIfExists(path: string): Effect.Effect<boolean, FileError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    if (!(yield* fs.exists(path))) return false;
    yield* fs.remove(path);
    return true;
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("remove", path, error)));
}
