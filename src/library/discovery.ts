/**
 * Library discovery
 *
 * Enumerates sequence files under the library roots, following symbolic
 * links, and caches the list in a manifest inside the database directory
 * so repeated builds skip the directory walk.
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { glob } from "glob";
import { FileError, MissingInputError } from "../errors";
import { isNonEmpty, readLines } from "../io/file-reader";
import { writeAtomically } from "../io/file-writer";
import type { LibraryManifest } from "../types";

/** File extensions recognized as library sequence files */
export const SEQUENCE_EXTENSIONS = [".fna", ".fa", ".ffn"] as const;

/** Extension of the per-file seqID to taxID sidecars */
export const TAXON_MAP_EXTENSION = ".map";

/**
 * Find every file under `roots` whose name ends in one of `extensions`
 *
 * Symlinked directories are descended into. Results are absolute paths,
 * grouped by root in the order the roots are given and sorted within each.
 */
export function findFiles(
  roots: readonly string[],
  extensions: readonly string[]
): Effect.Effect<string[], FileError> {
  const names = extensions.map((ext) => ext.replace(/^\./, ""));
  const pattern = names.length === 1 ? `**/*.${names[0]}` : `**/*.{${names.join(",")}}`;

  return Effect.forEach(roots, (root) =>
    Effect.tryPromise({
      try: () =>
        glob(pattern, {
          cwd: root,
          absolute: true,
          follow: true,
          nodir: true,
          dot: true,
        }),
      catch: (error) => FileError.fromSystemError("list", root, error),
    }).pipe(Effect.map((files) => [...files].sort()))
  ).pipe(Effect.map((perRoot) => perRoot.flat()));
}

/**
 * Read the file list of an existing manifest
 */
export function loadManifest(
  manifestPath: string
): Effect.Effect<LibraryManifest, FileError, FileSystem.FileSystem> {
  return readLines(manifestPath).pipe(
    Effect.map((files) => ({ path: manifestPath, files, cached: true }))
  );
}

/**
 * Discover library files, reusing a non-empty manifest when one exists
 *
 * @throws {MissingInputError} When no sequence files are found
 */
export function discoverLibrary(
  libraryDirs: readonly string[],
  manifestPath: string
): Effect.Effect<LibraryManifest, FileError | MissingInputError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    if (yield* isNonEmpty(manifestPath)) {
      const manifest = yield* loadManifest(manifestPath);
      if (manifest.files.length > 0) return manifest;
    }

    yield* Effect.logInfo("Finding all library files");
    const files = yield* findFiles(libraryDirs, SEQUENCE_EXTENSIONS);
    if (files.length === 0) {
      return yield* Effect.fail(
        MissingInputError.emptyLibrary(libraryDirs.join(" "), SEQUENCE_EXTENSIONS)
      );
    }

    yield* writeAtomically(manifestPath, `${files.join("\n")}\n`);
    return { path: manifestPath, files, cached: false };
  });
}
