/**
 * seqID to taxID map assembly
 *
 * Library sequence files may carry a `.map` sidecar of tab-separated
 * seqID/taxID pairs. The build concatenates all of them into a single map.
 */

import { FileSystem } from "@effect/platform";
import { Effect, Stream } from "effect";
import { FileError } from "../errors";
import { renameArtifact, tempPath } from "../io/file-writer";
import { findFiles, TAXON_MAP_EXTENSION } from "./discovery";

const NEWLINE = 0x0a;

function countNewlines(chunk: Uint8Array): number {
  let count = 0;
  for (const byte of chunk) {
    if (byte === NEWLINE) count++;
  }
  return count;
}

/**
 * Concatenate every `.map` sidecar under the library roots into `outPath`
 *
 * @returns Number of lines written
 */
export function collectTaxonMaps(
  libraryDirs: readonly string[],
  outPath: string
): Effect.Effect<number, FileError, FileSystem.FileSystem> {
  const pending = tempPath(outPath);

  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const sidecars = yield* findFiles(libraryDirs, [TAXON_MAP_EXTENSION]);

    let lines = 0;
    yield* fs.writeFileString(pending, "").pipe(
      Effect.mapError((error) => FileError.fromSystemError("write", pending, error))
    );
    yield* Stream.fromIterable(sidecars).pipe(
      Stream.flatMap((file) => fs.stream(file)),
      Stream.tap((chunk) =>
        Effect.sync(() => {
          lines += countNewlines(chunk);
        })
      ),
      Stream.run(fs.sink(pending, { flag: "a" })),
      Effect.mapError((error) => FileError.fromSystemError("write", pending, error))
    );

    yield* renameArtifact(pending, outPath);
    return lines;
  });
}
