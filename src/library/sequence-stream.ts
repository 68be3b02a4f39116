/**
 * Concatenated library byte stream
 *
 * Engines that read the whole library receive it as one byte stream on
 * standard input. The stream is lazy and restartable: every run reopens
 * the manifest's files in order.
 */

import { FileSystem } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";
import { Effect, Stream } from "effect";
import type { FileError } from "../errors";
import { getSize } from "../io/file-reader";
import type { LibraryManifest } from "../types";

/**
 * Byte stream over every library file, in manifest order
 */
export type SequenceStream = Stream.Stream<Uint8Array, PlatformError>;

/**
 * Build a sequence stream for a manifest
 *
 * Nothing is opened until the stream is run.
 */
export function sequenceStream(
  manifest: LibraryManifest
): Effect.Effect<SequenceStream, never, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return Stream.fromIterable(manifest.files).pipe(Stream.flatMap((file) => fs.stream(file)));
  });
}

/**
 * Total size of the library in bytes
 */
export function totalLibraryBytes(
  manifest: LibraryManifest
): Effect.Effect<bigint, FileError, FileSystem.FileSystem> {
  return Effect.reduce(manifest.files, 0n, (total, file) =>
    getSize(file).pipe(Effect.map((size) => total + size))
  );
}
