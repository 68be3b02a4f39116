/**
 * File inspection utilities for build artifacts
 *
 * Effect-based helpers over the platform FileSystem. Every platform
 * failure is converted into a FileError carrying the path and operation.
 */

import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";

/**
 * Check whether a path exists
 */
export function exists(path: string): Effect.Effect<boolean, FileError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.exists(path);
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("stat", path, error)));
}

/**
 * Check whether a path is a regular file with at least one byte
 */
export function isNonEmpty(path: string): Effect.Effect<boolean, FileError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    if (!(yield* fs.exists(path))) return false;

    const info = yield* fs.stat(path);
    return info.type === "File" && info.size > 0n;
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("stat", path, error)));
}

/**
 * Get file size in bytes
 */
export function getSize(path: string): Effect.Effect<bigint, FileError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(path);
    return BigInt(info.size);
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("stat", path, error)));
}

/**
 * Read a specific byte range from a file
 *
 * Only the requested range is read, so a header can be inspected without
 * touching the rest of a multi-gigabyte table.
 *
 * @param start Starting byte offset (inclusive)
 * @param end Ending byte offset (exclusive)
 * @throws {FileError} If the range is invalid or the file is shorter than `end`
 */
export function readByteRange(
  path: string,
  start: number,
  end: number
): Effect.Effect<Uint8Array, FileError, FileSystem.FileSystem> {
  if (start < 0 || end < 0) {
    return Effect.fail(new FileError("Byte range must be non-negative", path, "read"));
  }
  if (start >= end) {
    return Effect.fail(new FileError("Start byte must be less than end byte", path, "read"));
  }

  return Effect.scoped(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const file = yield* fs.open(path, { flag: "r" });
      yield* file.seek(FileSystem.Size(start), "start");

      const buffer = new Uint8Array(end - start);
      let filled = 0;
      while (filled < buffer.length) {
        const bytesRead = Number(yield* file.read(buffer.subarray(filled)));
        if (bytesRead === 0) break;
        filled += bytesRead;
      }
      return { buffer, filled };
    })
  ).pipe(
    Effect.mapError((error) => FileError.fromSystemError("read", path, error)),
    Effect.flatMap(({ buffer, filled }) =>
      filled === buffer.length
        ? Effect.succeed(buffer)
        : Effect.fail(
            new FileError(
              `File ends after ${start + filled} bytes, expected at least ${end}`,
              path,
              "read"
            )
          )
    )
  );
}

/**
 * Read a text file as its non-empty lines
 */
export function readLines(path: string): Effect.Effect<string[], FileError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const content = yield* fs.readFileString(path);
    return content.split("\n").filter((line) => line.length > 0);
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("read", path, error)));
}

/**
 * List the entry names of a directory
 */
export function listDirectory(path: string): Effect.Effect<string[], FileError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.readDirectory(path);
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("list", path, error)));
}

/**
 * Check whether a path is a directory
 */
export function isDirectory(path: string): Effect.Effect<boolean, FileError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    if (!(yield* fs.exists(path))) return false;
    const info = yield* fs.stat(path);
    return info.type === "Directory";
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("stat", path, error)));
}
