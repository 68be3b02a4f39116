/**
 * Hash-table header introspection
 *
 * The counting engine's table files start with a fixed header. Record
 * geometry is recovered from three little-endian 64-bit fields without
 * reading past the header.
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";
import { readByteRange } from "../io/file-reader";
import type { HashTableHeader, RecordGeometry } from "../types";

/** Byte offsets of the header fields */
export const HEADER_OFFSETS = {
  keyBits: 8,
  valueLen: 16,
  keyCount: 48,
} as const;

/** Bytes that must be present for every field to be readable */
export const HEADER_LENGTH = HEADER_OFFSETS.keyCount + 8;

/**
 * Decode header fields from the first bytes of a table file
 */
export function parseHashTableHeader(bytes: Uint8Array): HashTableHeader {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return {
    keyBits: view.getBigUint64(HEADER_OFFSETS.keyBits, true),
    valueLen: view.getBigUint64(HEADER_OFFSETS.valueLen, true),
    keyCount: view.getBigUint64(HEADER_OFFSETS.keyCount, true),
  };
}

/**
 * Read the header of a hash-table file
 */
export function readHashTableHeader(
  path: string
): Effect.Effect<HashTableHeader, FileError, FileSystem.FileSystem> {
  return readByteRange(path, 0, HEADER_LENGTH).pipe(
    Effect.map(parseHashTableHeader),
    Effect.filterOrFail(
      (header) => header.keyBits > 0n,
      (header) =>
        new FileError(
          `Hash table header declares ${header.keyBits} key bits; file is not a k-mer table`,
          path,
          "read"
        )
    )
  );
}

/**
 * Record layout for a header
 *
 * Key length is the key bit-width rounded up to whole bytes.
 *
 * @example
 * ```typescript
 * recordGeometry({ keyBits: 33n, valueLen: 4n, keyCount: 0n });
 * // { keyLen: 5n, recordLen: 9n }
 * ```
 */
export function recordGeometry(header: HashTableHeader): RecordGeometry {
  const keyLen = (header.keyBits + 7n) / 8n;
  return { keyLen, recordLen: keyLen + header.valueLen };
}
