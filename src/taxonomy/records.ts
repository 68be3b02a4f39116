/**
 * Taxonomy record ordering
 *
 * The taxonomy builder emits tab-separated records in no particular order.
 * The LCA engine expects them sorted by column 6, then column 5, both
 * numerically descending; remaining ties are broken by the whole record,
 * descending.
 */

import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";
import { readLines } from "../io/file-reader";
import { renameArtifact, tempPath } from "../io/file-writer";

/** Zero-based columns compared, in priority order */
export const SORT_COLUMNS = [5, 4] as const;

/**
 * Numeric value of a field, reading its leading number; fields without
 * one compare as zero. Only a minus sign may precede the digits.
 */
export function numericField(field: string | undefined): number {
  if (field === undefined) return 0;
  const match = /^\s*(-?(\d+\.?\d*|\.\d+))/.exec(field);
  return match?.[1] !== undefined ? Number(match[1]) : 0;
}

/**
 * Comparator placing records in taxDB order
 */
export function compareTaxonomyRecords(a: string, b: string): number {
  const left = a.split("\t");
  const right = b.split("\t");

  for (const column of SORT_COLUMNS) {
    const diff = numericField(right[column]) - numericField(left[column]);
    if (diff !== 0) return diff;
  }
  if (a === b) return 0;
  return a < b ? 1 : -1;
}

/**
 * Sort taxonomy records into taxDB order
 */
export function sortTaxonomyRecords(records: readonly string[]): string[] {
  return [...records].sort(compareTaxonomyRecords);
}

/**
 * Sort the records of `input` into `output`, written atomically
 *
 * @returns Number of records written
 */
export function writeSortedTaxDB(
  input: string,
  output: string
): Effect.Effect<number, FileError, FileSystem.FileSystem> {
  const pending = tempPath(output);

  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const records = sortTaxonomyRecords(yield* readLines(input));
    const body = records.length > 0 ? `${records.join("\n")}\n` : "";

    yield* fs
      .writeFileString(pending, body)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("write", pending, error)));
    yield* renameArtifact(pending, output);
    return records.length;
  });
}
