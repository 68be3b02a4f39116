/**
 * Core type definitions for database builds
 *
 * Sizes that feed the reduction decision are `bigint` throughout: a
 * hash table or size budget can exceed 2^53 bytes and the reduction step
 * truncates data, so none of these values may pass through floating point.
 */

import { type } from "arktype";

/**
 * Ordered list of library sequence files, as persisted in the manifest
 */
export interface LibraryManifest {
  /** Absolute path of the manifest file */
  readonly path: string;
  /** Sequence files in discovery order */
  readonly files: readonly string[];
  /** True when the list came from an existing manifest rather than a fresh walk */
  readonly cached: boolean;
}

/**
 * Fixed-layout header at the start of a k-mer hash-table file
 */
export interface HashTableHeader {
  /** Key width in bits (offset 8) */
  readonly keyBits: bigint;
  /** Value width in bytes (offset 16) */
  readonly valueLen: bigint;
  /** Number of keys stored (offset 48) */
  readonly keyCount: bigint;
}

/**
 * Record layout derived from a hash-table header
 */
export interface RecordGeometry {
  readonly keyLen: bigint;
  readonly recordLen: bigint;
}

/**
 * Database size budget in GiB, held as an exact rational
 */
export interface SizeBudget {
  /** The value as the operator wrote it, for log lines */
  readonly text: string;
  readonly numerator: bigint;
  readonly denominator: bigint;
}

/**
 * Flags passed to the LCA engine to add taxonomy IDs for sequences
 * (`-a`) and for genomes (`-A`)
 */
export type TaxidFlag = "-a" | "-A";

/**
 * Resolved configuration for one build. Immutable once resolved; every
 * stage reads the subset it needs.
 */
export interface BuildParameters {
  /** Absolute path of the database directory */
  readonly databaseDir: string;
  /** Absolute paths of the library roots, searched in order */
  readonly libraryDirs: readonly string[];
  /** Absolute path of the taxonomy dump directory */
  readonly taxonomyDir: string;
  readonly kmerLen: number;
  readonly minimizerLen: number;
  /** Explicit hash size; estimated from the library when undefined */
  readonly hashSize?: bigint;
  readonly threads: number;
  /** Size budget; reduction is disabled when undefined */
  readonly maxDbSize?: SizeBudget;
  /** Minimize RAM usage instead of disk writes */
  readonly workOnDisk: boolean;
  /** Delete every artifact before stage 1 */
  readonly rebuild: boolean;
  readonly addTaxidsForSeq: boolean;
  readonly addTaxidsForGenome: boolean;
  /** Derived once from the two taxid flags, shared by both finalize variants */
  readonly taxidFlags: readonly TaxidFlag[];
  readonly lcaDatabase: boolean;
  readonly uidDatabase: boolean;
  readonly verbose: boolean;
  /** Counting-engine program; searched on PATH when undefined */
  readonly counterBinary?: string;
}

/**
 * Build stage names in execution order
 */
export const STAGES = ["count", "reduce", "sort", "map", "taxdb", "lca", "uid"] as const;

export type StageName = (typeof STAGES)[number];

/**
 * Artifact presence, probed once at startup and threaded through the stages
 */
export interface PipelineState {
  /** `database.jdb` exists */
  readonly rawTable: boolean;
  /** `database.jdb.big` exists (reduction already done) */
  readonly reducedBackup: boolean;
  /** `database0.kdb` exists */
  readonly sortedTable: boolean;
  /** `seqid2taxid.map` is non-empty */
  readonly taxonMap: boolean;
  /** `taxDB` is non-empty */
  readonly taxDB: boolean;
  /** `database.kdb` exists */
  readonly lcaDatabase: boolean;
  /** `uid_database.complete` exists */
  readonly uidDatabase: boolean;
  /** `<base>.report` is non-empty */
  readonly lcaReport: boolean;
  /** `<base>.uid_report` is non-empty */
  readonly uidReport: boolean;
}

/**
 * Outcome of a successful build
 */
export interface BuildSummary {
  readonly executed: readonly StageName[];
  readonly skipped: readonly StageName[];
  readonly reports: readonly string[];
  readonly state: PipelineState;
  readonly elapsed: string;
}

// Validation schemas using ArkType

/**
 * Numeric settings that the engines accept
 */
export const BuildSettingsSchema = type({
  kmerLen: "1 <= number.integer <= 31",
  minimizerLen: "1 <= number.integer <= 31",
  threads: "number.integer >= 1",
}).narrow(
  (settings, ctx) =>
    settings.minimizerLen <= settings.kmerLen ||
    ctx.mustBe("a minimizer length no greater than the k-mer length")
);

/**
 * Decimal GiB value such as "4", "0.5" or "12.25"
 */
export const SizeBudgetSchema = type(/^\d+(\.\d+)?$/);

/**
 * Positive integer hash size
 */
export const HashSizeSchema = type(/^[1-9]\d*$/);
