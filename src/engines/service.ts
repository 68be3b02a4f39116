/**
 * Effect-based external engine service
 *
 * The heavy lifting of a build (k-mer counting, merging, truncation,
 * sorting, taxonomy parsing, LCA assignment and classification) is done by
 * external programs. The pipeline only sees this service: one method per
 * engine, each an Effect that succeeds or fails with an EngineError naming
 * the program and command line. Nothing above this layer looks at exit
 * codes.
 *
 * ## Layer Selection
 *
 * - `ExternalEngineLive` (from `commands.ts`) runs the real programs.
 * - Tests provide their own layer with `Layer.succeed(ExternalEngine, ...)`
 *   and write artifacts directly.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const engine = yield* ExternalEngine;
 *   yield* engine.sort({ ... });
 * });
 *
 * await Effect.runPromise(
 *   program.pipe(Effect.provide(ExternalEngineLive), Effect.provide(NodeContext.layer))
 * );
 * ```
 *
 * @module engines/service
 */

import { Context, Effect } from "effect";
import type { EngineError, MissingInputError } from "../errors";
import type { SequenceStream } from "../library/sequence-stream";
import type { TaxidFlag } from "../types";

// =============================================================================
// REQUESTS
// =============================================================================

export interface CountRequest {
  /** Counting program, as returned by `locateCounter` */
  readonly program: string;
  readonly kmerLen: number;
  readonly hashSize: bigint;
  readonly threads: number;
  /** Output prefix; shards are written as `<prefix>_0`, `<prefix>_1`, ... */
  readonly outputPrefix: string;
  readonly input: SequenceStream;
}

export interface MergeRequest {
  readonly program: string;
  readonly shards: readonly string[];
  readonly output: string;
}

export interface ReduceRequest {
  readonly input: string;
  readonly output: string;
  readonly records: bigint;
}

export interface SortRequest {
  readonly input: string;
  readonly output: string;
  readonly index: string;
  readonly minimizerLen: number;
  readonly threads: number;
  /** Minimize disk writes by holding the table in memory */
  readonly inMemory: boolean;
}

export interface TaxDBRequest {
  readonly namesDump: string;
  readonly nodesDump: string;
  /** File receiving the unsorted taxonomy records */
  readonly output: string;
}

export interface SetLCAsRequest {
  readonly sortedTable: string;
  readonly index: string;
  readonly taxDB: string;
  readonly taxonMap: string;
  readonly output: string;
  readonly kmerCounts: string;
  readonly threads: number;
  readonly inMemory: boolean;
  readonly taxidFlags: readonly TaxidFlag[];
  /** UID mode: path of the UID to taxID map the engine writes */
  readonly uidMap?: string;
  /** File receiving the engine's standard output (the taxid-augmented map) */
  readonly stdout?: string;
  readonly input: SequenceStream;
}

export interface ClassifyRequest {
  readonly databaseDir: string;
  readonly reportFile: string;
  /** File receiving per-sequence classifications */
  readonly output: string;
  readonly threads: number;
  readonly input: SequenceStream;
}

export interface FetchTaxonomyRequest {
  readonly taxonomyDir: string;
  readonly url: string;
}

// =============================================================================
// SERVICE SHAPE (Interface)
// =============================================================================

/**
 * Shape of the external engine service
 */
export interface ExternalEngineShape {
  /**
   * Resolve the counting program, preferring a configured one
   *
   * Fails with MissingInputError when it cannot be found.
   */
  readonly locateCounter: (configured: string | undefined) => Effect.Effect<string, MissingInputError>;

  /** Count k-mers of the sequence stream into hash-table shards */
  readonly count: (request: CountRequest) => Effect.Effect<void, EngineError>;

  /** Merge several hash-table shards into one */
  readonly merge: (request: MergeRequest) => Effect.Effect<void, EngineError>;

  /** Truncate a hash table to a record count */
  readonly reduce: (request: ReduceRequest) => Effect.Effect<void, EngineError>;

  /** Sort a hash table and build its minimizer index */
  readonly sort: (request: SortRequest) => Effect.Effect<void, EngineError>;

  /** Parse taxonomy dumps into flat records */
  readonly buildTaxDB: (request: TaxDBRequest) => Effect.Effect<void, EngineError>;

  /** Assign LCAs (or UIDs) and write the finalized database */
  readonly setLCAs: (request: SetLCAsRequest) => Effect.Effect<void, EngineError>;

  /** Classify the library against a finished database */
  readonly classify: (request: ClassifyRequest) => Effect.Effect<void, EngineError>;

  /** Download and unpack the taxonomy dump */
  readonly fetchTaxonomy: (request: FetchTaxonomyRequest) => Effect.Effect<void, EngineError>;
}

// =============================================================================
// SERVICE TAG
// =============================================================================

/**
 * External engine service for Effect-based dependency injection
 */
export class ExternalEngine extends Context.Tag("@krakendb-build/ExternalEngine")<
  ExternalEngine,
  ExternalEngineShape
>() {}
