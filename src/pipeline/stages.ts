/**
 * Build stages
 *
 * Each stage decides from the pipeline state whether its work is already
 * done, runs its engine otherwise, and moves its outputs into place only
 * after the engine succeeds. A stage returns the updated state; it never
 * re-probes the filesystem to decide whether to skip.
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { join } from "path";
import { EngineError, MissingInputError, type StageError } from "../errors";
import { ExternalEngine } from "../engines/service";
import { exists, getSize, isNonEmpty, listDirectory } from "../io/file-reader";
import { removeIfExists, renameArtifact, tempPath, touch } from "../io/file-writer";
import { totalLibraryBytes, type SequenceStream } from "../library/sequence-stream";
import { collectTaxonMaps } from "../library/taxon-map";
import { readHashTableHeader, recordGeometry } from "../planning/header";
import {
  estimateHashSize,
  indexSizeBytes,
  reductionNeeded,
  targetRecordCount,
} from "../planning/planner";
import { writeSortedTaxDB } from "../taxonomy/records";
import type {
  BuildParameters,
  LibraryManifest,
  PipelineState,
  StageName,
  TaxidFlag,
} from "../types";
import { type ArtifactPaths, SHARD_PATTERN } from "./artifacts";
import { Stopwatch } from "./elapsed";

/** NCBI taxonomy dump fetched when the taxonomy directory lacks one */
export const TAXDUMP_URL = "ftp://ftp.ncbi.nih.gov/pub/taxonomy/taxdump.tar.gz";

/**
 * Everything a stage reads besides the pipeline state
 */
export interface StageContext {
  readonly params: BuildParameters;
  readonly paths: ArtifactPaths;
  readonly manifest: LibraryManifest;
  /** Fresh concatenation of the library on every run */
  readonly library: SequenceStream;
}

export interface StageOutcome {
  readonly state: PipelineState;
  /** False when the stage was skipped */
  readonly ran: boolean;
}

export type StageRequirements = ExternalEngine | FileSystem.FileSystem;

export type Stage = (
  context: StageContext,
  state: PipelineState
) => Effect.Effect<StageOutcome, StageError, StageRequirements>;

const skip = (state: PipelineState, message: string): Effect.Effect<StageOutcome> =>
  Effect.logInfo(message).pipe(Effect.as({ state, ran: false }));

/**
 * Fail unless every listed artifact is present in the state
 */
function requireArtifacts(
  state: PipelineState,
  paths: ArtifactPaths,
  required: ReadonlyArray<"rawTable" | "sortedTable" | "taxonMap" | "taxDB">
): Effect.Effect<void, MissingInputError> {
  const missing = required.filter((name) => !state[name]);
  if (missing.length === 0) return Effect.void;

  const files = missing.map((name) => paths.path(name));
  return Effect.fail(
    new MissingInputError(
      `Required artifact missing or empty: ${files.join(", ")}`,
      files.join(", "),
      "An earlier stage did not produce its output"
    )
  );
}

/**
 * Counting shards currently in the database directory, in index order
 */
function listShards(paths: ArtifactPaths): Effect.Effect<string[], StageError, FileSystem.FileSystem> {
  return listDirectory(paths.databaseDir).pipe(
    Effect.map((entries) =>
      entries
        .map((entry) => SHARD_PATTERN.exec(entry))
        .filter((match): match is RegExpExecArray => match !== null)
        .sort((a, b) => Number(a[1]) - Number(b[1]))
        .map((match) => join(paths.databaseDir, match[0]))
    )
  );
}

// =============================================================================
// STAGE 1: COUNT
// =============================================================================

export const countStage: Stage = (context, state) =>
  Effect.gen(function* () {
    if (state.rawTable || state.sortedTable) {
      return yield* skip(state, "Skipping step 1, k-mer set already exists.");
    }

    const { params, paths } = context;
    const engine = yield* ExternalEngine;
    yield* Effect.logInfo("Creating k-mer set (step 1 of 6)...");
    const watch = new Stopwatch();

    const program = yield* engine.locateCounter(params.counterBinary);
    yield* Effect.logInfo(`Using ${program}`);

    let hashSize = params.hashSize;
    if (hashSize === undefined) {
      hashSize = estimateHashSize(yield* totalLibraryBytes(context.manifest));
      yield* Effect.logInfo(`Hash size not specified, using '${hashSize}'`);
    }

    // Shards left by an interrupted run must not be merged into this one
    for (const stale of yield* listShards(paths)) {
      yield* removeIfExists(stale);
    }

    yield* engine.count({
      program,
      kmerLen: params.kmerLen,
      hashSize,
      threads: params.threads,
      outputPrefix: paths.path("shardPrefix"),
      input: context.library,
    });

    const shards = yield* listShards(paths);
    const pending = tempPath(paths.path("rawTable"));
    const [first] = shards;
    if (first === undefined) {
      return yield* Effect.fail(
        new EngineError(
          "count produced no hash table shards",
          "count",
          `${program} count -o ${paths.path("shardPrefix")}`
        )
      );
    }
    if (shards.length > 1) {
      yield* engine.merge({ program, shards, output: pending });
    } else {
      yield* renameArtifact(first, pending);
    }
    yield* renameArtifact(pending, paths.path("rawTable"));

    yield* Effect.logInfo(`K-mer set created. [${watch.elapsed()}]`);
    return { state: { ...state, rawTable: true }, ran: true };
  });

// =============================================================================
// STAGE 2: REDUCE
// =============================================================================

export const reduceStage: Stage = (context, state) =>
  Effect.gen(function* () {
    const { params, paths } = context;
    const budget = params.maxDbSize;
    if (budget === undefined) {
      return yield* skip(state, "Skipping step 2, no database reduction requested.");
    }
    if (state.reducedBackup) {
      return yield* skip(state, "Skipping step 2, database reduction already done.");
    }
    if (state.sortedTable) {
      return yield* skip(state, "Skipping step 2, k-mer set already sorted.");
    }
    yield* requireArtifacts(state, paths, ["rawTable"]);

    const rawTable = paths.path("rawTable");
    const kdbSize = yield* getSize(rawTable);
    const idxSize = indexSizeBytes(params.minimizerLen);
    if (!reductionNeeded(kdbSize, idxSize, budget)) {
      return yield* skip(state, "Skipping step 2, database reduction unnecessary.");
    }

    const engine = yield* ExternalEngine;
    yield* Effect.logInfo("Reducing database size (step 2 of 6)...");
    const watch = new Stopwatch();

    const header = yield* readHashTableHeader(rawTable);
    const { recordLen } = recordGeometry(header);
    const records = yield* targetRecordCount(budget, idxSize, recordLen);
    yield* Effect.logInfo(`Shrinking DB to use only ${records} of the ${header.keyCount} k-mers`);

    const reduced = paths.path("reducedTable");
    const backup = paths.path("reducedBackup");
    yield* engine.reduce({ input: rawTable, output: reduced, records });
    yield* renameArtifact(rawTable, tempPath(backup));
    yield* renameArtifact(reduced, rawTable);
    yield* renameArtifact(tempPath(backup), backup);

    yield* Effect.logInfo(`Database reduced. [${watch.elapsed()}]`);
    return { state: { ...state, reducedBackup: true }, ran: true };
  });

// =============================================================================
// STAGE 3: SORT
// =============================================================================

export const sortStage: Stage = (context, state) =>
  Effect.gen(function* () {
    if (state.sortedTable) {
      return yield* skip(state, "Skipping step 3, k-mer set already sorted.");
    }

    const { params, paths } = context;
    yield* requireArtifacts(state, paths, ["rawTable"]);
    const engine = yield* ExternalEngine;
    yield* Effect.logInfo("Sorting k-mer set (step 3 of 6)...");
    const watch = new Stopwatch();

    const sorted = paths.path("sortedTable");
    yield* engine.sort({
      input: paths.path("rawTable"),
      output: tempPath(sorted),
      index: paths.path("index"),
      minimizerLen: params.minimizerLen,
      threads: params.threads,
      inMemory: !params.workOnDisk,
    });
    yield* renameArtifact(tempPath(sorted), sorted);

    yield* Effect.logInfo(`K-mer set sorted. [${watch.elapsed()}]`);
    return { state: { ...state, sortedTable: true }, ran: true };
  });

// =============================================================================
// STAGE 4: SEQID TO TAXID MAP
// =============================================================================

export const mapStage: Stage = (context, state) =>
  Effect.gen(function* () {
    if (state.taxonMap) {
      return yield* skip(state, "Skipping step 4, seqID to taxID map already complete.");
    }

    const { params, paths } = context;
    yield* Effect.logInfo("Creating seqID to taxID map (step 4 of 6)..");
    const watch = new Stopwatch();

    const mapPath = paths.path("taxonMap");
    const lines = yield* collectTaxonMaps(params.libraryDirs, mapPath);

    yield* Effect.logInfo(`${lines} sequences mapped to taxa. [${watch.elapsed()}]`);
    return { state: { ...state, taxonMap: yield* isNonEmpty(mapPath) }, ran: true };
  });

// =============================================================================
// STAGE 5: TAXDB
// =============================================================================

export const taxdbStage: Stage = (context, state) =>
  Effect.gen(function* () {
    if (state.taxDB) {
      return yield* skip(state, "Skipping step 5, taxDB exists.");
    }

    const { params, paths } = context;
    const engine = yield* ExternalEngine;
    yield* Effect.logInfo("Creating taxDB (step 5 of 6)... ");
    const watch = new Stopwatch();

    const namesDump = join(params.taxonomyDir, "names.dmp");
    const nodesDump = join(params.taxonomyDir, "nodes.dmp");
    if (!(yield* exists(namesDump)) || !(yield* exists(nodesDump))) {
      yield* Effect.logInfo(`${namesDump} or ${nodesDump} does not exist - downloading it ...`);
      yield* engine.fetchTaxonomy({ taxonomyDir: params.taxonomyDir, url: TAXDUMP_URL });
    }

    const taxDB = paths.path("taxDB");
    const unsorted = tempPath(`${taxDB}.unsorted`);
    yield* engine.buildTaxDB({ namesDump, nodesDump, output: unsorted });
    const records = yield* writeSortedTaxDB(unsorted, taxDB);
    yield* removeIfExists(unsorted);

    yield* Effect.logInfo(`taxDB construction finished, ${records} records. [${watch.elapsed()}]`);
    return { state: { ...state, taxDB: records > 0 }, ran: true };
  });

// =============================================================================
// STAGE 6: FINALIZE
// =============================================================================

function logTaxidFlags(flags: readonly TaxidFlag[]): Effect.Effect<void> {
  return Effect.gen(function* () {
    if (flags.includes("-a")) yield* Effect.logInfo(" Adding taxonomy IDs for sequences");
    if (flags.includes("-A")) yield* Effect.logInfo(" Adding taxonomy IDs for genomes");
  });
}

/**
 * Standard LCA-annotated database
 *
 * With taxid flags set, the engine's augmented map replaces
 * `seqid2taxid.map` and the original is kept as `seqid2taxid.map.orig`.
 */
export const lcaStage: Stage = (context, state) =>
  Effect.gen(function* () {
    const { params, paths } = context;
    if (!params.lcaDatabase) {
      return yield* skip(state, "Skipping step 6, LCA database not requested.");
    }
    if (state.lcaDatabase) {
      return yield* skip(state, "Skipping step 6, LCAs already set.");
    }
    yield* requireArtifacts(state, paths, ["sortedTable", "taxonMap", "taxDB"]);

    const engine = yield* ExternalEngine;
    yield* Effect.logInfo("Building standard Kraken LCA database (step 6 of 6)...");
    yield* logTaxidFlags(params.taxidFlags);
    const watch = new Stopwatch();

    const database = paths.path("lcaDatabase");
    const augmented = paths.path("augmentedTaxonMap");
    yield* engine.setLCAs({
      sortedTable: paths.path("sortedTable"),
      index: paths.path("index"),
      taxDB: paths.path("taxDB"),
      taxonMap: paths.path("taxonMap"),
      output: tempPath(database),
      kmerCounts: paths.path("lcaKmerCounts"),
      threads: params.threads,
      inMemory: !params.workOnDisk,
      taxidFlags: params.taxidFlags,
      stdout: augmented,
      input: context.library,
    });

    if (params.taxidFlags.length > 0) {
      yield* renameArtifact(paths.path("taxonMap"), paths.path("taxonMapOriginal"));
      yield* renameArtifact(augmented, paths.path("taxonMap"));
    }
    yield* renameArtifact(tempPath(database), database);

    yield* Effect.logInfo(`LCA database created. [${watch.elapsed()}]`);
    return { state: { ...state, lcaDatabase: true }, ran: true };
  });

/**
 * UID-indexed database
 *
 * Taxid flags are passed only when the LCA variant is disabled; otherwise
 * the LCA variant has already applied them to the shared map.
 */
export const uidStage: Stage = (context, state) =>
  Effect.gen(function* () {
    const { params, paths } = context;
    if (!params.uidDatabase) {
      return yield* skip(state, "Skipping step 6.3, UID database not requested.");
    }
    if (state.uidDatabase) {
      return yield* skip(state, "Skipping step 6.3, UID database already generated.");
    }
    yield* requireArtifacts(state, paths, ["sortedTable", "taxonMap", "taxDB"]);

    const engine = yield* ExternalEngine;
    const taxidFlags: readonly TaxidFlag[] = params.lcaDatabase ? [] : params.taxidFlags;
    yield* Effect.logInfo("Building UID database (step 6.3 of 6)...");
    yield* logTaxidFlags(taxidFlags);
    const watch = new Stopwatch();

    const database = paths.path("uidDatabase");
    yield* engine.setLCAs({
      sortedTable: paths.path("sortedTable"),
      index: paths.path("index"),
      taxDB: paths.path("taxDB"),
      taxonMap: paths.path("taxonMap"),
      uidMap: paths.path("uidMap"),
      output: tempPath(database),
      kmerCounts: paths.path("uidKmerCounts"),
      threads: params.threads,
      inMemory: !params.workOnDisk,
      taxidFlags,
      input: context.library,
    });
    yield* renameArtifact(tempPath(database), database);
    yield* touch(paths.path("uidComplete"));

    yield* Effect.logInfo(`UID Database created. [${watch.elapsed()}]`);
    return { state: { ...state, uidDatabase: true }, ran: true };
  });

/**
 * All stages in execution order
 */
export const STAGE_SEQUENCE: ReadonlyArray<{ readonly name: StageName; readonly run: Stage }> = [
  { name: "count", run: countStage },
  { name: "reduce", run: reduceStage },
  { name: "sort", run: sortStage },
  { name: "map", run: mapStage },
  { name: "taxdb", run: taxdbStage },
  { name: "lca", run: lcaStage },
  { name: "uid", run: uidStage },
];
