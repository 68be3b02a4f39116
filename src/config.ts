/**
 * Build configuration
 *
 * Settings arrive as environment-style variables and are resolved once,
 * at pipeline start, into an immutable BuildParameters value. Both
 * finalize variants read the same resolved taxid flags.
 */

import { type } from "arktype";
import { Config, Effect, Either, Option } from "effect";
import { isAbsolute, resolve } from "path";
import { ConfigurationError } from "./errors";
import { parseGiB } from "./planning/planner";
import type { BuildParameters, TaxidFlag } from "./types";
import { BuildSettingsSchema, HashSizeSchema } from "./types";

export const DEFAULT_LIBRARY_DIR = "library/";
export const DEFAULT_TAXONOMY_DIR = "taxonomy/";
export const DEFAULT_KMER_LEN = 31;
export const DEFAULT_MINIMIZER_LEN = 15;
export const DEFAULT_THREADS = 1;

/** Unset and empty variables read as "" */
const text = (name: string): Config.Config<string> =>
  Config.string(name).pipe(Config.withDefault(""));

/**
 * Raw settings as read from the configuration provider
 */
const RawSettings = Config.all({
  databaseDir: Config.string("KRAKEN_DB_NAME"),
  libraryDirs: text("KRAKEN_LIBRARY_DIRS"),
  taxonomyDir: text("KRAKEN_TAXONOMY_DIR"),
  kmerLen: Config.integer("KRAKEN_KMER_LEN").pipe(Config.withDefault(DEFAULT_KMER_LEN)),
  minimizerLen: Config.integer("KRAKEN_MINIMIZER_LEN").pipe(
    Config.withDefault(DEFAULT_MINIMIZER_LEN)
  ),
  hashSize: text("KRAKEN_HASH_SIZE"),
  threads: Config.integer("KRAKEN_THREAD_CT").pipe(Config.withDefault(DEFAULT_THREADS)),
  maxDbSize: text("KRAKEN_MAX_DB_SIZE"),
  workOnDisk: text("KRAKEN_WORK_ON_DISK"),
  rebuild: text("KRAKEN_REBUILD_DATABASE"),
  addTaxidsForSeq: text("KRAKEN_ADD_TAXIDS_FOR_SEQ"),
  addTaxidsForGenome: text("KRAKEN_ADD_TAXIDS_FOR_GENOME"),
  lcaDatabase: text("KRAKEN_LCA_DATABASE"),
  uidDatabase: Config.option(Config.string("KRAKEN_UID_DATABASE")),
  verbose: text("KRAKEN_VERBOSE"),
  counterBinary: Config.option(Config.string("JELLYFISH_BIN")),
});

export type RawSettings = Config.Config.Success<typeof RawSettings>;

/**
 * Derive the LCA engine's taxid flags
 */
export function taxidFlagsFor(addForSeq: boolean, addForGenome: boolean): TaxidFlag[] {
  const flags: TaxidFlag[] = [];
  if (addForSeq) flags.push("-a");
  if (addForGenome) flags.push("-A");
  return flags;
}

function resolveDir(databaseDir: string, value: string, fallback: string): string {
  const dir = value === "" ? fallback : value;
  return isAbsolute(dir) ? dir : resolve(databaseDir, dir);
}

/**
 * Split a whitespace-separated list of library roots, keeping their order
 */
function resolveLibraryDirs(databaseDir: string, value: string): string[] {
  const dirs = value.split(/\s+/).filter((dir) => dir !== "");
  return (dirs.length === 0 ? [DEFAULT_LIBRARY_DIR] : dirs).map((dir) =>
    resolveDir(databaseDir, dir, DEFAULT_LIBRARY_DIR)
  );
}

/**
 * Validate raw settings and derive BuildParameters
 *
 * @param cwd Directory a relative database directory is resolved against
 */
export function toBuildParameters(
  raw: RawSettings,
  cwd: string = process.cwd()
): Either.Either<BuildParameters, ConfigurationError> {
  if (raw.databaseDir.trim() === "") {
    return Either.left(new ConfigurationError("database directory is not set", "KRAKEN_DB_NAME"));
  }

  const settings = BuildSettingsSchema({
    kmerLen: raw.kmerLen,
    minimizerLen: raw.minimizerLen,
    threads: raw.threads,
  });
  if (settings instanceof type.errors) {
    return Either.left(new ConfigurationError(`Invalid build settings: ${settings.summary}`));
  }

  let hashSize: bigint | undefined;
  if (raw.hashSize !== "") {
    const validated = HashSizeSchema(raw.hashSize.trim());
    if (validated instanceof type.errors) {
      return Either.left(
        new ConfigurationError(
          `expected a positive integer, got "${raw.hashSize}"`,
          "KRAKEN_HASH_SIZE"
        )
      );
    }
    hashSize = BigInt(validated);
  }

  let maxDbSize: BuildParameters["maxDbSize"];
  if (raw.maxDbSize !== "") {
    const parsed = parseGiB(raw.maxDbSize);
    if (Either.isLeft(parsed)) return Either.left(parsed.left);
    maxDbSize = parsed.right;
  }

  const databaseDir = resolve(cwd, raw.databaseDir);
  const addTaxidsForSeq = raw.addTaxidsForSeq === "1";
  const addTaxidsForGenome = raw.addTaxidsForGenome === "1";

  return Either.right({
    databaseDir,
    libraryDirs: resolveLibraryDirs(databaseDir, raw.libraryDirs),
    taxonomyDir: resolveDir(databaseDir, raw.taxonomyDir, DEFAULT_TAXONOMY_DIR),
    kmerLen: settings.kmerLen,
    minimizerLen: settings.minimizerLen,
    hashSize,
    threads: settings.threads,
    maxDbSize,
    workOnDisk: raw.workOnDisk !== "",
    rebuild: raw.rebuild === "1",
    addTaxidsForSeq,
    addTaxidsForGenome,
    taxidFlags: taxidFlagsFor(addTaxidsForSeq, addTaxidsForGenome),
    lcaDatabase: raw.lcaDatabase !== "0",
    // Off when unset; once set, anything but "0" enables it, as for the LCA database
    uidDatabase: Option.exists(raw.uidDatabase, (value) => value !== "0"),
    verbose: raw.verbose !== "" && raw.verbose !== "0",
    counterBinary: Option.getOrUndefined(raw.counterBinary),
  });
}

/**
 * Resolve BuildParameters from the current ConfigProvider
 * (the process environment unless one is provided)
 */
export const loadBuildParameters: Effect.Effect<BuildParameters, ConfigurationError> = Effect.gen(
  function* () {
    const raw = yield* RawSettings.pipe(
      Effect.mapError((error) => new ConfigurationError(String(error)))
    );
    return yield* toBuildParameters(raw);
  }
);
