/**
 * Pipeline driver
 *
 * Runs the build stages strictly in order against one database directory.
 * The first failure aborts the run; re-invoking the build resumes from the
 * first stage whose artifacts are missing. Only one build may run against
 * a database directory at a time; concurrent builds are not detected.
 */

import { Effect, LogLevel } from "effect";
import { MissingInputError, type StageError } from "../errors";
import { isDirectory } from "../io/file-reader";
import { discoverLibrary, SEQUENCE_EXTENSIONS } from "../library/discovery";
import { sequenceStream } from "../library/sequence-stream";
import type { BuildParameters, BuildSummary, StageName } from "../types";
import { ArtifactPaths } from "./artifacts";
import { Stopwatch } from "./elapsed";
import { type ReportVariant, triggerReport } from "./report";
import { STAGE_SEQUENCE, type StageContext, type StageRequirements } from "./stages";
import { clearArtifacts, probePipelineState } from "./state";

/**
 * Finalize variant whose report follows a stage, when that variant is enabled
 */
function reportVariantFor(stage: StageName, params: BuildParameters): ReportVariant | undefined {
  if (stage === "lca" && params.lcaDatabase) return "lca";
  if (stage === "uid" && params.uidDatabase) return "uid";
  return undefined;
}

/**
 * Run every build stage for the given parameters
 */
export function runBuild(
  params: BuildParameters
): Effect.Effect<BuildSummary, StageError, StageRequirements> {
  return Effect.gen(function* () {
    const watch = new Stopwatch();
    const paths = new ArtifactPaths(params.databaseDir);

    if (!(yield* isDirectory(params.databaseDir))) {
      return yield* Effect.fail(
        new MissingInputError(
          `Can't find Kraken DB directory "${params.databaseDir}"`,
          params.databaseDir
        )
      );
    }

    yield* Effect.logInfo(
      params.workOnDisk
        ? "Kraken build set to minimize RAM usage."
        : "Kraken build set to minimize disk writes."
    );

    if (params.rebuild) {
      const removed = yield* clearArtifacts(paths);
      yield* Effect.logInfo(`Rebuilding database, removed ${removed.length} existing artifacts.`);
    }

    const manifest = yield* discoverLibrary(params.libraryDirs, paths.path("manifest"));
    const patterns = SEQUENCE_EXTENSIONS.map((ext) => ext.slice(1)).join(",");
    yield* Effect.logInfo(
      `Found ${manifest.files.length} sequence files (*.{${patterns}}) in the library directories.`
    );

    const context: StageContext = {
      params,
      paths,
      manifest,
      library: yield* sequenceStream(manifest),
    };

    let state = yield* probePipelineState(paths);
    const executed: StageName[] = [];
    const skipped: StageName[] = [];
    const reports: string[] = [];

    for (const stage of STAGE_SEQUENCE) {
      const outcome = yield* stage.run(context, state).pipe(Effect.annotateLogs("stage", stage.name));
      state = outcome.state;
      (outcome.ran ? executed : skipped).push(stage.name);

      const variant = reportVariantFor(stage.name, params);
      if (variant !== undefined) {
        const report = yield* triggerReport(context, state, variant).pipe(
          Effect.annotateLogs("stage", `${stage.name}-report`)
        );
        state = report.state;
        if (report.report !== undefined) reports.push(report.report);
      }
    }

    const elapsed = watch.elapsed();
    yield* Effect.logInfo(
      `Database construction complete. [Total: ${elapsed}]\n` +
        "You can delete all files but database.{kdb,idx} and taxDB now, if you want"
    );

    return { executed, skipped, reports, state, elapsed };
  });
}

/**
 * Log level for a build: commands are logged at debug level
 */
export function buildLogLevel(params: BuildParameters): LogLevel.LogLevel {
  return params.verbose ? LogLevel.Debug : LogLevel.Info;
}

