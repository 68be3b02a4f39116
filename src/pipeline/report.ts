/**
 * Database summary reports
 *
 * Once a finalize variant is complete, the library is classified against
 * the new database to produce a human-readable summary. Skipped when the
 * report already exists and is non-empty.
 */

import { Effect } from "effect";
import type { EngineError, FileError } from "../errors";
import { ExternalEngine } from "../engines/service";
import { renameArtifact, tempPath } from "../io/file-writer";
import type { PipelineState } from "../types";
import type { StageContext, StageRequirements } from "./stages";

export type ReportVariant = "lca" | "uid";

export interface ReportOutcome {
  readonly state: PipelineState;
  /** Path of the report written by this call, if one was */
  readonly report?: string;
}

/**
 * Write the summary report for a finalize variant unless it exists
 */
export function triggerReport(
  context: StageContext,
  state: PipelineState,
  variant: ReportVariant
): Effect.Effect<ReportOutcome, EngineError | FileError, StageRequirements> {
  return Effect.gen(function* () {
    const done = variant === "lca" ? state.lcaReport : state.uidReport;
    if (done) {
      return { state };
    }

    const { params, paths } = context;
    const report = variant === "lca" ? paths.lcaReport : paths.uidReport;
    const classifications = variant === "lca" ? paths.lcaClassifications : paths.uidClassifications;
    const engine = yield* ExternalEngine;

    yield* Effect.logInfo("Creating database summary report ...");
    yield* engine.classify({
      databaseDir: paths.databaseDir,
      reportFile: tempPath(report),
      output: tempPath(classifications),
      threads: params.threads,
      input: context.library,
    });
    yield* renameArtifact(tempPath(classifications), classifications);
    yield* renameArtifact(tempPath(report), report);

    const updated: PipelineState =
      variant === "lca" ? { ...state, lcaReport: true } : { ...state, uidReport: true };
    return { state: updated, report };
  });
}
