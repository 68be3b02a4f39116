/**
 * Command-line entry point
 *
 * Reads KRAKEN_* settings from the environment, builds the database in
 * KRAKEN_DB_NAME and exits non-zero on the first failure.
 */

import { NodeRuntime } from "@effect/platform-node";
import { Console, Effect, Layer, Logger } from "effect";
import { loadBuildParameters } from "./config";
import { ExternalEngineLive } from "./engines/commands";
import { getPlatform } from "./io/runtime";
import { buildLogLevel, runBuild } from "./pipeline/driver";

const main = Effect.gen(function* () {
  const params = yield* loadBuildParameters;
  return yield* runBuild(params).pipe(Logger.withMinimumLogLevel(buildLogLevel(params)));
}).pipe(
  Effect.tapError((error) => Console.error(error.toString())),
  Effect.provide(ExternalEngineLive.pipe(Layer.provideMerge(getPlatform())))
);

NodeRuntime.runMain(main, { disableErrorReporting: true });
