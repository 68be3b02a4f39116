/**
 * Live external engine layer
 *
 * Runs the engine programs as child processes through the platform
 * CommandExecutor. Sequence streams are fed on standard input through a
 * `cat` relay and named to the program as `/dev/stdin`; programs whose
 * results arrive on standard output have it streamed into the requested
 * file.
 *
 * @module engines/commands
 */

import { Command, CommandExecutor, FileSystem } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";
import { Effect, Either, Layer, Option, Ref, Stream } from "effect";
import { join } from "path";
import { EngineError, MissingInputError } from "../errors";
import type { SequenceStream } from "../library/sequence-stream";
import { ExternalEngine, type ExternalEngineShape } from "./service";

/** Path under which engines read the piped sequence stream */
export const STDIN_PATH = "/dev/stdin";

/**
 * Shell prefix copying standard input into a pipe for the program that
 * follows it
 */
export const STDIN_RELAY = ["sh", "-c", 'cat | exec "$0" "$@"'] as const;

/**
 * Program names for every engine. Bare names are resolved on PATH.
 */
export interface EnginePrograms {
  readonly shrink: string;
  readonly sort: string;
  readonly buildTaxDB: string;
  readonly setLCAs: string;
  readonly classifier: string;
  readonly download: string;
  readonly unpack: string;
}

export const DEFAULT_PROGRAMS: EnginePrograms = {
  shrink: "db_shrink",
  sort: "db_sort",
  buildTaxDB: "build_taxdb",
  setLCAs: "set_lcas",
  classifier: "krakenu",
  download: "wget",
  unpack: "tar",
};

/** Name searched on PATH when no counting program is configured */
export const DEFAULT_COUNTER = "jellyfish";

interface RunOptions {
  readonly stdin?: SequenceStream;
  /** File receiving standard output; inherited when undefined */
  readonly stdout?: string;
  readonly cwd?: string;
}

/**
 * Build the live engine from program names and a PATH-style search list
 */
export function makeExternalEngine(
  programs: EnginePrograms = DEFAULT_PROGRAMS,
  searchPath: string = process.env["PATH"] ?? ""
): Effect.Effect<ExternalEngineShape, never, CommandExecutor.CommandExecutor | FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const executor = yield* CommandExecutor.CommandExecutor;
    const fs = yield* FileSystem.FileSystem;

    const execute = (
      command: Command.Command,
      options: RunOptions
    ): Effect.Effect<number, PlatformError, CommandExecutor.CommandExecutor> => {
      const { stdin, stdout } = options;
      if (stdin === undefined && stdout === undefined) {
        return Command.exitCode(command.pipe(Command.stdout("inherit")));
      }
      return Effect.scoped(
        Effect.gen(function* () {
          const child = yield* Command.start(
            stdout === undefined ? command.pipe(Command.stdout("inherit")) : command
          );
          // An unreadable library file ends the input early; the read error
          // is reported whatever the engine made of the truncated input.
          const unread = yield* Ref.make(Option.none<PlatformError>());
          const feed: Effect.Effect<Either.Either<void, PlatformError>> =
            stdin === undefined
              ? Effect.succeed(Either.right(undefined))
              : Stream.run(
                  stdin.pipe(
                    Stream.catchAll((error) => Stream.execute(Ref.set(unread, Option.some(error))))
                  ),
                  child.stdin
                ).pipe(Effect.either);
          const drain: Effect.Effect<void, PlatformError> =
            stdout === undefined ? Effect.void : Stream.run(child.stdout, fs.sink(stdout));

          const [fed, , exitCode] = yield* Effect.all([feed, drain, child.exitCode], {
            concurrency: "unbounded",
          });
          const readError = yield* Ref.get(unread);
          if (Option.isSome(readError)) {
            return yield* Effect.fail(readError.value);
          }
          // A broken pipe after the engine exits is left to its exit status
          if (Either.isLeft(fed) && exitCode === 0) {
            return yield* Effect.fail(fed.left);
          }
          return exitCode;
        })
      );
    };

    const run = (
      engine: string,
      program: string,
      args: readonly string[],
      options: RunOptions = {}
    ): Effect.Effect<void, EngineError> => {
      const commandLine = [program, ...args].join(" ") + (options.stdout ? ` > ${options.stdout}` : "");

      // Standard input arrives over a socket, which `/dev/stdin` cannot be
      // opened on; the relay hands the engine an ordinary pipe.
      let command = (
        options.stdin === undefined
          ? Command.make(program, ...args)
          : Command.make(...STDIN_RELAY, program, ...args)
      ).pipe(Command.stderr("inherit"));
      if (options.cwd !== undefined) {
        command = Command.workingDirectory(command, options.cwd);
      }

      return Effect.logDebug(`EXECUTING ${commandLine}`).pipe(
        Effect.zipRight(execute(command, options)),
        Effect.provideService(CommandExecutor.CommandExecutor, executor),
        Effect.mapError((error) => EngineError.failedToRun(engine, commandLine, error)),
        Effect.flatMap((exitCode) =>
          exitCode === 0
            ? Effect.void
            : Effect.fail(EngineError.exited(engine, commandLine, exitCode))
        )
      );
    };

    const isExecutableFile = (path: string): Effect.Effect<boolean> =>
      fs.stat(path).pipe(
        Effect.map((info) => info.type === "File"),
        Effect.orElseSucceed(() => false)
      );

    const locateCounter = (
      configured: string | undefined
    ): Effect.Effect<string, MissingInputError> =>
      Effect.gen(function* () {
        const name = configured ?? DEFAULT_COUNTER;
        const candidates = name.includes("/")
          ? [name]
          : searchPath
              .split(":")
              .filter((dir) => dir.length > 0)
              .map((dir) => join(dir, name));

        for (const candidate of candidates) {
          if (yield* isExecutableFile(candidate)) {
            return candidate;
          }
        }
        return yield* Effect.fail(
          new MissingInputError(
            `Counting engine "${name}" not found`,
            name,
            name.includes("/") ? undefined : `Searched PATH: ${searchPath}`
          )
        );
      });

    const memoryFlag = (inMemory: boolean): string[] => (inMemory ? ["-M"] : []);

    const engine: ExternalEngineShape = {
      locateCounter,

      count: (request) =>
        run(
          "count",
          request.program,
          [
            "count",
            "-m", String(request.kmerLen),
            "-s", String(request.hashSize),
            "-C",
            "-t", String(request.threads),
            "-o", request.outputPrefix,
            STDIN_PATH,
          ],
          { stdin: request.input }
        ),

      merge: (request) =>
        run("merge", request.program, ["merge", "-o", request.output, ...request.shards]),

      reduce: (request) =>
        run("reduce", programs.shrink, [
          "-d", request.input,
          "-o", request.output,
          "-n", String(request.records),
        ]),

      sort: (request) =>
        run("sort", programs.sort, [
          "-z",
          ...memoryFlag(request.inMemory),
          "-t", String(request.threads),
          "-n", String(request.minimizerLen),
          "-d", request.input,
          "-o", request.output,
          "-i", request.index,
        ]),

      buildTaxDB: (request) =>
        run("buildTaxDB", programs.buildTaxDB, [request.namesDump, request.nodesDump], {
          stdout: request.output,
        }),

      setLCAs: (request) =>
        run(
          "setLCAs",
          programs.setLCAs,
          [
            ...memoryFlag(request.inMemory),
            "-x",
            "-d", request.sortedTable,
            ...(request.uidMap !== undefined ? ["-I", request.uidMap] : []),
            "-o", request.output,
            "-i", request.index,
            "-v",
            "-b", request.taxDB,
            ...request.taxidFlags,
            "-t", String(request.threads),
            "-m", request.taxonMap,
            "-c", request.kmerCounts,
            "-F", STDIN_PATH,
          ],
          { stdin: request.input, stdout: request.stdout }
        ),

      classify: (request) =>
        run(
          "classify",
          programs.classifier,
          [
            "--db", request.databaseDir,
            "--report-file", request.reportFile,
            "--threads", String(request.threads),
            "--fasta-input", STDIN_PATH,
          ],
          { stdin: request.input, stdout: request.output }
        ),

      fetchTaxonomy: (request) => {
        const archive = request.url.substring(request.url.lastIndexOf("/") + 1);
        return fs.makeDirectory(request.taxonomyDir, { recursive: true }).pipe(
          Effect.mapError((error) =>
            EngineError.failedToRun("fetchTaxonomy", `mkdir -p ${request.taxonomyDir}`, error)
          ),
          Effect.zipRight(
            run("fetchTaxonomy", programs.download, [request.url], { cwd: request.taxonomyDir })
          ),
          Effect.zipRight(
            run("fetchTaxonomy", programs.unpack, ["zxf", archive], { cwd: request.taxonomyDir })
          )
        );
      },
    };

    return engine;
  });
}

/**
 * External engine layer running the default programs
 */
export const ExternalEngineLive: Layer.Layer<
  ExternalEngine,
  never,
  CommandExecutor.CommandExecutor | FileSystem.FileSystem
> = Layer.effect(ExternalEngine, makeExternalEngine());

/**
 * External engine layer with custom program names
 */
export function externalEngineLayer(
  programs: Partial<EnginePrograms>
): Layer.Layer<ExternalEngine, never, CommandExecutor.CommandExecutor | FileSystem.FileSystem> {
  return Layer.effect(ExternalEngine, makeExternalEngine({ ...DEFAULT_PROGRAMS, ...programs }));
}
