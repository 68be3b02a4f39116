/**
 * Tests for the live engine layer
 *
 * Uses stand-in programs from the base system (true, false, echo) and
 * small shell scripts in place of the real engines.
 */

import { NodeContext } from "@effect/platform-node";
import { Effect, Either, Layer, Logger, LogLevel } from "effect";
import { chmodSync, readFileSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { DEFAULT_PROGRAMS, externalEngineLayer, makeExternalEngine } from "../../src/engines/commands";
import { ExternalEngine, type ExternalEngineShape, type SortRequest } from "../../src/engines/service";
import { EngineError, MissingInputError } from "../../src/errors";
import { sequenceStream } from "../../src/library/sequence-stream";
import type { LibraryManifest } from "../../src/types";
import { scratchDir } from "../utils/platform";

function withEngine<A, E>(
  layer: Layer.Layer<ExternalEngine, never, NodeContext.NodeContext>,
  use: (engine: ExternalEngineShape) => Effect.Effect<A, E, NodeContext.NodeContext>
): Promise<Either.Either<A, E>> {
  return Effect.runPromise(
    Effect.either(Effect.flatMap(ExternalEngine, use)).pipe(
      Logger.withMinimumLogLevel(LogLevel.None),
      Effect.provide(layer),
      Effect.provide(NodeContext.layer)
    )
  );
}

/** Prints the file named by its last argument */
const CAT_LAST = '#!/bin/sh\nfor arg in "$@"; do last="$arg"; done\nexec cat "$last"\n';

/** Copies its last argument to `<-o value>_0`, like a counter writing one shard */
const COUNT_TO_SHARD =
  '#!/bin/sh\nwhile [ $# -gt 1 ]; do\n  [ "$1" = "-o" ] && out="$2"\n  shift\ndone\ncat "$1" > "${out}_0"\n';

/** Reads its last argument, then exits with status 3 */
const READ_THEN_FAIL = '#!/bin/sh\nfor arg in "$@"; do last="$arg"; done\ncat "$last" > /dev/null\nexit 3\n';

function script(dir: string, name: string, body: string): string {
  const path = join(dir, name);
  writeFileSync(path, body);
  chmodSync(path, 0o755);
  return path;
}

const SORT: SortRequest = {
  input: "in.jdb",
  output: "out.kdb",
  index: "out.idx",
  minimizerLen: 15,
  threads: 2,
  inMemory: true,
};

describe("ExternalEngineLive", () => {
  let dir: string;

  beforeEach(() => {
    dir = scratchDir();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe("Exit status", () => {
    test("should succeed when the program exits with status 0", async () => {
      const result = await withEngine(externalEngineLayer({ sort: "true" }), (engine) =>
        engine.sort(SORT)
      );
      expect(Either.isRight(result)).toBe(true);
    });

    test("should fail with the command line on a non-zero exit", async () => {
      const result = await withEngine(externalEngineLayer({ sort: "false" }), (engine) =>
        engine.sort(SORT)
      );

      expect(Either.isLeft(result)).toBe(true);
      if (Either.isLeft(result)) {
        expect(result.left).toBeInstanceOf(EngineError);
        expect(result.left.message).toBe("sort exited with status 1");
        expect(result.left.exitCode).toBe(1);
        expect(result.left.commandLine).toBe(
          "false -z -M -t 2 -n 15 -d in.jdb -o out.kdb -i out.idx"
        );
      }
    });

    test("should omit the in-memory flag when working on disk", async () => {
      const result = await withEngine(externalEngineLayer({ sort: "false" }), (engine) =>
        engine.sort({ ...SORT, inMemory: false })
      );

      expect(Either.isLeft(result)).toBe(true);
      if (Either.isLeft(result)) {
        expect(result.left.commandLine).toBe("false -z -t 2 -n 15 -d in.jdb -o out.kdb -i out.idx");
      }
    });

    test("should fail when the program cannot be started", async () => {
      const result = await withEngine(
        externalEngineLayer({ shrink: join(dir, "no-such-program") }),
        (engine) => engine.reduce({ input: "a", output: "b", records: 10n })
      );

      expect(Either.isLeft(result)).toBe(true);
      if (Either.isLeft(result)) {
        expect(result.left).toBeInstanceOf(EngineError);
        expect(result.left.exitCode).toBeUndefined();
        expect(result.left.engine).toBe("reduce");
      }
    });
  });

  describe("Standard output capture", () => {
    test("should stream standard output into the requested file", async () => {
      const output = join(dir, "taxDB.unsorted");
      const result = await withEngine(externalEngineLayer({ buildTaxDB: "echo" }), (engine) =>
        engine.buildTaxDB({ namesDump: "names.dmp", nodesDump: "nodes.dmp", output })
      );

      expect(Either.isRight(result)).toBe(true);
      expect(readFileSync(output, "utf8")).toBe("names.dmp nodes.dmp\n");
    });
  });

  describe("Standard input", () => {
    let manifest: LibraryManifest;

    beforeEach(() => {
      writeFileSync(join(dir, "a.fna"), ">a\nACGT\n");
      writeFileSync(join(dir, "b.fa"), ">b\nGG\n");
      manifest = {
        path: join(dir, "library-files.txt"),
        files: [join(dir, "b.fa"), join(dir, "a.fna")],
        cached: false,
      };
    });

    const classifyRequest = (input: LibraryManifest) =>
      Effect.map(sequenceStream(input), (stream) => ({
        databaseDir: dir,
        reportFile: join(dir, "db.report"),
        output: join(dir, "db.kraken"),
        threads: 1,
        input: stream,
      }));

    test("should hand the classifier the library as a readable /dev/stdin", async () => {
      const classifier = script(dir, "classifier", CAT_LAST);
      const result = await withEngine(externalEngineLayer({ classifier }), (engine) =>
        Effect.flatMap(classifyRequest(manifest), engine.classify)
      );

      expect(Either.isRight(result)).toBe(true);
      expect(readFileSync(join(dir, "db.kraken"), "utf8")).toBe(">b\nGG\n>a\nACGT\n");
    });

    test("should feed the counting engine the library in manifest order", async () => {
      const counter = script(dir, "counter", COUNT_TO_SHARD);
      const prefix = join(dir, "database");
      const result = await withEngine(externalEngineLayer({}), (engine) =>
        Effect.flatMap(sequenceStream(manifest), (input) =>
          engine.count({
            program: counter,
            kmerLen: 31,
            hashSize: 100n,
            threads: 1,
            outputPrefix: prefix,
            input,
          })
        )
      );

      expect(Either.isRight(result)).toBe(true);
      expect(readFileSync(`${prefix}_0`, "utf8")).toBe(">b\nGG\n>a\nACGT\n");
    });

    test("should capture standard output of a stdin-fed engine", async () => {
      const setLCAs = script(dir, "set_lcas", CAT_LAST);
      const augmented = join(dir, "seqid2taxid-plus.map");
      const result = await withEngine(externalEngineLayer({ setLCAs }), (engine) =>
        Effect.flatMap(sequenceStream(manifest), (input) =>
          engine.setLCAs({
            sortedTable: "database0.kdb",
            index: "database.idx",
            taxDB: "taxDB",
            taxonMap: "seqid2taxid.map",
            output: "database.kdb",
            kmerCounts: "database.kmer_count",
            threads: 1,
            inMemory: false,
            taxidFlags: ["-a"],
            stdout: augmented,
            input,
          })
        )
      );

      expect(Either.isRight(result)).toBe(true);
      expect(readFileSync(augmented, "utf8")).toBe(">b\nGG\n>a\nACGT\n");
    });

    test("should report the engine's exit status after it read its input", async () => {
      const classifier = script(dir, "classifier", READ_THEN_FAIL);
      const result = await withEngine(externalEngineLayer({ classifier }), (engine) =>
        Effect.flatMap(classifyRequest(manifest), engine.classify)
      );

      expect(Either.isLeft(result)).toBe(true);
      if (Either.isLeft(result)) {
        expect(result.left).toBeInstanceOf(EngineError);
        expect(result.left.exitCode).toBe(3);
        expect(result.left.commandLine).toBe(
          `${classifier} --db ${dir} --report-file ${join(dir, "db.report")} --threads 1 ` +
            `--fasta-input /dev/stdin > ${join(dir, "db.kraken")}`
        );
      }
    });

    test("should fail when a library file cannot be read", async () => {
      const classifier = script(dir, "classifier", CAT_LAST);
      const missing = { ...manifest, files: [join(dir, "b.fa"), join(dir, "gone.fna")] };
      const result = await withEngine(externalEngineLayer({ classifier }), (engine) =>
        Effect.flatMap(classifyRequest(missing), engine.classify)
      );

      expect(Either.isLeft(result)).toBe(true);
      if (Either.isLeft(result)) {
        expect(result.left).toBeInstanceOf(EngineError);
        expect(result.left.engine).toBe("classify");
        expect(result.left.exitCode).toBeUndefined();
      }
    });
  });

  describe("locateCounter", () => {
    const layerFor = (searchPath: string) =>
      Layer.effect(ExternalEngine, makeExternalEngine(DEFAULT_PROGRAMS, searchPath));

    test("should find the default counter on the search path", async () => {
      const counter = join(dir, "jellyfish");
      writeFileSync(counter, "#!/bin/sh\n");
      chmodSync(counter, 0o755);

      const result = await withEngine(layerFor(`/nonexistent:${dir}`), (engine) =>
        engine.locateCounter(undefined)
      );
      expect(Either.getOrNull(result)).toBe(counter);
    });

    test("should search for a configured bare name", async () => {
      const counter = join(dir, "jellyfish2");
      writeFileSync(counter, "#!/bin/sh\n");

      const result = await withEngine(layerFor(dir), (engine) => engine.locateCounter("jellyfish2"));
      expect(Either.getOrNull(result)).toBe(counter);
    });

    test("should use a configured path as given", async () => {
      const counter = join(dir, "custom-counter");
      writeFileSync(counter, "#!/bin/sh\n");

      const result = await withEngine(layerFor(""), (engine) => engine.locateCounter(counter));
      expect(Either.getOrNull(result)).toBe(counter);
    });

    test("should fail when the counter is not found", async () => {
      const result = await withEngine(layerFor(dir), (engine) => engine.locateCounter(undefined));

      expect(Either.isLeft(result)).toBe(true);
      if (Either.isLeft(result)) {
        expect(result.left).toBeInstanceOf(MissingInputError);
        expect(result.left.message).toBe('Counting engine "jellyfish" not found');
      }
    });
  });
});
