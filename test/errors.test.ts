import { describe, expect, test } from "vitest";
import {
  BudgetError,
  BuildError,
  ConfigurationError,
  EngineError,
  FileError,
  MissingInputError,
} from "../src/errors";

describe("Build errors", () => {
  test("all errors extend BuildError and carry a code", () => {
    const errors: Array<[BuildError, string]> = [
      [new ConfigurationError("bad", "KRAKEN_KMER_LEN"), "CONFIGURATION_ERROR"],
      [new MissingInputError("gone", "/db"), "FATAL_INPUT"],
      [BudgetError.indexTooLarge(2n ** 33n, 2n ** 30n), "FATAL_BUDGET"],
      [EngineError.exited("sort", "db_sort -z", 2), "ENGINE_FAILURE"],
      [new FileError("nope", "/db/taxDB", "read"), "FILE_ERROR"],
    ];
    for (const [error, code] of errors) {
      expect(error).toBeInstanceOf(BuildError);
      expect(error.code).toBe(code);
    }
  });

  test("ConfigurationError prefixes the setting name", () => {
    expect(new ConfigurationError("must be positive", "KRAKEN_THREAD_CT").message).toBe(
      "KRAKEN_THREAD_CT: must be positive"
    );
  });

  test("BudgetError reports the index size in GB", () => {
    const error = BudgetError.indexTooLarge(8_589_934_608n, 1_073_741n);
    expect(error.message).toBe(
      "Maximum database size too small - index alone needs 8.00 GB. Aborting reduction."
    );
    expect(error.context).toBe("index: 8589934608 bytes, budget: 1073741 bytes");
  });

  test("EngineError includes the command line and exit code", () => {
    const error = EngineError.exited("merge", "jellyfish merge -o database.jdb.tmp", 3);
    expect(error.toString()).toBe(
      "EngineError: merge exited with status 3\n" +
        "Context: Command: jellyfish merge -o database.jdb.tmp\n" +
        "Exit code: 3"
    );
  });

  test("EngineError.failedToRun keeps the underlying failure", () => {
    const cause = new Error("spawn db_sort ENOENT");
    const error = EngineError.failedToRun("sort", "db_sort -z", cause);

    expect(error.message).toBe("sort could not be run: spawn db_sort ENOENT");
    expect(error.failure).toBe(cause);
    expect(error.exitCode).toBeUndefined();
  });

  test("FileError suggests a fix for common system errors", () => {
    const error = FileError.fromSystemError("write", "/db/taxDB.tmp", new Error("ENOSPC: no space left on device"));
    expect(error.message).toBe(
      "write /db/taxDB.tmp failed: ENOSPC: no space left on device. " +
        "Free up disk space; partially written .tmp files can be deleted safely"
    );
  });

  test("MissingInputError.emptyLibrary names the extensions", () => {
    const error = MissingInputError.emptyLibrary("/db/library", [".fna", ".fa"]);
    expect(error.message).toBe("No fna, fa files found in /db/library");
    expect(error.context).toBe("Expected at least one file ending in .fna | .fa");
  });
});
