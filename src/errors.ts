/**
 * Error handling for database builds
 *
 * Every failure a build can hit is terminal for the run. The classes here
 * carry enough context (paths, engine command lines, exit codes) for an
 * operator to diagnose the problem and re-invoke the build, which resumes
 * from the first unfinished stage.
 */

/**
 * Base error class for all build errors
 */
export class BuildError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: string
  ) {
    super(message);
    this.name = "BuildError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Invalid or inconsistent build configuration
 */
export class ConfigurationError extends BuildError {
  constructor(
    message: string,
    public readonly setting?: string,
    context?: string
  ) {
    super(setting !== undefined ? `${setting}: ${message}` : message, "CONFIGURATION_ERROR", context);
    this.name = "ConfigurationError";
  }
}

/**
 * A required input is missing: database directory, library files,
 * counting-engine binary, or an artifact an earlier stage should have left.
 */
export class MissingInputError extends BuildError {
  constructor(
    message: string,
    public readonly input: string,
    context?: string
  ) {
    super(message, "FATAL_INPUT", context);
    this.name = "MissingInputError";
  }

  static emptyLibrary(libraryDir: string, extensions: readonly string[]): MissingInputError {
    const patterns = extensions.map((ext) => ext.replace(/^\./, "")).join(", ");
    return new MissingInputError(
      `No ${patterns} files found in ${libraryDir}`,
      libraryDir,
      `Expected at least one file ending in ${extensions.join(" | ")}`
    );
  }
}

/**
 * The minimizer index alone exceeds the requested database size budget,
 * so no amount of k-mer truncation can satisfy it.
 */
export class BudgetError extends BuildError {
  constructor(
    message: string,
    public readonly indexBytes: bigint,
    public readonly budgetBytes: bigint
  ) {
    super(message, "FATAL_BUDGET", `index: ${indexBytes} bytes, budget: ${budgetBytes} bytes`);
    this.name = "BudgetError";
  }

  static indexTooLarge(indexBytes: bigint, budgetBytes: bigint): BudgetError {
    const gib = Number((indexBytes * 100n) / 2n ** 30n) / 100;
    return new BudgetError(
      `Maximum database size too small - index alone needs ${gib.toFixed(2)} GB. Aborting reduction.`,
      indexBytes,
      budgetBytes
    );
  }
}

/**
 * An external engine could not be started or exited with a failure status
 */
export class EngineError extends BuildError {
  constructor(
    message: string,
    public readonly engine: string,
    public readonly commandLine: string,
    public readonly exitCode?: number,
    public readonly failure?: unknown
  ) {
    super(message, "ENGINE_FAILURE", `Command: ${commandLine}`);
    this.name = "EngineError";
  }

  static exited(engine: string, commandLine: string, exitCode: number): EngineError {
    return new EngineError(
      `${engine} exited with status ${exitCode}`,
      engine,
      commandLine,
      exitCode
    );
  }

  static failedToRun(engine: string, commandLine: string, cause: unknown): EngineError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new EngineError(`${engine} could not be run: ${reason}`, engine, commandLine, undefined, cause);
  }

  override toString(): string {
    let msg = super.toString();
    if (this.exitCode !== undefined) {
      msg += `\nExit code: ${this.exitCode}`;
    }
    return msg;
  }
}

/**
 * File I/O errors with the failing path and operation
 */
export class FileError extends BuildError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "rename" | "remove" | "list",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} ${filePath} failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("notfound")) {
      return "Check that the path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions on the database directory";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space; partially written .tmp files can be deleted safely";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();
    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }
    return msg;
  }
}

/**
 * Any error a build stage may fail with
 */
export type StageError = ConfigurationError | MissingInputError | BudgetError | EngineError | FileError;
