/**
 * Error types for batch read merging
 *
 * Every failure the merger can report is a subclass of {@link MergerError}.
 * Errors travel through the Effect error channel, so each class is a plain
 * `Error` with a stable `code` that callers can branch on.
 */

/**
 * Base error class for all merger errors
 */
export class MergerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "MergerError";
  }

  /**
   * Render the error with its line number and context, if any
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Bad, missing or conflicting command-line arguments
 */
export class UsageError extends MergerError {
  constructor(message: string, context?: string) {
    super(message, "USAGE_ERROR", undefined, context);
    this.name = "UsageError";
  }
}

/**
 * Samples file that cannot be used: missing, malformed header, bad rows
 */
export class SamplesFileError extends MergerError {
  constructor(
    message: string,
    public readonly filePath: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "SAMPLES_FILE_ERROR", lineNumber, context);
    this.name = "SamplesFileError";
  }

  /**
   * Header row lacks one or more required columns
   */
  static forMissingColumns(filePath: string, missing: readonly string[]): SamplesFileError {
    return new SamplesFileError(
      `Samples file is missing the following required columns: ${missing.join(", ")}`,
      filePath,
      1,
      "Expected a tab-delimited header with sample_name, read1 and read2"
    );
  }
}

/**
 * FLASH could not be started or exited with a non-zero status
 */
export class FlashInvocationError extends MergerError {
  constructor(
    message: string,
    public readonly sampleName: string,
    public readonly exitCode?: number,
    public readonly stderr?: string
  ) {
    super(message, "FLASH_ERROR", undefined, stderr?.trim());
    this.name = "FlashInvocationError";
  }

  static forExitCode(
    sampleName: string,
    executable: string,
    exitCode: number,
    stderr: string
  ): FlashInvocationError {
    return new FlashInvocationError(
      `Error running ${executable} for sample ${sampleName}: exited with code ${exitCode}`,
      sampleName,
      exitCode,
      stderr
    );
  }

  static forSpawnFailure(
    sampleName: string,
    executable: string,
    systemError: unknown
  ): FlashInvocationError {
    const errorMessage = describeSystemError(systemError);
    return new FlashInvocationError(
      `Could not start ${executable} for sample ${sampleName}: ${errorMessage}. ` +
        "Check that FLASH is installed and on PATH, or pass --flash-path",
      sampleName
    );
  }
}

/**
 * FLASH exited cleanly but its merged-reads file is not where expected
 */
export class OutputCollectionError extends MergerError {
  constructor(
    message: string,
    public readonly sampleName: string,
    public readonly expectedPath: string
  ) {
    super(message, "OUTPUT_ERROR", undefined, `Expected file: ${expectedPath}`);
    this.name = "OutputCollectionError";
  }
}

/**
 * FLASH statistics report did not have the expected layout
 */
export class StatsParseError extends MergerError {
  constructor(
    message: string,
    public readonly sampleName: string,
    public readonly missingFields: readonly string[] = []
  ) {
    super(message, "STATS_PARSE_ERROR");
    this.name = "StatsParseError";
  }
}

/**
 * File system operation failures
 */
export class FileError extends MergerError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "mkdir" | "rename" | "remove",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
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
    const errorMessage = describeSystemError(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed for ${filePath}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("notfound")) {
      return "Check that the path is correct and exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check permissions on the output directory";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different output directory";
    }
    if (msg.includes("exdev")) {
      return "Output directory must be on the same file system as the working directory";
    }

    return undefined;
  }
}

/**
 * Message of a failure from Node or from `@effect/platform`
 *
 * Platform errors are tagged values rather than `Error` instances; their
 * `message` carries the underlying errno text (`ENOENT: no such file or
 * directory, ...`).
 */
export function describeSystemError(systemError: unknown): string {
  if (systemError instanceof Error) {
    return systemError.message;
  }
  if (
    typeof systemError === "object" &&
    systemError !== null &&
    "message" in systemError &&
    typeof systemError.message === "string"
  ) {
    return systemError.message;
  }
  return String(systemError);
}

/**
 * Errors that abort a single sample (and, by the batch policy, the run)
 */
export type SampleFailure =
  | FlashInvocationError
  | OutputCollectionError
  | StatsParseError
  | FileError;

/**
 * Errors detected before any sample is processed
 */
export type ConfigurationFailure = UsageError | SamplesFileError;

export const isConfigurationFailure = (error: unknown): error is ConfigurationFailure =>
  error instanceof UsageError || error instanceof SamplesFileError;
