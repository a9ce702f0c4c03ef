/**
 * Command-line interface
 *
 * ```
 * flash-batch -n SAMPLE -r1 R1.fastq.gz -r2 R2.fastq.gz -o OUT_DIR
 * flash-batch -f samples.tsv -o OUT_DIR
 * ```
 *
 * Exit codes: 0 success, 1 a sample failed, 2 usage or samples file error,
 * 130 interrupted.
 */

import { Command, Options, ValidationError } from "@effect/cli";
import { Cause, Config, Console, Effect, Exit, Logger, LogLevel, Option } from "effect";
import { isConfigurationFailure, MergerError } from "./errors";
import { DEFAULT_FLASH_EXECUTABLE, FlashService } from "./flash/service";
import { mergeSamples } from "./operations/merge";
import { resolveSamples } from "./operations/resolve";

export const VERSION = "1.0.0";

export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_INTERRUPTED = 130;

const DESCRIPTION = [
  "Merge paired-end reads with FLASH (default parameters) for one sample or a list of samples,",
  "and collect FLASH's statistics in <out-dir>/merger_stats.tsv.",
  "",
  "The samples file is tab-delimited with the header: sample_name<TAB>read1<TAB>read2",
  "sample_name must be alphanumeric (avoid &, $, @, -, %, * and spaces).",
  "",
  "FLASH: Magoc T, Salzberg SL. FLASH: fast length adjustment of short reads to improve",
  "genome assemblies. Bioinformatics. 2011;27(21):2957-63. doi:10.1093/bioinformatics/btr507",
].join("\n");

// Two-letter short flags that the option parser would otherwise read as --r1/--r2
const SHORT_FLAG_ALIASES: Readonly<Record<string, string>> = {
  "-r1": "--read1",
  "-r2": "--read2",
};

/**
 * Rewrite `-r1`/`-r2` to their long forms
 */
export function normalizeArgv(argv: readonly string[]): string[] {
  return argv.map((arg) => SHORT_FLAG_ALIASES[arg] ?? arg);
}

// =============================================================================
// OPTIONS
// =============================================================================

const sampleName = Options.text("sample-name").pipe(
  Options.withAlias("n"),
  Options.withDescription("Sample name, used for <out-dir>/<sample-name>.fastq"),
  Options.optional
);

const read1 = Options.text("read1").pipe(
  Options.withDescription("Read 1 FASTQ(.gz) file (short form: -r1)"),
  Options.optional
);

const read2 = Options.text("read2").pipe(
  Options.withDescription("Read 2 FASTQ(.gz) file (short form: -r2)"),
  Options.optional
);

const samplesFile = Options.text("samples-file").pipe(
  Options.withAlias("f"),
  Options.withDescription("Tab-delimited samples file with sample_name, read1 and read2 columns"),
  Options.optional
);

const outDir = Options.text("out-dir").pipe(
  Options.withAlias("o"),
  Options.withDescription("Output directory, created if absent")
);

const keepIntermediates = Options.boolean("keep-intermediates").pipe(
  Options.withDescription("Keep FLASH's working directory (<out-dir>/<sample-name>.flash)")
);

const flashPath = Options.text("flash-path").pipe(
  Options.withDescription("FLASH executable (default: $FLASH_PATH, then flash on PATH)"),
  Options.withFallbackConfig(
    Config.string("FLASH_PATH").pipe(Config.withDefault(DEFAULT_FLASH_EXECUTABLE))
  )
);

const verbose = Options.boolean("verbose").pipe(
  Options.withDescription("Also log FLASH command lines and working directories")
);

// =============================================================================
// COMMAND
// =============================================================================

export const command = Command.make(
  "flash-batch",
  { sampleName, read1, read2, samplesFile, outDir, keepIntermediates, flashPath, verbose },
  (options) =>
    Effect.gen(function* () {
      const samples = yield* resolveSamples({
        sampleName: Option.getOrUndefined(options.sampleName),
        read1: Option.getOrUndefined(options.read1),
        read2: Option.getOrUndefined(options.read2),
        samplesFile: Option.getOrUndefined(options.samplesFile),
      });
      yield* mergeSamples(samples, {
        outDir: options.outDir,
        keepIntermediates: options.keepIntermediates,
      });
    }).pipe(
      Effect.provide(FlashService.layer({ executable: options.flashPath })),
      Logger.withMinimumLogLevel(options.verbose ? LogLevel.Debug : LogLevel.Info)
    )
).pipe(Command.withDescription(DESCRIPTION));

const run = Command.run(command, { name: "flash-batch", version: VERSION });

/**
 * Print a failure once: merger errors as text, anything unexpected through
 * the logger. Option parsing errors are printed by the CLI library itself.
 */
const reportFailure = <E>(cause: Cause.Cause<E>): Effect.Effect<void> =>
  Option.match(Cause.failureOption(cause), {
    onNone: () => (Cause.isInterruptedOnly(cause) ? Effect.void : Effect.logError(cause)),
    onSome: (error) => {
      if (error instanceof MergerError) {
        const hint = isConfigurationFailure(error) ? "\nRun with --help for usage." : "";
        return Console.error(`${error.toString()}${hint}`);
      }
      return ValidationError.isValidationError(error) ? Effect.void : Effect.logError(cause);
    },
  });

/**
 * Parse `argv` (including the node and script entries) and run the merger
 */
export const cli = (argv: readonly string[]) =>
  run(normalizeArgv(argv)).pipe(Effect.tapErrorCause(reportFailure));

/**
 * Process exit code for a failure value
 */
export function exitCodeFor(error: unknown): number {
  if (isConfigurationFailure(error) || ValidationError.isValidationError(error)) {
    return EXIT_USAGE;
  }
  return EXIT_FAILURE;
}

/**
 * Teardown for `NodeRuntime.runMain` mapping the final exit to a status code
 */
export function teardown<A, E>(exit: Exit.Exit<A, E>, onExit: (code: number) => void): void {
  if (Exit.isSuccess(exit)) {
    onExit(0);
  } else if (Cause.isInterruptedOnly(exit.cause)) {
    onExit(EXIT_INTERRUPTED);
  } else {
    onExit(
      Option.match(Cause.failureOption(exit.cause), {
        onNone: () => EXIT_FAILURE,
        onSome: exitCodeFor,
      })
    );
  }
}
