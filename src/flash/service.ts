/**
 * Effect service wrapping the FLASH executable
 *
 * The rest of the merger only sees {@link FlashServiceShape}: hand it two
 * read files, a directory and a prefix, and get back where the merged reads
 * landed plus FLASH's statistics report. `FlashService.layer` runs the real
 * binary through `@effect/platform`'s `Command`; tests swap in a layer of
 * their own.
 *
 * @example Running FLASH for one sample
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const flash = yield* FlashService;
 *   return yield* flash.merge({
 *     sampleName: "S1",
 *     read1: "S1_R1.fastq.gz",
 *     read2: "S1_R2.fastq.gz",
 *     outputDirectory: "out/S1.flash",
 *     outputPrefix: "S1",
 *   });
 * });
 *
 * await Effect.runPromise(
 *   program.pipe(Effect.provide(FlashService.layer()), Effect.provide(NodeContext.layer))
 * );
 * ```
 *
 * @module flash/service
 */

import { Command, CommandExecutor, FileSystem, Path } from "@effect/platform";
import { Context, Effect, Layer, Stream } from "effect";
import { FileError, FlashInvocationError } from "../errors";
import type { MergeRequest, MergeResult } from "../types";

/** Executable looked up on PATH when no other is configured */
export const DEFAULT_FLASH_EXECUTABLE = "flash";

/** Suffix FLASH gives its merged ("extended") reads */
export const MERGED_READS_SUFFIX = ".extendedFrags.fastq";

/** Suffix of the saved copy of FLASH's stdout */
export const FLASH_LOG_SUFFIX = ".flash.log";

// =============================================================================
// SERVICE SHAPE (Interface)
// =============================================================================

export interface FlashServiceShape {
  /**
   * Run FLASH once with its default parameters and wait for it to exit
   *
   * Fails with {@link FlashInvocationError} if the executable cannot be
   * started or exits non-zero.
   */
  readonly merge: (
    request: MergeRequest
  ) => Effect.Effect<MergeResult, FlashInvocationError | FileError>;
}

export interface FlashOptions {
  /** Path or name of the FLASH executable */
  readonly executable?: string;
}

// =============================================================================
// SERVICE TAG
// =============================================================================

export class FlashService extends Context.Tag("flash-batch/FlashService")<
  FlashService,
  FlashServiceShape
>() {
  /**
   * Layer that spawns the real FLASH executable
   */
  static layer(
    options: FlashOptions = {}
  ): Layer.Layer<
    FlashService,
    never,
    CommandExecutor.CommandExecutor | FileSystem.FileSystem | Path.Path
  > {
    return Layer.effect(
      FlashService,
      makeFlashService(options.executable ?? DEFAULT_FLASH_EXECUTABLE)
    );
  }
}

// =============================================================================
// IMPLEMENTATION
// =============================================================================

/**
 * Command-line arguments for one invocation; algorithmic options are left
 * at FLASH's defaults
 */
export function flashArguments(request: MergeRequest): string[] {
  return [
    request.read1,
    request.read2,
    "-d",
    request.outputDirectory,
    "-o",
    request.outputPrefix,
  ];
}

const collectText = <E>(stream: Stream.Stream<Uint8Array, E>): Effect.Effect<string, E> =>
  stream.pipe(Stream.decodeText(), Stream.mkString);

/**
 * Start a command and gather its exit code and both output streams
 */
const runCommand = (command: Command.Command) =>
  Effect.scoped(
    Effect.gen(function* () {
      const child = yield* Command.start(command);
      const [exitCode, stdout, stderr] = yield* Effect.all(
        [child.exitCode, collectText(child.stdout), collectText(child.stderr)],
        { concurrency: "unbounded" }
      );
      return { exitCode: Number(exitCode), stdout, stderr };
    })
  );

function makeFlashService(executable: string) {
  return Effect.gen(function* () {
    const executor = yield* CommandExecutor.CommandExecutor;
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;

    const merge = (request: MergeRequest): Effect.Effect<MergeResult, FlashInvocationError | FileError> =>
      Effect.gen(function* () {
        const args = flashArguments(request);
        yield* Effect.logDebug(`${executable} ${args.join(" ")}`);

        const { exitCode, stdout, stderr } = yield* runCommand(
          Command.make(executable, ...args)
        ).pipe(
          Effect.provideService(CommandExecutor.CommandExecutor, executor),
          Effect.mapError((error) =>
            FlashInvocationError.forSpawnFailure(request.sampleName, executable, error)
          )
        );

        if (exitCode !== 0) {
          return yield* Effect.fail(
            FlashInvocationError.forExitCode(request.sampleName, executable, exitCode, stderr)
          );
        }

        const logFile = path.join(
          request.outputDirectory,
          `${request.outputPrefix}${FLASH_LOG_SUFFIX}`
        );
        yield* fs
          .writeFileString(logFile, stdout)
          .pipe(Effect.mapError((error) => FileError.fromSystemError("write", logFile, error)));

        return {
          mergedFile: path.join(
            request.outputDirectory,
            `${request.outputPrefix}${MERGED_READS_SUFFIX}`
          ),
          statsReport: stdout,
          logFile,
        };
      });

    return { merge } satisfies FlashServiceShape;
  });
}
