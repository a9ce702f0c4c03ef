/**
 * Batch merging: one FLASH run per sample, then one statistics table
 *
 * Samples run strictly one after another. The first sample that fails stops
 * the batch; samples finished before it keep their merged reads, and their
 * rows are still written to `merger_stats.tsv` before the failure is
 * reported.
 */

import { FileSystem, Path } from "@effect/platform";
import { Effect, Either } from "effect";
import type { SampleFailure } from "../errors";
import { FileError, StatsParseError } from "../errors";
import { collectMergedReads, removeIntermediates } from "../flash/collector";
import { FlashService } from "../flash/service";
import { parseFlashReport } from "../formats/flash-report";
import { writeStatsTable } from "../formats/stats-table";
import type { MergedSample, MergeOptions, MergeSummary, Sample } from "../types";
import { STATS_FILE_NAME } from "../types";

/** Per-sample FLASH working directory, `<out_dir>/<name>.flash` */
export const workDirectoryFor = (path: Path.Path, outDir: string, sampleName: string): string =>
  path.join(outDir, `${sampleName}.flash`);

/**
 * Run FLASH for one sample, record its statistics and move its merged reads
 * to `<out_dir>/<name>.fastq`
 *
 * The report is parsed before the merged reads are moved, so a sample with
 * an unreadable report leaves no `.fastq` behind.
 */
export const mergeSample = (
  sample: Sample,
  options: MergeOptions
): Effect.Effect<MergedSample, SampleFailure, FlashService | FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const flash = yield* FlashService;
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;

    const workDir = workDirectoryFor(path, options.outDir, sample.name);
    // Outputs left by an earlier run must not be collected as this run's
    const stale = yield* fs
      .exists(workDir)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("stat", workDir, error)));
    if (stale) {
      yield* removeIntermediates(workDir);
    }
    yield* fs
      .makeDirectory(workDir, { recursive: true })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("mkdir", workDir, error)));

    yield* Effect.logInfo(`Running FLASH for sample ${sample.name}`);
    yield* Effect.logDebug(`Working directory: ${workDir}`);
    const result = yield* flash.merge({
      sampleName: sample.name,
      read1: sample.read1,
      read2: sample.read2,
      outputDirectory: workDir,
      outputPrefix: sample.name,
    });

    const row = yield* Effect.try({
      try: () => parseFlashReport(result.statsReport, sample.name),
      catch: (error) =>
        error instanceof StatsParseError
          ? error
          : new StatsParseError(String(error), sample.name),
    });

    const mergedFile = yield* collectMergedReads(
      sample.name,
      result,
      path.join(options.outDir, `${sample.name}.fastq`)
    );

    if (options.keepIntermediates !== true) {
      yield* removeIntermediates(workDir);
    }

    yield* Effect.logInfo(
      `sample_name: ${row.sampleName}, TotalPairs: ${row.totalPairs}, PercentCombined: ${row.percentCombined}`
    );
    return { sample, mergedFile, row };
  });

/**
 * Merge every sample in order and write `merger_stats.tsv`
 *
 * Creates the output directory if needed. Fails with the first sample's
 * error after writing the rows of the samples that completed.
 */
export const mergeSamples = (
  samples: readonly Sample[],
  options: MergeOptions
): Effect.Effect<MergeSummary, SampleFailure, FlashService | FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;

    yield* fs
      .makeDirectory(options.outDir, { recursive: true })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("mkdir", options.outDir, error)));

    const completed: MergedSample[] = [];
    let failure: SampleFailure | undefined;

    for (const sample of samples) {
      const outcome = yield* Effect.either(mergeSample(sample, options));
      if (Either.isLeft(outcome)) {
        failure = outcome.left;
        break;
      }
      completed.push(outcome.right);
    }

    const statsFile = yield* writeStatsTable(
      path.join(options.outDir, STATS_FILE_NAME),
      completed.map(({ row }) => row)
    );

    if (failure !== undefined) {
      yield* Effect.logError(
        `Stopped after ${completed.length} of ${samples.length} samples; statistics for completed samples are in ${statsFile}`
      );
      return yield* Effect.fail(failure);
    }

    yield* Effect.logInfo(`Merger is done! flash statistics are saved here: ${statsFile}`);
    return { samples: completed, statsFile };
  });
