/**
 * Moves FLASH's merged reads into place and clears its working directory
 *
 * @module flash/collector
 */

import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { FileError, OutputCollectionError } from "../errors";
import type { MergeResult } from "../types";

/**
 * Rename the merged-reads file to its final location
 *
 * An existing file at `destination` is replaced.
 *
 * @returns The destination path
 */
export const collectMergedReads = (
  sampleName: string,
  result: MergeResult,
  destination: string
): Effect.Effect<string, OutputCollectionError | FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    const present = yield* fs
      .exists(result.mergedFile)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("stat", result.mergedFile, error)));
    if (!present) {
      return yield* Effect.fail(
        new OutputCollectionError(
          `FLASH reported success but wrote no merged reads for sample ${sampleName}`,
          sampleName,
          result.mergedFile
        )
      );
    }

    yield* fs
      .rename(result.mergedFile, destination)
      .pipe(
        Effect.mapError((error) => FileError.fromSystemError("rename", result.mergedFile, error))
      );
    return destination;
  });

/**
 * Delete a sample's working directory with FLASH's remaining outputs
 * (`.notCombined_1.fastq`, `.notCombined_2.fastq`, `.hist`, `.histogram`,
 * `.flash.log`)
 */
export const removeIntermediates = (
  workDir: string
): Effect.Effect<void, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs
      .remove(workDir, { recursive: true })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("remove", workDir, error)));
  });
