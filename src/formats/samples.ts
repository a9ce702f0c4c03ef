/**
 * @module formats/samples
 * @description Tab-delimited samples file reader
 *
 * A samples file has a header row naming at least `sample_name`, `read1` and
 * `read2` (any order, any extra columns) followed by one row per sample:
 *
 * ```
 * sample_name	read1	read2
 * S1	S1_R1.fastq.gz	S1_R2.fastq.gz
 * ```
 *
 * Header names are matched after trimming and lower-casing.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { describeSystemError, SamplesFileError } from "../errors";
import type { Sample } from "../types";
import { REQUIRED_SAMPLE_COLUMNS, SampleSchema } from "../types";

const DELIMITER = "\t";

/**
 * Strip a leading UTF-8 byte order mark
 */
export function removeBOM(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Map each required column to its index in the header row
 *
 * @throws {SamplesFileError} If any required column is absent
 */
function locateColumns(
  header: string,
  filePath: string
): Record<(typeof REQUIRED_SAMPLE_COLUMNS)[number], number> {
  const names = header.split(DELIMITER).map((name) => name.trim().toLowerCase());
  const missing = REQUIRED_SAMPLE_COLUMNS.filter((column) => !names.includes(column));
  if (missing.length > 0) {
    throw SamplesFileError.forMissingColumns(filePath, missing);
  }

  return {
    sample_name: names.indexOf("sample_name"),
    read1: names.indexOf("read1"),
    read2: names.indexOf("read2"),
  };
}

/**
 * Parse samples file content into samples, in file order
 *
 * Blank lines are skipped. Every row must give a valid sample name and both
 * read paths, and sample names must be unique.
 *
 * @param content - Full text of the samples file
 * @param filePath - Path used in error messages
 * @throws {SamplesFileError} On a malformed header or row, a duplicate name, or no rows
 */
export function parseSamplesTable(content: string, filePath: string): Sample[] {
  const lines = removeBOM(content).split(/\r?\n/);
  const headerIndex = lines.findIndex((line) => line.trim() !== "");
  const header = lines[headerIndex];
  if (header === undefined) {
    throw new SamplesFileError("Samples file is empty", filePath);
  }

  const columns = locateColumns(header, filePath);
  const samples: Sample[] = [];
  const seen = new Map<string, number>();

  lines.forEach((line, index) => {
    if (index <= headerIndex || line.trim() === "") return;

    const lineNumber = index + 1;
    const fields = line.split(DELIMITER);
    const candidate = {
      name: (fields[columns.sample_name] ?? "").trim(),
      read1: (fields[columns.read1] ?? "").trim(),
      read2: (fields[columns.read2] ?? "").trim(),
    };

    const validation = SampleSchema(candidate);
    if (validation instanceof type.errors) {
      throw new SamplesFileError(
        `Invalid sample "${candidate.name}": ${validation.summary}`,
        filePath,
        lineNumber,
        line
      );
    }

    const firstSeen = seen.get(validation.name);
    if (firstSeen !== undefined) {
      throw new SamplesFileError(
        `Duplicate sample name "${validation.name}" (first used on line ${firstSeen})`,
        filePath,
        lineNumber,
        line
      );
    }
    seen.set(validation.name, lineNumber);
    samples.push(validation);
  });

  if (samples.length === 0) {
    throw new SamplesFileError("Samples file contains no samples", filePath);
  }

  return samples;
}

/**
 * Read and parse a samples file
 */
export const readSamplesFile = (
  filePath: string
): Effect.Effect<Sample[], SamplesFileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const unreadable = (error: unknown) =>
      new SamplesFileError(
        `Could not read samples file ${filePath}: ${describeSystemError(error)}`,
        filePath
      );

    const present = yield* fs.exists(filePath).pipe(Effect.mapError(unreadable));
    if (!present) {
      return yield* Effect.fail(
        new SamplesFileError(`The provided samples file does not exist: ${filePath}`, filePath)
      );
    }

    const content = yield* fs.readFileString(filePath).pipe(Effect.mapError(unreadable));

    return yield* Effect.try({
      try: () => parseSamplesTable(content, filePath),
      catch: (error) =>
        error instanceof SamplesFileError
          ? error
          : new SamplesFileError(
              error instanceof Error ? error.message : String(error),
              filePath
            ),
    });
  });
