/**
 * Sample descriptor resolution
 *
 * Turns the raw command-line selection into an ordered list of samples.
 * Exactly one mode applies per run:
 *
 * - single sample: `--sample-name`, `--read1` and `--read2` together
 * - batch: `--samples-file`
 *
 * Everything here runs before the output directory is touched.
 */

import type { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import type { SamplesFileError } from "../errors";
import { UsageError } from "../errors";
import { readSamplesFile } from "../formats/samples";
import type { Sample, SampleArguments } from "../types";
import { SampleSchema } from "../types";

const SINGLE_SAMPLE_FLAGS = [
  ["sampleName", "--sample-name"],
  ["read1", "--read1"],
  ["read2", "--read2"],
] as const;

/**
 * Validate a single sample given directly on the command line
 */
export const validateSample = (candidate: Sample): Effect.Effect<Sample, UsageError> => {
  const validation = SampleSchema(candidate);
  if (validation instanceof type.errors) {
    return Effect.fail(
      new UsageError(
        `Invalid sample "${candidate.name}": ${validation.summary}`,
        "sample_name must be alphanumeric (avoid &, $, @, -, %, * and spaces)"
      )
    );
  }
  return Effect.succeed(validation);
};

/**
 * Resolve the samples to merge, in input order
 *
 * @example
 * ```typescript
 * const samples = yield* resolveSamples({ samplesFile: "samples.tsv" });
 * ```
 */
export const resolveSamples = (
  args: SampleArguments
): Effect.Effect<Sample[], UsageError | SamplesFileError, FileSystem.FileSystem> => {
  const given = SINGLE_SAMPLE_FLAGS.filter(([key]) => args[key] !== undefined);
  const batch = args.samplesFile !== undefined;

  if (given.length > 0 && batch) {
    return Effect.fail(
      new UsageError(
        "Single-sample options (--sample-name, --read1, --read2) cannot be combined with --samples-file"
      )
    );
  }

  if (args.samplesFile !== undefined) {
    return readSamplesFile(args.samplesFile);
  }

  if (given.length === 0) {
    return Effect.fail(
      new UsageError(
        "Provide either --sample-name, --read1 and --read2 for one sample, or --samples-file for a batch"
      )
    );
  }

  const { sampleName, read1, read2 } = args;
  if (sampleName === undefined || read1 === undefined || read2 === undefined) {
    const missing = SINGLE_SAMPLE_FLAGS.filter(([key]) => args[key] === undefined).map(
      ([, flag]) => flag
    );
    return Effect.fail(
      new UsageError(
        `Single-sample mode requires --sample-name, --read1 and --read2; missing: ${missing.join(", ")}`
      )
    );
  }

  return validateSample({ name: sampleName, read1, read2 }).pipe(Effect.map((sample) => [sample]));
};
