/**
 * Core type definitions for batch read merging
 *
 * Plain interfaces describe the values that flow between the resolver, the
 * FLASH invoker, the output collector and the statistics aggregator. ArkType
 * schemas sit next to the interfaces they validate.
 */

import { type } from "arktype";

/**
 * One paired-end sample to merge
 */
export interface Sample {
  /** Letters, digits and underscore only; used as the output file stem */
  readonly name: string;
  readonly read1: string;
  readonly read2: string;
}

/**
 * One row of `merger_stats.tsv`, copied from FLASH's own report
 */
export interface StatRow {
  readonly sampleName: string;
  readonly totalPairs: number;
  readonly combinedPairs: number;
  readonly uncombinedPairs: number;
  /** Digits exactly as FLASH printed them, without the percent sign */
  readonly percentCombined: string;
}

/**
 * Raw command-line selection of samples, before mode resolution
 */
export interface SampleArguments {
  readonly sampleName?: string;
  readonly read1?: string;
  readonly read2?: string;
  readonly samplesFile?: string;
}

/**
 * Input to a single FLASH invocation
 */
export interface MergeRequest {
  readonly sampleName: string;
  readonly read1: string;
  readonly read2: string;
  /** Directory FLASH writes into (`-d`) */
  readonly outputDirectory: string;
  /** File name prefix for FLASH outputs (`-o`) */
  readonly outputPrefix: string;
}

/**
 * What a successful FLASH invocation leaves behind
 */
export interface MergeResult {
  /** `<prefix>.extendedFrags.fastq` inside the working directory */
  readonly mergedFile: string;
  /** FLASH's stdout, which carries the read combination statistics */
  readonly statsReport: string;
  /** Copy of the report saved next to FLASH's outputs */
  readonly logFile: string;
}

/**
 * Run-wide settings for the batch loop
 */
export interface MergeOptions {
  readonly outDir: string;
  /** Keep each sample's FLASH working directory instead of removing it */
  readonly keepIntermediates?: boolean;
}

/**
 * A sample that went all the way through the pipeline
 */
export interface MergedSample {
  readonly sample: Sample;
  readonly mergedFile: string;
  readonly row: StatRow;
}

/**
 * Outcome of a completed batch
 */
export interface MergeSummary {
  readonly samples: readonly MergedSample[];
  readonly statsFile: string;
}

/** Name of the aggregated statistics table inside the output directory */
export const STATS_FILE_NAME = "merger_stats.tsv";

/** Fixed header of the aggregated statistics table */
export const STATS_COLUMNS = [
  "sample_name",
  "TotalPairs",
  "CombinedPairs",
  "UncombinedPairs",
  "PercentCombined",
] as const;

/** Columns every samples file header must contain */
export const REQUIRED_SAMPLE_COLUMNS = ["sample_name", "read1", "read2"] as const;

// Validation schemas using ArkType

/**
 * Sample names become file names, so anything outside `[A-Za-z0-9_]`
 * (spaces, `&`, `$`, `@`, `-`, `%`, `*`, dots) is rejected
 */
export const SampleNameSchema = type(/^[A-Za-z0-9_]+$/);

export const SampleSchema = type({
  name: SampleNameSchema,
  read1: "string>0",
  read2: "string>0",
});
