/**
 * flash-batch - batch paired-end read merging with FLASH
 *
 * Library surface of the `flash-batch` command, for pipelines that want to
 * drive the merger from TypeScript instead of the shell.
 */

// CLI
export { cli, command, exitCodeFor, normalizeArgv, teardown, VERSION } from "./cli";
// Error types
export {
  type ConfigurationFailure,
  describeSystemError,
  FileError,
  FlashInvocationError,
  isConfigurationFailure,
  MergerError,
  OutputCollectionError,
  type SampleFailure,
  SamplesFileError,
  StatsParseError,
  UsageError,
} from "./errors";
// FLASH service
export { collectMergedReads, removeIntermediates } from "./flash/collector";
export {
  DEFAULT_FLASH_EXECUTABLE,
  FLASH_LOG_SUFFIX,
  flashArguments,
  type FlashOptions,
  FlashService,
  type FlashServiceShape,
  MERGED_READS_SUFFIX,
} from "./flash/service";
// Formats
export { parseFlashReport } from "./formats/flash-report";
export { parseSamplesTable, readSamplesFile } from "./formats/samples";
export { formatStatRow, formatStatsTable, writeStatsTable } from "./formats/stats-table";
// Operations
export { mergeSample, mergeSamples, workDirectoryFor } from "./operations/merge";
export { resolveSamples, validateSample } from "./operations/resolve";
// Types
export type {
  MergedSample,
  MergeOptions,
  MergeRequest,
  MergeResult,
  MergeSummary,
  Sample,
  SampleArguments,
  StatRow,
} from "./types";
export {
  REQUIRED_SAMPLE_COLUMNS,
  SampleNameSchema,
  SampleSchema,
  STATS_COLUMNS,
  STATS_FILE_NAME,
} from "./types";
