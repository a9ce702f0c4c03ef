/**
 * @module formats/stats-table
 * @description Writer for the aggregated `merger_stats.tsv` table
 */

import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";
import type { StatRow } from "../types";
import { STATS_COLUMNS } from "../types";

/**
 * Format one row in {@link STATS_COLUMNS} order
 */
export function formatStatRow(row: StatRow): string {
  return [
    row.sampleName,
    row.totalPairs,
    row.combinedPairs,
    row.uncombinedPairs,
    row.percentCombined,
  ].join("\t");
}

/**
 * Format the header plus one line per row, in the order given
 */
export function formatStatsTable(rows: readonly StatRow[]): string {
  return [STATS_COLUMNS.join("\t"), ...rows.map(formatStatRow)].join("\n") + "\n";
}

/**
 * Write the full table, replacing any previous file
 *
 * @returns The path written
 */
export const writeStatsTable = (
  filePath: string,
  rows: readonly StatRow[]
): Effect.Effect<string, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs
      .writeFileString(filePath, formatStatsTable(rows))
      .pipe(Effect.mapError((error) => FileError.fromSystemError("write", filePath, error)));
    return filePath;
  });
