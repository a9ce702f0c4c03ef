/**
 * @module formats/flash-report
 * @description Reader for FLASH's read combination statistics
 *
 * FLASH prints its statistics to stdout, one field per line:
 *
 * ```
 * [FLASH] Read combination statistics:
 * [FLASH]     Total pairs:      10000
 * [FLASH]     Combined pairs:   8750
 * [FLASH]     Uncombined pairs: 1250
 * [FLASH]     Percent combined: 87.50%
 * ```
 */

import { StatsParseError } from "../errors";
import type { StatRow } from "../types";

const COUNT_FIELDS = [
  { key: "totalPairs", label: "Total pairs" },
  { key: "combinedPairs", label: "Combined pairs" },
  { key: "uncombinedPairs", label: "Uncombined pairs" },
] as const;

const PERCENT_LABEL = "Percent combined";

function fieldPattern(label: string, value: string): RegExp {
  return new RegExp(`^\\s*(?:\\[FLASH\\]\\s*)?${label}:\\s*${value}\\s*$`, "m");
}

/**
 * Extract one statistics row from a FLASH report
 *
 * Lines may carry the `[FLASH]` prefix or not. The percentage keeps FLASH's
 * own digits and drops the trailing `%`.
 *
 * @param report - FLASH's stdout
 * @param sampleName - Sample the report belongs to
 * @throws {StatsParseError} If any of the four fields is missing or malformed
 */
export function parseFlashReport(report: string, sampleName: string): StatRow {
  const missing: string[] = [];
  const counts = { totalPairs: 0, combinedPairs: 0, uncombinedPairs: 0 };

  for (const { key, label } of COUNT_FIELDS) {
    const value = fieldPattern(label, "(\\d+)").exec(report)?.[1];
    if (value === undefined) {
      missing.push(label);
    } else {
      counts[key] = Number.parseInt(value, 10);
    }
  }

  const percent = fieldPattern(PERCENT_LABEL, "(\\d+(?:\\.\\d+)?)%").exec(report)?.[1];
  if (percent === undefined) {
    missing.push(PERCENT_LABEL);
  }

  if (missing.length > 0 || percent === undefined) {
    throw new StatsParseError(
      `Required information not found in FLASH report for sample ${sampleName}: ${missing.join(", ")}`,
      sampleName,
      missing
    );
  }

  return { sampleName, ...counts, percentCombined: percent };
}
