/**
 * JSON formatter — serializes an AnalysisReport to a JSON string.
 *
 * Numbers are written at full precision; the precision option only
 * applies to human-readable output.
 */

import type { AnalysisReport } from "../types/measurement.js";
import { CHARGE_UNIT } from "../types/measurement.js";

/**
 * Formats an AnalysisReport as a pretty-printed JSON string with the
 * charge unit recorded alongside the files.
 */
export function formatJson(report: AnalysisReport): string {
  const enriched = {
    timestamp: report.timestamp,
    unit: CHARGE_UNIT,
    files: report.files,
    warnings: report.warnings,
  };
  return JSON.stringify(enriched, null, 2);
}
