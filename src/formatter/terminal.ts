/**
 * Terminal formatter — renders an AnalysisReport as the per-file summary
 * printed at the end of a run.
 *
 * Depends only on the Types layer.
 */

import type { AnalysisReport, FileAnalysis } from "../types/measurement.js";
import type { FormatterOptions } from "./formatter.js";
import { CHARGE_UNIT } from "../types/measurement.js";
import { DEFAULT_PRECISION } from "../types/config.js";
import { formatSignificant } from "./number-format.js";

const INDENT = "    ";

function formatFile(file: FileAnalysis, precision: number): string[] {
  const fmt = (value: number): string => formatSignificant(value, precision);
  const { mean, standardDeviation, standardErrorOfMean } = file.statistics;
  const skipped = file.rejected.length;
  const noun = skipped === 1 ? "point" : "points";

  return [
    `File read from: ${file.filePath}`,
    `${INDENT}Accepted ${file.validCount} of ${file.lineCount} lines (${skipped} corrupt data ${noun} skipped)`,
    `${INDENT}The computed mean is:`,
    `${INDENT}${INDENT}(${fmt(mean)} +/- ${fmt(standardErrorOfMean)})${CHARGE_UNIT}`,
    `${INDENT}The computed standard deviation is:`,
    `${INDENT}${INDENT}${fmt(standardDeviation)}${CHARGE_UNIT}`,
  ];
}

/**
 * Formats an AnalysisReport for the terminal.
 *
 * File blocks are separated by a blank line; warnings follow the last
 * block.
 */
export function formatTerminal(report: AnalysisReport, options?: FormatterOptions): string {
  const precision = options?.precision ?? DEFAULT_PRECISION;
  const lines: string[] = [];

  if (report.files.length === 0) {
    lines.push("No files analyzed.");
  }

  report.files.forEach((file, i) => {
    if (i > 0) {
      lines.push("");
    }
    lines.push(...formatFile(file, precision));
  });

  if (report.warnings.length > 0) {
    lines.push("");
    lines.push("Warnings:");
    for (const warning of report.warnings) {
      lines.push(`  ${warning.filePath}: ${warning.message}`);
    }
  }

  return lines.join("\n");
}
