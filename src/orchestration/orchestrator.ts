/**
 * Orchestrator — runs the loader and the statistics for each file.
 *
 * Files are processed one at a time in the order given. An unreadable file
 * stops the whole batch and no report is produced; a file with too few
 * accepted values becomes a warning and the batch continues.
 *
 * Dependencies flow downward only: Orchestration → Loader, Analysis, Types.
 */

import type { AnalysisReport, FileAnalysis, FileWarning, RejectedLine } from "../types/measurement.js";
import type { Result } from "../types/result.js";
import type { LoadError, ReadFn } from "../loader/loader.js";
import { loadChargeFile } from "../loader/loader.js";
import { computeStatistics } from "../analysis/statistics.js";
import { ok, err } from "../types/result.js";

/**
 * Error produced when a batch cannot be completed.
 */
export interface AnalysisError {
  readonly message: string;
  /** The load failure that stopped the batch. */
  readonly loadError: LoadError;
  /** Files from the batch that were never attempted. */
  readonly skippedFiles: readonly string[];
}

export interface AnalyzeOptions {
  /** When provided, generates the timestamp for the report. */
  readonly timestampFn?: () => string;
  /** Receives each rejected line as soon as the loader finds it. */
  readonly onRejected?: (filePath: string, line: RejectedLine) => void;
}

/**
 * Analyze every file in order.
 *
 * Behavior:
 * - Each file gets a fresh measurement set; nothing carries over.
 * - The first unreadable file aborts the run with an AnalysisError.
 * - Files with fewer than two accepted values produce a warning.
 */
export async function analyzeFiles(
  filePaths: readonly string[],
  readFn: ReadFn,
  options?: AnalyzeOptions,
): Promise<Result<AnalysisReport, AnalysisError>> {
  const files: FileAnalysis[] = [];
  const warnings: FileWarning[] = [];
  const loadOptions = options?.onRejected !== undefined
    ? { onRejected: options.onRejected }
    : undefined;

  for (const [index, filePath] of filePaths.entries()) {
    const loaded = await loadChargeFile(filePath, readFn, loadOptions);
    if (!loaded.ok) {
      return err({
        message: loaded.error.message,
        loadError: loaded.error,
        skippedFiles: filePaths.slice(index + 1),
      });
    }

    const set = loaded.value;
    const stats = computeStatistics(set.values);
    if (!stats.ok) {
      warnings.push({ filePath, message: stats.error.message });
      continue;
    }

    files.push({
      filePath,
      lineCount: set.lineCount,
      validCount: set.validCount,
      rejected: set.rejected,
      statistics: stats.value,
    });
  }

  const timestampFn = options?.timestampFn ?? (() => new Date().toISOString());

  return ok({
    timestamp: timestampFn(),
    files,
    warnings,
  });
}
