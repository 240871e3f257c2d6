/**
 * Charge measurement types.
 *
 * A measurement set is what the loader produces for one input file; the
 * analysis layer turns it into ChargeStatistics, and the orchestrator
 * collects one FileAnalysis per file into an AnalysisReport.
 */

/** Unit suffix for every charge value in rendered output (coulombs). */
export const CHARGE_UNIT = "C";

/**
 * Why a line was dropped from a measurement set.
 */
export type RejectionReason =
  | "blank"
  | "not-a-number"
  | "negative"
  | "trailing-content"
  | "out-of-range";

/**
 * A line that failed validation and was skipped.
 */
export interface RejectedLine {
  /** 1-based line number within the source file. */
  readonly lineNumber: number;
  /** The line as read, before trimming. */
  readonly raw: string;
  readonly reason: RejectionReason;
}

/**
 * The accepted values of one file, in file order, with no gaps left by
 * rejected lines.
 */
export interface MeasurementSet {
  readonly filePath: string;
  readonly values: readonly number[];
  /** Always equal to values.length. */
  readonly validCount: number;
  /** Number of lines read, accepted or not. */
  readonly lineCount: number;
  readonly rejected: readonly RejectedLine[];
}

export interface ChargeStatistics {
  readonly count: number;
  readonly mean: number;
  /** Sample standard deviation (divisor n - 1). */
  readonly standardDeviation: number;
  /** mean / sqrt(n); the conventional definition uses the standard deviation instead. */
  readonly standardErrorOfMean: number;
}

/**
 * Statistics for one successfully analyzed file.
 */
export interface FileAnalysis {
  readonly filePath: string;
  readonly lineCount: number;
  readonly validCount: number;
  readonly rejected: readonly RejectedLine[];
  readonly statistics: ChargeStatistics;
}

/**
 * A file that loaded but could not be analyzed (too few accepted values).
 */
export interface FileWarning {
  readonly filePath: string;
  readonly message: string;
}

/**
 * The result of analyzing every requested file.
 */
export interface AnalysisReport {
  /** ISO 8601 timestamp of when the analysis ran. */
  readonly timestamp: string;
  /** Analyzed files, in the order they were requested. */
  readonly files: readonly FileAnalysis[];
  readonly warnings: readonly FileWarning[];
}
