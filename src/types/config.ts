/**
 * Configuration schema for chargestat.
 */

/**
 * Supported output formats.
 */
export type OutputFormat = "terminal" | "json";

export const DEFAULT_PRECISION = 6;

/**
 * Configuration for a single analysis run.
 */
export interface AnalysisConfig {
  /**
   * Files to analyze, in order. Empty means the CLI collects them
   * interactively.
   */
  readonly filePaths: readonly string[];
  /** Desired output format. */
  readonly outputFormat: OutputFormat;
  /** Optional output file path. If omitted, output goes to stdout. */
  readonly outputPath?: string | undefined;
  /** Significant digits for terminal output. */
  readonly precision: number;
  /** Suppress per-line rejection diagnostics. */
  readonly quiet: boolean;
}
