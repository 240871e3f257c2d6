/**
 * Formatter interface for transforming AnalysisReports into output strings.
 *
 * Each output format (terminal, JSON) is implemented as a function
 * conforming to this type. Formatters depend only on the Types layer.
 */

import type { AnalysisReport } from "../types/measurement.js";

/**
 * Options that control formatter output behavior.
 */
export interface FormatterOptions {
  /** Significant digits for numbers in human-readable output. */
  readonly precision?: number;
}

export type Formatter = (report: AnalysisReport, options?: FormatterOptions) => string;
