export { type Result, ok, err } from "./result.js";
export {
  type RejectionReason,
  type RejectedLine,
  type MeasurementSet,
  type ChargeStatistics,
  type FileAnalysis,
  type FileWarning,
  type AnalysisReport,
  CHARGE_UNIT,
} from "./measurement.js";
export {
  type OutputFormat,
  type AnalysisConfig,
  DEFAULT_PRECISION,
} from "./config.js";
