export {
  type InsufficientDataError,
  MIN_VALUES_FOR_STATISTICS,
  mean,
  standardDeviation,
  standardErrorOfMean,
  computeStatistics,
} from "./statistics.js";
