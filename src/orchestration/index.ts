export {
  type AnalysisError,
  type AnalyzeOptions,
  analyzeFiles,
} from "./orchestrator.js";
