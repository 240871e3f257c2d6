export {
  type LineVerdict,
  parseChargeLine,
  describeRejection,
} from "./line-parser.js";
export {
  type ReadFn,
  type LoadError,
  type LoadOptions,
  splitLines,
  parseChargeText,
  loadChargeFile,
} from "./loader.js";
