/**
 * Public API of chargestat for use as a library.
 */

export * from "./types/index.js";
export * from "./loader/index.js";
export * from "./analysis/index.js";
export * from "./orchestration/index.js";
export * from "./formatter/index.js";
export { VERSION } from "./version.js";
