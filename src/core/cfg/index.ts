/**
 * Control-Flow Graph Module
 *
 * @module
 */

export * from "./models/cfg.js";
export { validateCfg } from "./validator.js";
export { toEntity, toRecord, findDanglingReferences, findDuplicateIds } from "./assembler.js";
export { createFallbackCfg } from "./fallback.js";
