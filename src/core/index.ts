/**
 * Core module - Shared functionality between the CLI and library consumers
 */

// Re-export error classes
export * from "./errors.js";

export * from "./config/index.js";
export * from "./cache/index.js";
export * from "./cfg/index.js";
export * from "./llm/index.js";
export * from "./analyzer/index.js";

export { ok, err, isOk, isErr, type Result } from "../types/result.js";
