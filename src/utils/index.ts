/**
 * Shared utilities
 */

import * as fs from "node:fs";
import * as path from "node:path";

// Re-export logger module
export * from "./logger.js";

// =============================================================================
// Configuration Paths
// =============================================================================

export const CONFIG_DIR = ".cfg-lens";

export function getProjectRoot(): string {
  return process.cwd();
}

export function getConfigDir(projectRoot: string = getProjectRoot()): string {
  return path.join(projectRoot, CONFIG_DIR);
}

export function getDataDir(projectRoot: string = getProjectRoot()): string {
  return path.join(getConfigDir(projectRoot), "data");
}

export function getCacheDbPath(projectRoot: string = getProjectRoot()): string {
  return path.join(getDataDir(projectRoot), "cache.sqlite");
}

export function ensureDir(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}
