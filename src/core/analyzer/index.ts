/**
 * Solution Analyzer Module
 *
 * @module
 */

import type { AppConfig } from "../config/index.js";
import { SqliteCacheStore } from "../cache/sqlite-cache-store.js";
import { GeminiInferenceService } from "../llm/gemini-inference-service.js";
import { AnalysisService } from "./analysis-service.js";

export {
  AnalysisService,
  CallType,
  type AnalysisServiceDeps,
  type CfgComparison,
  type ProblemAnalysis,
} from "./analysis-service.js";
export { cfgPipeline, jsonObjectPipeline, type RecordPipeline } from "./record-pipeline.js";
export * from "./prompts/analysis-prompts.js";

/**
 * Wire the SQLite cache and the Gemini service from loaded configuration.
 */
export async function createAnalysisService(config: AppConfig): Promise<AnalysisService> {
  const store = new SqliteCacheStore(config.cache);
  await store.initialize();
  return new AnalysisService({
    store,
    inference: new GeminiInferenceService(config.inference),
  });
}
