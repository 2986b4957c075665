/**
 * Solution Analysis Service
 *
 * Entry point for every model-backed operation. Each call derives a cache
 * key from its canonical content, serves a live cache entry when one exists,
 * and otherwise asks the inference service, validates the answer and writes
 * the validated record back.
 *
 * Two concurrent misses on one key both reach the model; the later write
 * wins. A failed or timed-out model call writes nothing.
 *
 * @module
 */

import { generateCacheKey, canonicalJson } from "../cache/cache-key.js";
import { normalizeCode } from "../cache/normalizer.js";
import type { CacheStats, CachedRecord, ICacheStore } from "../cache/interfaces/ICacheStore.js";
import { toRecord } from "../cfg/assembler.js";
import { structuralMetrics, type ControlFlowGraph } from "../cfg/models/cfg.js";
import { imageAttachment } from "../llm/attachments.js";
import type { IInferenceService } from "../llm/interfaces/IInferenceService.js";
import { parseJsonResponse, type JsonObject } from "../llm/json-response.js";
import { createLogger } from "../../utils/logger.js";
import {
  FLOWCHART_TO_CFG_PROMPT,
  buildComparisonPrompt,
  buildProblemPrompt,
  buildPseudocodePrompt,
} from "./prompts/analysis-prompts.js";
import { cfgPipeline, jsonObjectPipeline, type RecordPipeline } from "./record-pipeline.js";

const logger = createLogger("analysis-service");

// =============================================================================
// Types
// =============================================================================

export const CallType = {
  PSEUDOCODE_TO_CFG: "pseudocode_to_cfg",
  FLOWCHART_TO_CFG: "flowchart_to_cfg",
  ANALYZE_PROBLEM: "analyze_problem",
  COMPARE_CFGS: "compare_cfgs",
} as const;

export type CallType = (typeof CallType)[keyof typeof CallType];

/** Model-produced description of a problem statement */
export type ProblemAnalysis = JsonObject;

/** Model-produced verdict on two solutions */
export type CfgComparison = JsonObject;

export interface AnalysisServiceDeps {
  store: ICacheStore;
  inference: IInferenceService;
}

// =============================================================================
// Service
// =============================================================================

export class AnalysisService {
  private readonly store: ICacheStore;
  private readonly inference: IInferenceService;

  constructor(deps: AnalysisServiceDeps) {
    this.store = deps.store;
    this.inference = deps.inference;
  }

  /**
   * Serve `callType` for the given canonical content parts from the cache,
   * or compute, validate, store and return it.
   *
   * @param parts - Already-canonical content (normalized text, canonical JSON)
   * @param compute - Produces the model's raw text on a miss
   * @throws {TransportError} from `compute`; nothing is cached
   * @throws {StructuralError} when the record has dangling edges, fresh or cached
   */
  async getOrCompute<TRecord extends CachedRecord, TEntity>(
    callType: string,
    parts: string[],
    compute: () => Promise<string>,
    pipeline: RecordPipeline<TRecord, TEntity>
  ): Promise<TEntity> {
    const contentHash = generateCacheKey(callType, ...parts);

    const cached = await this.store.get(callType, contentHash);
    if (cached !== null) {
      return pipeline.toEntity(pipeline.validate(cached));
    }

    const text = await compute();

    const parsed = parseJsonResponse(text);
    if (!parsed.ok) {
      logger.warn(
        { callType, reason: parsed.error.reason, preview: parsed.error.preview },
        "Model response could not be parsed"
      );
      return pipeline.recover(parsed.error);
    }

    const record = pipeline.validate(parsed.value);
    const entity = pipeline.toEntity(record);
    await this.store.set(callType, contentHash, record);
    return entity;
  }

  /**
   * Convert pseudocode into a control-flow graph. Inputs that differ only in
   * comments, semicolons, whitespace or case share a cache entry.
   */
  async pseudocodeToCfg(pseudocode: string): Promise<ControlFlowGraph> {
    return this.getOrCompute(
      CallType.PSEUDOCODE_TO_CFG,
      [normalizeCode(pseudocode)],
      () => this.inference.invoke(buildPseudocodePrompt(pseudocode)),
      cfgPipeline("Error parsing pseudocode")
    );
  }

  /**
   * Convert a flowchart image (base64, optionally a data URL) into a
   * control-flow graph.
   */
  async flowchartToCfg(base64Image: string): Promise<ControlFlowGraph> {
    return this.getOrCompute(
      CallType.FLOWCHART_TO_CFG,
      [base64Image],
      () => this.inference.invoke(FLOWCHART_TO_CFG_PROMPT, [imageAttachment(base64Image)]),
      cfgPipeline("Error parsing flowchart")
    );
  }

  async analyzeProblem(problemStatement: string): Promise<ProblemAnalysis> {
    return this.getOrCompute(
      CallType.ANALYZE_PROBLEM,
      [problemStatement],
      () => this.inference.invoke(buildProblemPrompt(problemStatement)),
      jsonObjectPipeline(CallType.ANALYZE_PROBLEM)
    );
  }

  /**
   * Ask the model which of two solutions is better for the analyzed problem.
   */
  async compareCfgs(
    cfg1: ControlFlowGraph,
    cfg2: ControlFlowGraph,
    problemAnalysis: ProblemAnalysis
  ): Promise<CfgComparison> {
    const record1 = toRecord(cfg1);
    const record2 = toRecord(cfg2);

    return this.getOrCompute(
      CallType.COMPARE_CFGS,
      [canonicalJson(record1), canonicalJson(record2), canonicalJson(problemAnalysis)],
      () =>
        this.inference.invoke(
          buildComparisonPrompt({
            problemAnalysis,
            cfg1: record1,
            cfg2: record2,
            metrics1: structuralMetrics(cfg1),
            metrics2: structuralMetrics(cfg2),
          })
        ),
      jsonObjectPipeline(CallType.COMPARE_CFGS)
    );
  }

  async cacheStats(): Promise<CacheStats> {
    return this.store.stats();
  }

  async cacheSweep(): Promise<number> {
    return this.store.sweep();
  }
}
