/**
 * Record Pipelines
 *
 * A pipeline tells `getOrCompute` how to turn a parsed model answer (or a
 * cached record) into the value returned to callers, and what to do when
 * the answer cannot be parsed.
 *
 * @module
 */

import { MalformedResponseError } from "../errors.js";
import type { CachedRecord } from "../cache/interfaces/ICacheStore.js";
import { toEntity } from "../cfg/assembler.js";
import { createFallbackCfg } from "../cfg/fallback.js";
import type { ControlFlowGraph, GraphRecord } from "../cfg/models/cfg.js";
import { validateCfg } from "../cfg/validator.js";
import type { JsonObject, ParseFailure } from "../llm/json-response.js";

export interface RecordPipeline<TRecord extends CachedRecord, TEntity> {
  /** Repair a raw record into the stored shape; total */
  validate(raw: unknown): TRecord;
  /** Build the caller-facing value; may throw to reject the record */
  toEntity(record: TRecord): TEntity;
  /** Value to return when the model answer is unparsable, or throw */
  recover(failure: ParseFailure): TEntity;
}

/**
 * Graph pipeline: validator → assembler, with the fixed fallback graph on
 * parse failure
 */
export function cfgPipeline(fallbackLabel: string): RecordPipeline<GraphRecord, ControlFlowGraph> {
  return {
    validate: validateCfg,
    toEntity,
    recover: () => createFallbackCfg(fallbackLabel),
  };
}

/**
 * Pass-through pipeline for free-form JSON objects. There is no sensible
 * substitute for an unparsable answer, so it surfaces as an error.
 */
export function jsonObjectPipeline(callType: string): RecordPipeline<JsonObject, JsonObject> {
  return {
    validate: (raw) =>
      typeof raw === "object" && raw !== null && !Array.isArray(raw)
        ? Object.fromEntries(Object.entries(raw))
        : {},
    toEntity: (record) => record,
    recover: (failure) => {
      throw new MalformedResponseError(`Unparsable ${callType} response: ${failure.message}`, undefined, {
        callType,
        reason: failure.reason,
        preview: failure.preview,
      });
    },
  };
}
