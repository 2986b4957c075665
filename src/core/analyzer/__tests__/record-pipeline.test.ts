/**
 * Tests for record pipelines and analysis prompts
 */

import { describe, it, expect } from "vitest";
import { cfgPipeline, jsonObjectPipeline } from "../record-pipeline.js";
import { buildPseudocodePrompt, buildProblemPrompt, PSEUDOCODE_TO_CFG_PROMPT } from "../prompts/analysis-prompts.js";
import { createFallbackCfg } from "../../cfg/fallback.js";
import { ErrorCode, MalformedResponseError } from "../../errors.js";

describe("cfgPipeline", () => {
  const pipeline = cfgPipeline("Error parsing pseudocode");

  it("should recover with the labelled fallback graph", () => {
    const graph = pipeline.recover({ reason: "invalid_json", message: "Unexpected token", preview: "nope" });
    expect(graph).toEqual(createFallbackCfg("Error parsing pseudocode"));
  });

  it("should validate before assembling", () => {
    const record = pipeline.validate({ nodes: [{ id: "a", type: "start" }] });
    const graph = pipeline.toEntity(record);

    expect(graph.nodes).toEqual([
      { id: "a", type: "START", label: "Node 1", nextNodeIds: [], condition: null },
    ]);
  });
});

describe("jsonObjectPipeline", () => {
  const pipeline = jsonObjectPipeline("analyze_problem");

  it("should pass objects through", () => {
    expect(pipeline.toEntity(pipeline.validate({ a: 1 }))).toEqual({ a: 1 });
  });

  it("should replace non-objects with an empty object", () => {
    expect(pipeline.validate([1, 2])).toEqual({});
    expect(pipeline.validate("text")).toEqual({});
  });

  it("should raise MalformedResponseError on recovery", () => {
    const failure = { reason: "not_object" as const, message: "Expected a JSON object, got array", preview: "[]" };

    expect(() => pipeline.recover(failure)).toThrow(MalformedResponseError);
    expect(() => pipeline.recover(failure)).toThrow(
      "Unparsable analyze_problem response: Expected a JSON object, got array"
    );

    try {
      pipeline.recover(failure);
    } catch (error) {
      expect(error).toMatchObject({ code: ErrorCode.RESPONSE_MALFORMED, preview: "[]" });
    }
  });
});

describe("prompt builders", () => {
  it("should append the pseudocode after the instructions", () => {
    expect(buildPseudocodePrompt("x = 1")).toBe(`${PSEUDOCODE_TO_CFG_PROMPT}\n\nPseudocode:\nx = 1`);
  });

  it("should append the problem statement", () => {
    expect(buildProblemPrompt("Sort a list.").endsWith("\n\nProblem Statement:\nSort a list.")).toBe(true);
  });
});
