/**
 * Prompts for Solution Analysis
 *
 * Graph prompts ask for snake_case keys; the validator accepts them as-is.
 *
 * @module
 */

import type { JsonObject } from "../../llm/json-response.js";
import type { GraphRecord, StructuralMetrics } from "../../cfg/models/cfg.js";

// =============================================================================
// Shared Output Contract
// =============================================================================

const CFG_OUTPUT_FORMAT = `Respond with a single JSON object and nothing else:
{
  "nodes": [
    {
      "id": "node1",
      "type": "START | END | PROCESS | DECISION | LOOP | FUNCTION_CALL | RETURN",
      "label": "short description of the statement",
      "next_nodes": ["node2"],
      "condition": "branch condition for DECISION nodes, otherwise null"
    }
  ],
  "edges": [{ "from": "node1", "to": "node2", "label": "true | false | empty" }],
  "complexity": <cyclomatic complexity, integer>,
  "num_paths": <number of distinct execution paths, integer>,
  "nesting_depth": <maximum nesting depth, integer>
}
Every edge must connect ids that appear in "nodes". Use exactly one START node.`;

// =============================================================================
// System Prompts
// =============================================================================

export const PSEUDOCODE_TO_CFG_PROMPT = `You are a program analysis assistant. Convert the pseudocode below into a control-flow graph.
Model each statement, branch and loop as a node and every possible transition as an edge.

${CFG_OUTPUT_FORMAT}`;

export const FLOWCHART_TO_CFG_PROMPT = `You are a program analysis assistant. The attached image is a flowchart of an algorithm.
Read every shape and arrow and convert the flowchart into a control-flow graph.
Terminal shapes are START/END, diamonds are DECISION, rectangles are PROCESS.

${CFG_OUTPUT_FORMAT}`;

export const ANALYZE_PROBLEM_PROMPT = `You are an algorithms instructor. Analyze the problem statement below.
Respond with a single JSON object and nothing else:
{
  "problem_type": "e.g. sorting, searching, graph traversal",
  "requirements": ["functional requirement"],
  "edge_cases": ["input the solution must handle"],
  "expected_complexity": { "time": "O(...)", "space": "O(...)" },
  "expected_structure": { "loops": <integer>, "decisions": <integer>, "recursion": <boolean> }
}`;

export const COMPARE_CFGS_PROMPT = `You are an algorithms instructor comparing two candidate solutions to the same problem.
Each solution is given as a control-flow graph with structural metrics.
Judge correctness against the problem analysis first, then clarity and efficiency.
Respond with a single JSON object and nothing else:
{
  "better_solution": 1 | 2 | 0,
  "scores": { "solution1": <0-100>, "solution2": <0-100> },
  "strengths": { "solution1": ["..."], "solution2": ["..."] },
  "weaknesses": { "solution1": ["..."], "solution2": ["..."] },
  "reasoning": "one paragraph"
}
Use 0 for "better_solution" when the two are equivalent.`;

// =============================================================================
// Prompt Builders
// =============================================================================

export function buildPseudocodePrompt(pseudocode: string): string {
  return `${PSEUDOCODE_TO_CFG_PROMPT}\n\nPseudocode:\n${pseudocode}`;
}

export function buildProblemPrompt(problemStatement: string): string {
  return `${ANALYZE_PROBLEM_PROMPT}\n\nProblem Statement:\n${problemStatement}`;
}

export interface ComparisonPromptInput {
  problemAnalysis: JsonObject;
  cfg1: GraphRecord;
  cfg2: GraphRecord;
  metrics1: StructuralMetrics;
  metrics2: StructuralMetrics;
}

export function buildComparisonPrompt(input: ComparisonPromptInput): string {
  const json = (value: unknown): string => JSON.stringify(value, null, 2);

  return `${COMPARE_CFGS_PROMPT}

Problem Analysis:
${json(input.problemAnalysis)}

Solution 1 CFG:
${json(input.cfg1)}

Solution 2 CFG:
${json(input.cfg2)}

Structural Metrics:
${json({ cfg1: input.metrics1, cfg2: input.metrics2 })}

Compare these solutions and determine which is better.`;
}
