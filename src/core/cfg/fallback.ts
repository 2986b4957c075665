/**
 * Substitute graph returned when the model's answer cannot be parsed
 */

import type { ControlFlowGraph } from "./models/cfg.js";

/**
 * START → PROCESS(`errorLabel`) → END, with unconditional edges and
 * minimal metrics.
 */
export function createFallbackCfg(errorLabel: string): ControlFlowGraph {
  return {
    nodes: [
      { id: "node1", type: "START", label: "Start", nextNodeIds: ["node2"], condition: null },
      { id: "node2", type: "PROCESS", label: errorLabel, nextNodeIds: ["node3"], condition: null },
      { id: "node3", type: "END", label: "End", nextNodeIds: [], condition: null },
    ],
    edges: [
      { from: "node1", to: "node2", label: "" },
      { from: "node2", to: "node3", label: "" },
    ],
    metrics: { complexity: 1, numPaths: 1, nestingDepth: 0 },
  };
}
