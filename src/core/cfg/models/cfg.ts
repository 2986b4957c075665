/**
 * Control-Flow Graph Models
 *
 * Two shapes describe a graph:
 * - `GraphRecord`: the flat, JSON-serializable form written to the cache
 *   and produced by the validator
 * - `ControlFlowGraph`: the assembled entity handed to callers
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Node Types
// =============================================================================

export const NodeTypeSchema = z.enum([
  "START",
  "END",
  "PROCESS",
  "DECISION",
  "LOOP",
  "FUNCTION_CALL",
  "RETURN",
]);

export type NodeType = z.infer<typeof NodeTypeSchema>;

// =============================================================================
// Records (validated wire/disk form)
// =============================================================================

export const NodeRecordSchema = z.object({
  id: z.string(),
  type: NodeTypeSchema,
  label: z.string(),
  nextNodeIds: z.array(z.string()),
  /** Branch condition; null when the node is not a decision */
  condition: z.string().nullable(),
});

export type NodeRecord = z.infer<typeof NodeRecordSchema>;

export const EdgeRecordSchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1),
  /** Transition annotation, e.g. "true"/"false"; empty for fall-through */
  label: z.string(),
});

export type EdgeRecord = z.infer<typeof EdgeRecordSchema>;

export const GraphRecordSchema = z.object({
  nodes: z.array(NodeRecordSchema),
  edges: z.array(EdgeRecordSchema),
  complexity: z.number().int(),
  numPaths: z.number().int(),
  nestingDepth: z.number().int(),
});

export type GraphRecord = z.infer<typeof GraphRecordSchema>;

// =============================================================================
// Entity
// =============================================================================

export interface CfgNode {
  id: string;
  type: NodeType;
  label: string;
  nextNodeIds: string[];
  condition: string | null;
}

export interface CfgEdge {
  from: string;
  to: string;
  label: string;
}

/**
 * Summary metrics reported with the graph; supplied by the source, never
 * recomputed from nodes and edges
 */
export interface GraphMetrics {
  /** Cyclomatic complexity */
  complexity: number;
  numPaths: number;
  nestingDepth: number;
}

export interface ControlFlowGraph {
  nodes: CfgNode[];
  edges: CfgEdge[];
  metrics: GraphMetrics;
}

export interface StructuralMetrics extends GraphMetrics {
  numNodes: number;
  numEdges: number;
}

// =============================================================================
// Queries
// =============================================================================

export function getNode(graph: ControlFlowGraph, id: string): CfgNode | undefined {
  return graph.nodes.find((node) => node.id === id);
}

/**
 * Nodes reachable from `id` over one edge, in edge order
 */
export function successors(graph: ControlFlowGraph, id: string): CfgNode[] {
  const result: CfgNode[] = [];
  for (const edge of graph.edges) {
    if (edge.from !== id) continue;
    const target = getNode(graph, edge.to);
    if (target) result.push(target);
  }
  return result;
}

export function structuralMetrics(graph: ControlFlowGraph): StructuralMetrics {
  return {
    numNodes: graph.nodes.length,
    numEdges: graph.edges.length,
    ...graph.metrics,
  };
}
