/**
 * Graph Assembler
 *
 * Converts between validated records and graph entities. The round trip
 * `toRecord(toEntity(record))` reproduces every field value of `record`.
 *
 * @module
 */

import { StructuralError } from "../errors.js";
import type { ControlFlowGraph, GraphRecord } from "./models/cfg.js";

/**
 * Node ids that occur more than once, deduplicated, in node order
 */
export function findDuplicateIds(record: GraphRecord): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const node of record.nodes) {
    if (seen.has(node.id)) duplicates.add(node.id);
    seen.add(node.id);
  }
  return [...duplicates];
}

/**
 * Edge endpoints that name no node of the record, deduplicated, in edge order
 */
export function findDanglingReferences(record: GraphRecord): string[] {
  const known = new Set(record.nodes.map((node) => node.id));
  const dangling = new Set<string>();
  for (const edge of record.edges) {
    if (!known.has(edge.from)) dangling.add(edge.from);
    if (!known.has(edge.to)) dangling.add(edge.to);
  }
  return [...dangling];
}

/**
 * Build the graph entity from a validated record.
 *
 * @throws {StructuralError} when node ids repeat or an edge references an
 * unknown node id
 */
export function toEntity(record: GraphRecord): ControlFlowGraph {
  const duplicateIds = findDuplicateIds(record);
  const danglingIds = findDanglingReferences(record);
  if (duplicateIds.length > 0 || danglingIds.length > 0) {
    const problems: string[] = [];
    if (duplicateIds.length > 0) problems.push(`Duplicate node id(s): ${duplicateIds.join(", ")}`);
    if (danglingIds.length > 0) problems.push(`Edge references unknown node id(s): ${danglingIds.join(", ")}`);

    throw new StructuralError(
      problems.join("; "),
      { danglingIds, duplicateIds },
      { nodeCount: record.nodes.length, edgeCount: record.edges.length }
    );
  }

  return {
    nodes: record.nodes.map((node) => ({ ...node, nextNodeIds: [...node.nextNodeIds] })),
    edges: record.edges.map((edge) => ({ ...edge })),
    metrics: {
      complexity: record.complexity,
      numPaths: record.numPaths,
      nestingDepth: record.nestingDepth,
    },
  };
}

/**
 * Flatten a graph entity back into its storable record
 */
export function toRecord(graph: ControlFlowGraph): GraphRecord {
  return {
    nodes: graph.nodes.map((node) => ({
      id: node.id,
      type: node.type,
      label: node.label,
      nextNodeIds: [...node.nextNodeIds],
      condition: node.condition,
    })),
    edges: graph.edges.map((edge) => ({ from: edge.from, to: edge.to, label: edge.label })),
    complexity: graph.metrics.complexity,
    numPaths: graph.metrics.numPaths,
    nestingDepth: graph.metrics.nestingDepth,
  };
}
