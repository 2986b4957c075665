/**
 * Graph Record Validator
 *
 * Turns whatever the model (or an old cache row) handed us into a
 * `GraphRecord` that satisfies every field invariant. Missing fields get
 * defaults; edges without both endpoints are dropped. Dangling references
 * are left for the assembler to reject.
 *
 * @module
 */

import { NodeTypeSchema, type EdgeRecord, type GraphRecord, type NodeRecord, type NodeType } from "./models/cfg.js";

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_COMPLEXITY = 1;
export const DEFAULT_NUM_PATHS = 1;
export const DEFAULT_NESTING_DEPTH = 0;
export const DEFAULT_NODE_TYPE: NodeType = "PROCESS";

type RawObject = Record<string, unknown>;

// =============================================================================
// Field Readers
// =============================================================================

function isRawObject(value: unknown): value is RawObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * First present (non-null) value among the given spellings of a field.
 * The prompt asks for snake_case; records written by this module use camelCase.
 */
function readField(source: RawObject, ...names: string[]): unknown {
  for (const name of names) {
    const value = source[name];
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
}

function asString(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return undefined;
}

function asStringArray(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.flatMap((item) => {
    const str = asString(item);
    return str === undefined ? [] : [str];
  });
}

function asInteger(value: unknown): number | undefined {
  const num = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  if (typeof num !== "number" || !Number.isFinite(num)) return undefined;
  return Math.trunc(num);
}

function asNodeType(value: unknown): NodeType {
  if (typeof value !== "string") return DEFAULT_NODE_TYPE;
  const parsed = NodeTypeSchema.safeParse(value.trim().toUpperCase().replace(/[\s-]+/g, "_"));
  return parsed.success ? parsed.data : DEFAULT_NODE_TYPE;
}

// =============================================================================
// Validation
// =============================================================================

function validateNode(raw: unknown, index: number): NodeRecord {
  const node = isRawObject(raw) ? raw : {};
  const position = index + 1;

  return {
    id: asString(readField(node, "id")) ?? `node${position}`,
    type: asNodeType(readField(node, "type")),
    label: asString(readField(node, "label")) ?? `Node ${position}`,
    nextNodeIds: asStringArray(readField(node, "nextNodeIds", "next_nodes")) ?? [],
    condition: asString(readField(node, "condition")) ?? null,
  };
}

function validateEdge(raw: unknown): EdgeRecord | null {
  if (!isRawObject(raw)) return null;

  const from = asString(readField(raw, "from")) ?? "";
  const to = asString(readField(raw, "to")) ?? "";
  if (!from || !to) return null;

  return {
    from,
    to,
    label: asString(readField(raw, "label")) ?? "",
  };
}

/**
 * Repair a raw graph record. Total: never throws, never mutates `raw`.
 *
 * @example
 * ```typescript
 * validateCfg({});
 * // => { nodes: [], edges: [], complexity: 1, numPaths: 1, nestingDepth: 0 }
 * ```
 */
export function validateCfg(raw: unknown): GraphRecord {
  const source = isRawObject(raw) ? raw : {};

  const rawNodes = readField(source, "nodes");
  const rawEdges = readField(source, "edges");

  const nodes = Array.isArray(rawNodes) ? rawNodes.map(validateNode) : [];
  const edges = Array.isArray(rawEdges)
    ? rawEdges.flatMap((edge: unknown) => {
        const validated = validateEdge(edge);
        return validated ? [validated] : [];
      })
    : [];

  return {
    nodes,
    edges,
    complexity: asInteger(readField(source, "complexity")) ?? DEFAULT_COMPLEXITY,
    numPaths: asInteger(readField(source, "numPaths", "num_paths")) ?? DEFAULT_NUM_PATHS,
    nestingDepth: asInteger(readField(source, "nestingDepth", "nesting_depth")) ?? DEFAULT_NESTING_DEPTH,
  };
}
