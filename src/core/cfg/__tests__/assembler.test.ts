/**
 * Tests for the graph assembler, fallback graph and graph queries
 */

import { describe, it, expect } from "vitest";
import { ErrorCode, StructuralError } from "../../errors.js";
import { findDanglingReferences, findDuplicateIds, toEntity, toRecord } from "../assembler.js";
import { createFallbackCfg } from "../fallback.js";
import { getNode, structuralMetrics, successors, type GraphRecord } from "../models/cfg.js";
import { validateCfg } from "../validator.js";

function sampleRecord(): GraphRecord {
  return {
    nodes: [
      { id: "node1", type: "START", label: "Start", nextNodeIds: ["node2"], condition: null },
      { id: "node2", type: "DECISION", label: "x > 0", nextNodeIds: ["node3", "node4"], condition: "x > 0" },
      { id: "node3", type: "RETURN", label: "return true", nextNodeIds: [], condition: null },
      { id: "node4", type: "RETURN", label: "return false", nextNodeIds: [], condition: null },
    ],
    edges: [
      { from: "node1", to: "node2", label: "" },
      { from: "node2", to: "node3", label: "true" },
      { from: "node2", to: "node4", label: "false" },
    ],
    complexity: 2,
    numPaths: 2,
    nestingDepth: 1,
  };
}

describe("toEntity", () => {
  it("should assemble nodes, edges and metrics", () => {
    const graph = toEntity(sampleRecord());

    expect(graph.nodes).toHaveLength(4);
    expect(graph.edges).toHaveLength(3);
    expect(graph.metrics).toEqual({ complexity: 2, numPaths: 2, nestingDepth: 1 });
  });

  it("should round-trip through toRecord", () => {
    const record = sampleRecord();
    expect(toRecord(toEntity(record))).toEqual(record);
  });

  it("should not share arrays with the record", () => {
    const record = sampleRecord();
    const graph = toEntity(record);

    graph.nodes[0]?.nextNodeIds.push("node9");
    graph.edges.pop();

    expect(record.nodes[0]?.nextNodeIds).toEqual(["node2"]);
    expect(record.edges).toHaveLength(3);
  });

  it("should accept an empty record", () => {
    const graph = toEntity({ nodes: [], edges: [], complexity: 1, numPaths: 1, nestingDepth: 0 });
    expect(graph).toEqual({ nodes: [], edges: [], metrics: { complexity: 1, numPaths: 1, nestingDepth: 0 } });
  });

  it("should not check successor lists against node ids", () => {
    const record = sampleRecord();
    const third = record.nodes[2];
    if (third) third.nextNodeIds = ["elsewhere"];

    expect(() => toEntity(record)).not.toThrow();
  });

  it("should reject edges that reference unknown nodes", () => {
    const record = sampleRecord();
    record.edges.push(
      { from: "node1", to: "ghost", label: "" },
      { from: "phantom", to: "node1", label: "" },
      { from: "node4", to: "ghost", label: "" }
    );

    expect(() => toEntity(record)).toThrow(StructuralError);

    let error: unknown;
    try {
      toEntity(record);
    } catch (caught) {
      error = caught;
    }
    if (!(error instanceof StructuralError)) throw new Error("expected StructuralError");
    expect(error.message).toBe("Edge references unknown node id(s): ghost, phantom");
    expect(error.danglingIds).toEqual(["ghost", "phantom"]);
    expect(error.duplicateIds).toEqual([]);
    expect(error.code).toBe(ErrorCode.GRAPH_DANGLING_EDGE);
  });
});

describe("duplicate node ids", () => {
  function structuralError(record: GraphRecord): StructuralError {
    try {
      toEntity(record);
    } catch (error) {
      if (error instanceof StructuralError) return error;
      throw error;
    }
    throw new Error("expected StructuralError");
  }

  it("should reject a defaulted id that repeats a supplied one", () => {
    const record = validateCfg({
      nodes: [{ type: "START" }, { id: "node1", type: "END" }],
      edges: [{ from: "node1", to: "node1" }],
    });

    const error = structuralError(record);

    expect(error.message).toBe("Duplicate node id(s): node1");
    expect(error.duplicateIds).toEqual(["node1"]);
    expect(error.danglingIds).toEqual([]);
    expect(error.code).toBe(ErrorCode.GRAPH_DANGLING_EDGE);
  });

  it("should report duplicates and dangling edges together", () => {
    const record = sampleRecord();
    record.nodes.push({ id: "node2", type: "PROCESS", label: "again", nextNodeIds: [], condition: null });
    record.edges.push({ from: "node3", to: "ghost", label: "" });

    const error = structuralError(record);

    expect(error.message).toBe("Duplicate node id(s): node2; Edge references unknown node id(s): ghost");
    expect(error.duplicateIds).toEqual(["node2"]);
    expect(error.danglingIds).toEqual(["ghost"]);
  });

  it("should list each repeated id once, in node order", () => {
    const record = sampleRecord();
    record.nodes.push(
      { id: "node3", type: "PROCESS", label: "x", nextNodeIds: [], condition: null },
      { id: "node1", type: "PROCESS", label: "y", nextNodeIds: [], condition: null },
      { id: "node3", type: "PROCESS", label: "z", nextNodeIds: [], condition: null }
    );

    expect(findDuplicateIds(record)).toEqual(["node3", "node1"]);
  });

  it("should find no duplicates in a consistent record", () => {
    expect(findDuplicateIds(sampleRecord())).toEqual([]);
  });
});

describe("findDanglingReferences", () => {
  it("should return an empty list for a consistent record", () => {
    expect(findDanglingReferences(sampleRecord())).toEqual([]);
  });

  it("should report both endpoints of an edge between unknown nodes", () => {
    const record = sampleRecord();
    record.edges = [{ from: "a", to: "b", label: "" }];

    expect(findDanglingReferences(record)).toEqual(["a", "b"]);
  });
});

describe("createFallbackCfg", () => {
  it("should build a three-node chain with the error label", () => {
    const graph = createFallbackCfg("Error parsing pseudocode");

    expect(graph.nodes.map((node) => [node.id, node.type, node.label])).toEqual([
      ["node1", "START", "Start"],
      ["node2", "PROCESS", "Error parsing pseudocode"],
      ["node3", "END", "End"],
    ]);
    expect(graph.edges).toEqual([
      { from: "node1", to: "node2", label: "" },
      { from: "node2", to: "node3", label: "" },
    ]);
    expect(graph.metrics).toEqual({ complexity: 1, numPaths: 1, nestingDepth: 0 });
  });

  it("should be structurally valid", () => {
    const graph = createFallbackCfg("Error parsing flowchart");
    expect(toEntity(toRecord(graph))).toEqual(graph);
  });

  it("should return a fresh graph on every call", () => {
    const first = createFallbackCfg("x");
    first.nodes.pop();

    expect(createFallbackCfg("x").nodes).toHaveLength(3);
  });
});

describe("graph queries", () => {
  const graph = toEntity(sampleRecord());

  it("should look up nodes by id", () => {
    expect(getNode(graph, "node2")?.condition).toBe("x > 0");
    expect(getNode(graph, "nope")).toBeUndefined();
  });

  it("should list successors in edge order", () => {
    expect(successors(graph, "node2").map((node) => node.id)).toEqual(["node3", "node4"]);
    expect(successors(graph, "node3")).toEqual([]);
  });

  it("should report structural metrics", () => {
    expect(structuralMetrics(graph)).toEqual({
      numNodes: 4,
      numEdges: 3,
      complexity: 2,
      numPaths: 2,
      nestingDepth: 1,
    });
  });
});
