/**
 * Tests for model response parsing and image attachments
 */

import { describe, it, expect } from "vitest";
import { extractJsonCandidates, parseJsonResponse } from "../json-response.js";
import { DEFAULT_IMAGE_MIME_TYPE, imageAttachment } from "../attachments.js";

describe("extractJsonCandidates", () => {
  it("should take the body of a fenced json block", () => {
    expect(extractJsonCandidates('Here:\n```json\n{"a": 1}\n```\nDone')).toEqual(['{"a": 1}']);
  });

  it("should take the body of an untagged fence", () => {
    expect(extractJsonCandidates("```\n{}\n```")).toEqual(["{}"]);
  });

  it("should put json-tagged fences ahead of earlier fences in other languages", () => {
    const text = '```python\nx = 1\n```\nGraph:\n```json\n{"nodes": []}\n```';
    expect(extractJsonCandidates(text)).toEqual(['{"nodes": []}', "x = 1"]);
  });

  it("should slice from the first { to the last }", () => {
    expect(extractJsonCandidates('Sure! {"a": {"b": 2}} Hope that helps.')).toEqual(['{"a": {"b": 2}}']);
  });

  it("should fall back to the trimmed text", () => {
    expect(extractJsonCandidates("  [1, 2]  ")).toEqual(["[1, 2]"]);
  });

  it("should return nothing for blank text", () => {
    expect(extractJsonCandidates(" \n\t")).toEqual([]);
  });
});

describe("parseJsonResponse", () => {
  it("should parse a bare object", () => {
    expect(parseJsonResponse('{"nodes": [], "complexity": 2}')).toEqual({
      ok: true,
      value: { nodes: [], complexity: 2 },
    });
  });

  it("should parse an object wrapped in prose and a fence", () => {
    const result = parseJsonResponse('The graph is:\n```json\n{"edges": [{"from": "a", "to": "b"}]}\n```');
    expect(result).toEqual({ ok: true, value: { edges: [{ from: "a", to: "b" }] } });
  });

  it("should find the json block after a fence in another language", () => {
    const text = "```python\nx = 1\n```\nGraph:\n```json\n{\"nodes\": []}\n```";
    expect(parseJsonResponse(text)).toEqual({ ok: true, value: { nodes: [] } });
  });

  it("should try untagged fences in order until one holds an object", () => {
    const text = "First attempt:\n```\nnot json\n```\nFixed:\n```\n{\"complexity\": 3}\n```";
    expect(parseJsonResponse(text)).toEqual({ ok: true, value: { complexity: 3 } });
  });

  it("should describe the most likely candidate when none parses", () => {
    const result = parseJsonResponse("```json\n[1]\n```\n```\nnope\n```");

    expect(result).toEqual({
      ok: false,
      error: {
        reason: "not_object",
        message: "Expected a JSON object, got array",
        preview: "```json\n[1]\n```\n```\nnope\n```",
      },
    });
  });

  it.each([[""], ["   \n "]])("should report %j as empty", (text) => {
    expect(parseJsonResponse(text)).toEqual({
      ok: false,
      error: { reason: "empty", message: "Response contained no text", preview: "" },
    });
  });

  it("should report text that is not JSON", () => {
    const result = parseJsonResponse("I cannot draw that flowchart.");

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.reason).toBe("invalid_json");
    expect(result.error.preview).toBe("I cannot draw that flowchart.");
  });

  it("should report an unterminated object", () => {
    const result = parseJsonResponse('{"nodes": [');
    expect(result.ok ? null : result.error.reason).toBe("invalid_json");
  });

  it("should reject arrays", () => {
    const result = parseJsonResponse("[1, 2]");

    expect(result).toEqual({
      ok: false,
      error: { reason: "not_object", message: "Expected a JSON object, got array", preview: "[1, 2]" },
    });
  });

  it("should reject scalars", () => {
    const result = parseJsonResponse("42");
    expect(result.ok ? null : result.error.message).toBe("Expected a JSON object, got number");
  });

  it("should truncate long previews", () => {
    const text = `oops ${"x".repeat(300)}`;
    const result = parseJsonResponse(text);

    expect(result.ok ? null : result.error.preview).toBe(`${text.slice(0, 200)}...`);
  });
});

describe("imageAttachment", () => {
  it("should split a data URL into mime type and payload", () => {
    expect(imageAttachment("data:image/jpeg;base64,AAAA")).toEqual({ mimeType: "image/jpeg", data: "AAAA" });
  });

  it("should accept a data URL without parameters", () => {
    expect(imageAttachment("data:image/webp,CCCC")).toEqual({ mimeType: "image/webp", data: "CCCC" });
  });

  it("should use the default mime type for bare base64", () => {
    expect(imageAttachment("AAAA")).toEqual({ mimeType: DEFAULT_IMAGE_MIME_TYPE, data: "AAAA" });
  });

  it("should drop an unrecognized prefix before the first comma", () => {
    expect(imageAttachment("base64,BBBB")).toEqual({ mimeType: "image/png", data: "BBBB" });
  });
});
