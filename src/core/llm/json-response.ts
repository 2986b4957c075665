/**
 * Model Response Parsing
 *
 * Models often wrap JSON in a markdown fence or surround it with prose.
 * Parsing failures are values, not exceptions; the caller decides whether
 * to substitute a fallback or surface an error.
 *
 * @module
 */

import { err, ok, type Result } from "../../types/result.js";

export type JsonObject = Record<string, unknown>;

export interface ParseFailure {
  reason: "empty" | "invalid_json" | "not_object";
  message: string;
  /** Leading part of the offending text, for logs */
  preview: string;
}

const FENCED_BLOCK = /```([\w-]*)[ \t]*([\s\S]*?)```/g;
const PREVIEW_LENGTH = 200;

function preview(text: string): string {
  return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text;
}

/**
 * Likely JSON payloads in model text, most likely first: bodies of
 * `json`-tagged fences, then of the other fences in order, then the span from
 * the first `{` to the last `}`. Text with none of these yields itself,
 * trimmed. Empty candidates are left out.
 */
export function extractJsonCandidates(text: string): string[] {
  const tagged: string[] = [];
  const other: string[] = [];
  for (const match of text.matchAll(FENCED_BLOCK)) {
    const body = (match[2] ?? "").trim();
    if ((match[1] ?? "").toLowerCase() === "json") tagged.push(body);
    else other.push(body);
  }

  const candidates = [...tagged, ...other];
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start !== -1 && end > start) {
    candidates.push(text.slice(start, end + 1));
  }
  if (candidates.length === 0) {
    candidates.push(text.trim());
  }

  return [...new Set(candidates)].filter((candidate) => candidate !== "");
}

function parseCandidate(candidate: string, text: string): Result<JsonObject, ParseFailure> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch (error) {
    return err({
      reason: "invalid_json",
      message: error instanceof Error ? error.message : String(error),
      preview: preview(text),
    });
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return err({
      reason: "not_object",
      message: `Expected a JSON object, got ${Array.isArray(parsed) ? "array" : typeof parsed}`,
      preview: preview(text),
    });
  }

  return ok(Object.fromEntries(Object.entries(parsed)));
}

/**
 * Parse the first candidate that holds a JSON object. When none does, the
 * failure describes the most likely candidate.
 */
export function parseJsonResponse(text: string): Result<JsonObject, ParseFailure> {
  const candidates = extractJsonCandidates(text);
  const [first, ...rest] = candidates;
  if (first === undefined) {
    return err({ reason: "empty", message: "Response contained no text", preview: "" });
  }

  const result = parseCandidate(first, text);
  if (result.ok) return result;

  for (const candidate of rest) {
    const next = parseCandidate(candidate, text);
    if (next.ok) return next;
  }
  return result;
}
