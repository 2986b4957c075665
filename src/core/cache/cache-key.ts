/**
 * Cache Key Generation
 *
 * @module
 */

import { createHash } from "node:crypto";

/** Separator placed between the call type and each content part */
export const KEY_PART_SEPARATOR = "||";

/**
 * Derive the content hash for a call type and its content parts.
 *
 * Returns a 64-character lowercase SHA-256 hex digest of
 * `callType || part1 || part2 ...`.
 */
export function generateCacheKey(callType: string, ...parts: string[]): string {
  const combined = [callType, ...parts].join(KEY_PART_SEPARATOR);
  return createHash("sha256").update(combined, "utf8").digest("hex");
}

/**
 * Serialize a JSON-compatible value with object keys sorted at every depth,
 * so structurally equal values always produce the same string.
 *
 * `undefined` object members are skipped and non-finite numbers become
 * `null`, matching `JSON.stringify`.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeysDeep(value));
}

function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeysDeep);
  }
  if (value !== null && typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, member] of entries) {
      sorted[key] = sortKeysDeep(member);
    }
    return sorted;
  }
  return value;
}
