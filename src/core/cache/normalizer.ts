/**
 * Pseudocode Normalizer
 *
 * Collapses inputs that differ only in comments, statement terminators,
 * whitespace layout or letter case to one canonical string, so they share a
 * cache key.
 *
 * @module
 */

const LINE_COMMENT_SLASHES = /\/\/.*$/gm;
const LINE_COMMENT_HASH = /#.*$/gm;
const BLOCK_COMMENT = /\/\*[\s\S]*?\*\//g;
const WHITESPACE_RUN = /\s+/g;

/**
 * Canonicalize pseudocode before hashing.
 *
 * Steps run in a fixed order; each consumes the previous step's output.
 *
 * @example
 * ```typescript
 * normalizeCode("IF x > 0 THEN  // positive\n  return true;");
 * // => "if x > 0 then return true"
 * ```
 */
export function normalizeCode(code: string): string {
  let text = code.replace(LINE_COMMENT_SLASHES, "");
  text = text.replace(LINE_COMMENT_HASH, "");
  text = text.replace(BLOCK_COMMENT, "");
  text = text.replaceAll(";", "");
  text = text.replace(WHITESPACE_RUN, " ");
  return text.trim().toLowerCase();
}
