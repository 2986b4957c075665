/**
 * Tests for process configuration loading
 */

import { describe, it, expect } from "vitest";
import * as path from "node:path";
import { ConfigurationError } from "../../errors.js";
import { DEFAULT_GEMINI_MODEL, loadConfig } from "../index.js";

describe("loadConfig", () => {
  it("should apply defaults to an empty environment", () => {
    expect(loadConfig({})).toEqual({
      cache: {
        dbPath: path.join(process.cwd(), ".cfg-lens", "data", "cache.sqlite"),
        ttlMs: 24 * 60 * 60 * 1000,
      },
      inference: {
        apiKey: undefined,
        modelId: DEFAULT_GEMINI_MODEL,
        requestTimeoutMs: 60_000,
      },
    });
  });

  it("should read every variable", () => {
    const config = loadConfig({
      CACHE_TTL_HOURS: "0.5",
      CACHE_DB_PATH: "/tmp/cache.sqlite",
      GOOGLE_API_KEY: "test-secret",
      GEMINI_MODEL: "gemini-test",
      LLM_TIMEOUT_MS: "1500",
    });

    expect(config).toEqual({
      cache: { dbPath: "/tmp/cache.sqlite", ttlMs: 30 * 60 * 1000 },
      inference: { apiKey: "test-secret", modelId: "gemini-test", requestTimeoutMs: 1500 },
    });
  });

  it("should ignore unrelated variables", () => {
    expect(loadConfig({ PATH: "/usr/bin", HOME: "/root" }).cache.ttlMs).toBe(86_400_000);
  });

  it.each([["abc"], ["0"], ["-2"]])("should reject CACHE_TTL_HOURS=%s", (value) => {
    expect(() => loadConfig({ CACHE_TTL_HOURS: value })).toThrow(ConfigurationError);
    expect(() => loadConfig({ CACHE_TTL_HOURS: value })).toThrow(/CACHE_TTL_HOURS/);
  });

  it("should reject a fractional timeout", () => {
    expect(() => loadConfig({ LLM_TIMEOUT_MS: "10.5" })).toThrow(/LLM_TIMEOUT_MS/);
  });
});
