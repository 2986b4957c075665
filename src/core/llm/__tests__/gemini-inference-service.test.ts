/**
 * Tests for the Gemini inference service
 */

import { describe, it, expect, vi } from "vitest";
import { ErrorCode, TransportError } from "../../errors.js";
import type { GenerateContentParameters } from "@google/genai";
import { GeminiInferenceService, type GeminiModelsClient } from "../gemini-inference-service.js";

function createService(client: GeminiModelsClient, requestTimeoutMs = 1000): GeminiInferenceService {
  return new GeminiInferenceService({
    modelId: "test-model",
    apiKey: "test-secret",
    requestTimeoutMs,
    client,
  });
}

describe("GeminiInferenceService", () => {
  it("should send the prompt and attachments as one user turn", async () => {
    const generateContent = vi.fn().mockResolvedValue({ text: '{"nodes": []}' });
    const service = createService({ generateContent });

    const text = await service.invoke("Convert this", [{ mimeType: "image/png", data: "AAAA" }]);

    expect(text).toBe('{"nodes": []}');
    expect(generateContent).toHaveBeenCalledWith({
      model: "test-model",
      contents: [
        {
          role: "user",
          parts: [{ text: "Convert this" }, { inlineData: { mimeType: "image/png", data: "AAAA" } }],
        },
      ],
      config: { abortSignal: expect.any(AbortSignal) },
    });
  });

  it.each([[{}], [{ text: "  \n" }]])("should treat %j as an empty response", async (response) => {
    const service = createService({ generateContent: vi.fn().mockResolvedValue(response) });

    await expect(service.invoke("prompt")).rejects.toMatchObject({
      name: "TransportError",
      message: "Gemini returned an empty response",
      code: ErrorCode.LLM_EMPTY_RESPONSE,
    });
  });

  it("should expose the configured model id", () => {
    expect(createService({ generateContent: vi.fn() }).modelId).toBe("test-model");
  });

  it("should wrap SDK failures in a TransportError", async () => {
    const service = createService({
      generateContent: vi.fn().mockRejectedValue(new Error("quota exceeded")),
    });

    const error = await service.invoke("prompt").catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      message: "Gemini request failed: quota exceeded",
      code: ErrorCode.LLM_INFERENCE_FAILED,
      model: "test-model",
    });
  });

  it("should fail with a timeout TransportError when the model does not answer", async () => {
    const service = createService({ generateContent: () => new Promise<{ text?: string }>(() => {}) }, 20);

    const error = await service.invoke("prompt").catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      message: "Gemini request exceeded 20ms",
      code: ErrorCode.LLM_TIMEOUT,
    });
  });

  it("should abort the request once the timeout fires", async () => {
    const generateContent = vi.fn(
      (_params: GenerateContentParameters) => new Promise<{ text?: string }>(() => {})
    );
    const service = createService({ generateContent }, 20);

    await expect(service.invoke("prompt")).rejects.toMatchObject({ code: ErrorCode.LLM_TIMEOUT });

    const signal = generateContent.mock.calls[0]?.[0].config?.abortSignal;
    expect(signal?.aborted).toBe(true);
  });

  it("should leave a completed request unaborted", async () => {
    const generateContent = vi.fn(async (_params: GenerateContentParameters) => ({ text: "{}" }));
    const service = createService({ generateContent });

    await service.invoke("prompt");

    expect(generateContent.mock.calls[0]?.[0].config?.abortSignal?.aborted).toBe(false);
  });

  it("should refuse to run without an API key", async () => {
    const service = new GeminiInferenceService({ modelId: "test-model", requestTimeoutMs: 1000 });

    await expect(service.invoke("prompt")).rejects.toMatchObject({
      name: "TransportError",
      code: ErrorCode.LLM_CONNECTION_FAILED,
    });
  });
});
