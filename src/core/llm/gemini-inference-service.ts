/**
 * Gemini Inference Service
 *
 * Implements the inference boundary on the @google/genai SDK. Every call is
 * bounded by the configured timeout, and a request that runs past it is
 * aborted; any failure comes back as a TransportError so callers never
 * cache it.
 *
 * @module
 */

import { GoogleGenAI, type GenerateContentParameters, type Part } from "@google/genai";
import { ErrorCode, TransportError } from "../errors.js";
import { createLogger } from "../../utils/logger.js";
import { timeout, TimeoutError } from "../../utils/async.js";
import type { InferenceConfig } from "../config/index.js";
import type { Attachment, IInferenceService } from "./interfaces/IInferenceService.js";

const logger = createLogger("gemini");

/**
 * The slice of the SDK's `models` API this service calls
 */
export interface GeminiModelsClient {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string | undefined }>;
}

export interface GeminiInferenceServiceOptions extends InferenceConfig {
  /** Pre-built client; by default one is created from `apiKey` on first use */
  client?: GeminiModelsClient;
}

export class GeminiInferenceService implements IInferenceService {
  readonly modelId: string;
  private readonly apiKey?: string;
  private readonly requestTimeoutMs: number;
  private client: GeminiModelsClient | null;

  constructor(options: GeminiInferenceServiceOptions) {
    this.modelId = options.modelId;
    this.apiKey = options.apiKey;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.client = options.client ?? null;
  }

  async invoke(prompt: string, attachments: Attachment[] = []): Promise<string> {
    const client = this.getClient();
    const startTime = Date.now();

    const parts: Part[] = [
      { text: prompt },
      ...attachments.map((attachment) => ({
        inlineData: { mimeType: attachment.mimeType, data: attachment.data },
      })),
    ];

    const controller = new AbortController();
    let text: string;
    try {
      const response = await timeout(
        client.generateContent({
          model: this.modelId,
          contents: [{ role: "user", parts }],
          config: { abortSignal: controller.signal },
        }),
        this.requestTimeoutMs,
        `Gemini request exceeded ${this.requestTimeoutMs}ms`
      );
      text = response.text ?? "";
    } catch (error) {
      if (error instanceof TimeoutError) {
        controller.abort(error);
        logger.warn({ model: this.modelId, timeoutMs: error.timeoutMs }, "Gemini request timed out");
        throw new TransportError(error.message, ErrorCode.LLM_TIMEOUT, { model: this.modelId });
      }

      logger.error({ err: error, model: this.modelId }, "Gemini request failed");
      throw new TransportError(
        `Gemini request failed: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCode.LLM_INFERENCE_FAILED,
        { model: this.modelId }
      );
    }

    if (text.trim() === "") {
      logger.warn({ model: this.modelId }, "Gemini returned no text");
      throw new TransportError("Gemini returned an empty response", ErrorCode.LLM_EMPTY_RESPONSE, {
        model: this.modelId,
      });
    }

    logger.debug(
      {
        model: this.modelId,
        attachments: attachments.length,
        textLength: text.length,
        durationMs: Date.now() - startTime,
      },
      "Gemini request complete"
    );
    return text;
  }

  private getClient(): GeminiModelsClient {
    if (this.client) return this.client;

    if (!this.apiKey) {
      throw new TransportError(
        "Gemini API key not configured. Set GOOGLE_API_KEY.",
        ErrorCode.LLM_CONNECTION_FAILED,
        { model: this.modelId }
      );
    }

    try {
      this.client = new GoogleGenAI({ apiKey: this.apiKey }).models;
      return this.client;
    } catch (error) {
      throw new TransportError(`Cannot create Gemini client: ${String(error)}`, ErrorCode.LLM_CONNECTION_FAILED, {
        model: this.modelId,
      });
    }
  }
}
