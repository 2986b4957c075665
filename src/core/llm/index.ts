/**
 * Inference Module
 *
 * @module
 */

export * from "./interfaces/IInferenceService.js";
export {
  GeminiInferenceService,
  type GeminiInferenceServiceOptions,
  type GeminiModelsClient,
} from "./gemini-inference-service.js";
export { parseJsonResponse, extractJsonCandidates, type JsonObject, type ParseFailure } from "./json-response.js";
export { imageAttachment, DEFAULT_IMAGE_MIME_TYPE } from "./attachments.js";
