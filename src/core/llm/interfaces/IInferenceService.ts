/**
 * Inference Service Interface
 *
 * Black-box boundary to the generative model. Implementations return the
 * model's raw text; interpreting it is the caller's job.
 */

/**
 * Binary payload sent alongside the prompt (e.g. a flowchart image)
 */
export interface Attachment {
  mimeType: string;
  /** Base64-encoded bytes, without a data-URL prefix */
  data: string;
}

export interface IInferenceService {
  /** Model identifier requests are sent to */
  readonly modelId: string;

  /**
   * Run one generation request.
   *
   * @throws {TransportError} when the call fails or exceeds its timeout
   */
  invoke(prompt: string, attachments?: Attachment[]): Promise<string>;
}
