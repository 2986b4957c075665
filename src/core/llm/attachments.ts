/**
 * Image payload helpers
 */

import type { Attachment } from "./interfaces/IInferenceService.js";

const DATA_URL = /^data:([^;,]+)(?:;[^,]*)?,/;

export const DEFAULT_IMAGE_MIME_TYPE = "image/png";

/**
 * Split an optional `data:<mime>;base64,` prefix off a base64 image string.
 */
export function imageAttachment(base64Image: string): Attachment {
  const match = DATA_URL.exec(base64Image);
  if (match) {
    return {
      mimeType: match[1] ?? DEFAULT_IMAGE_MIME_TYPE,
      data: base64Image.slice(match[0].length),
    };
  }

  const comma = base64Image.indexOf(",");
  return {
    mimeType: DEFAULT_IMAGE_MIME_TYPE,
    data: comma === -1 ? base64Image : base64Image.slice(comma + 1),
  };
}
