/**
 * flowchart command - Read a flowchart image and print its control-flow graph
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { loadConfig } from "../../core/config/index.js";
import { createAnalysisService } from "../../core/analyzer/index.js";
import { DEFAULT_IMAGE_MIME_TYPE } from "../../core/llm/attachments.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("flowchart");

const MIME_TYPES: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".webp": "image/webp",
};

/**
 * Encode an image file as a data URL so the mime type travels with it
 */
export function toDataUrl(file: string, bytes: Buffer): string {
  const mimeType = MIME_TYPES[path.extname(file).toLowerCase()] ?? DEFAULT_IMAGE_MIME_TYPE;
  return `data:${mimeType};base64,${bytes.toString("base64")}`;
}

export async function flowchartCommand(image: string): Promise<void> {
  const bytes = fs.readFileSync(image);
  logger.debug({ image, size: bytes.length }, "Converting flowchart");

  const service = await createAnalysisService(loadConfig());
  const graph = await service.flowchartToCfg(toDataUrl(image, bytes));

  console.log(JSON.stringify(graph, null, 2));
}
