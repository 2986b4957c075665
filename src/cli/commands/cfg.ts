/**
 * cfg command - Convert a pseudocode file into a control-flow graph
 */

import * as fs from "node:fs";
import { loadConfig } from "../../core/config/index.js";
import { createAnalysisService } from "../../core/analyzer/index.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("cfg");

export async function cfgCommand(file: string): Promise<void> {
  const pseudocode = fs.readFileSync(file, "utf-8");
  logger.debug({ file, length: pseudocode.length }, "Converting pseudocode");

  const service = await createAnalysisService(loadConfig());
  const graph = await service.pseudocodeToCfg(pseudocode);

  console.log(JSON.stringify(graph, null, 2));
}
