#!/usr/bin/env node

/**
 * cfg-lens CLI
 * Control-flow graphs from pseudocode and flowcharts, plus cache administration
 */

import { Command } from "commander";
import chalk from "chalk";
import { cfgCommand } from "./commands/cfg.js";
import { flowchartCommand } from "./commands/flowchart.js";
import { cacheStatsCommand, cacheSweepCommand } from "./commands/cache.js";
import { wrapError } from "../core/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli");

const program = new Command();

program
  .name("cfg-lens")
  .description("Derive control-flow graphs from pseudocode and flowchart images")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("cfg")
  .description("Convert a pseudocode file into a control-flow graph (JSON)")
  .argument("<file>", "Pseudocode file")
  .action(cfgCommand);

program
  .command("flowchart")
  .description("Convert a flowchart image into a control-flow graph (JSON)")
  .argument("<image>", "Image file (png, jpeg, gif, webp)")
  .action(flowchartCommand);

const cache = program.command("cache").description("Manage the response cache");

cache
  .command("stats")
  .description("Show cache entry and hit counts")
  .option("--json", "Print statistics as JSON")
  .action(cacheStatsCommand);

cache
  .command("sweep")
  .description("Delete expired cache entries")
  .action(cacheSweepCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
  const wrapped = wrapError(error);
  logger.error({ err: wrapped }, "CLI error occurred");
  console.error(chalk.red(`\nError [${wrapped.code}]: ${wrapped.message}`));
  if (process.env.DEBUG || process.env.NODE_ENV === "development") {
    console.error(chalk.dim(wrapped.stack));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

program.parseAsync(process.argv).catch(handleError);
