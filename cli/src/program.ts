import { Command } from "commander";
import { registerCommands } from "./commands/index.js";
import { logger } from "./lib/logger.js";
import type { LoggerOptions } from "./lib/logger.js";

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("filmbridge")
    .description("Query and reconcile the MongoDB movie catalogue and the Neo4j review graph")
    .version("0.1.0")
    .option("--json", "Print raw JSON responses", false)
    .option("--quiet", "Suppress everything except errors", false)
    .hook("preAction", (thisCommand) => {
      logger.setOptions(thisCommand.opts<LoggerOptions>());
    });

  registerCommands(program);
  return program;
}
