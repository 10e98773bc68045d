#!/usr/bin/env node
import { buildProgram } from "./program.js";
import { logger } from "./lib/logger.js";

async function main() {
  await buildProgram().parseAsync(process.argv);
}

main().catch((err: unknown) => {
  logger.error("filmbridge: command failed", err);
  process.exit(1);
});
