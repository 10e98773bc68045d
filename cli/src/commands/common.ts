import type { Command } from "commander";
import { DEFAULT_API, getCommonMovies } from "../lib/api-client.js";
import { logger } from "../lib/logger.js";
import { parsePositiveInt, usage } from "../lib/utils.js";

interface CommonOptions {
  api?: string;
  sample?: string;
}

export async function cmdCommon(options: CommonOptions): Promise<void> {
  const api = options.api || DEFAULT_API;
  const sample = parsePositiveInt(options.sample);

  if (sample === null) usage(`--sample must be a positive integer, got: ${options.sample}`);

  const data = await getCommonMovies(api, sample);

  logger.result(data, [
    `MongoDB titles: ${data.mongodb_count}`,
    `Neo4j titles:   ${data.neo4j_count}`,
    `In both:        ${data.common_count}`,
    ...data.common_movies.map((title) => `  - ${title}`),
  ]);
}

export function registerCommonCommand(program: Command): void {
  program
    .command("common")
    .description("Compare movie titles held by MongoDB and Neo4j")
    .option("--api <url>", "filmbridge API URL", DEFAULT_API)
    .option("--sample <n>", "Titles sampled from each store (default set by the server)")
    .action(cmdCommon);
}
