import type { Command } from "commander";
import { DEFAULT_API, updateMovie } from "../lib/api-client.js";
import { logger } from "../lib/logger.js";
import { collect, parseAssignment, usage } from "../lib/utils.js";
import type { MovieFields } from "../lib/types.js";

interface UpdateOptions {
  api?: string;
  set?: string[];
}

export async function cmdUpdate(title: string, options: UpdateOptions): Promise<void> {
  const api = options.api || DEFAULT_API;
  const pairs = options.set ?? [];

  if (!title.trim()) usage("a movie title is required");
  if (pairs.length === 0) usage("at least one --set field=value is required");

  const fields: MovieFields = {};
  for (const pair of pairs) {
    const assignment = parseAssignment(pair);
    if (!assignment) usage(`invalid --set value "${pair}", expected field=value`);
    const [field, value] = assignment;
    fields[field] = value;
  }

  const data = await updateMovie(api, title, fields);
  logger.result(data, [data.message]);
}

export function registerUpdateCommand(program: Command): void {
  program
    .command("update")
    .description("Update fields of the movie whose title equals <title>, ignoring case")
    .argument("<title>", "Exact movie title")
    .option("--api <url>", "filmbridge API URL", DEFAULT_API)
    .option("--set <field=value>", "Field to set; JSON values are decoded (repeatable)", collect, [])
    .action(cmdUpdate);
}
