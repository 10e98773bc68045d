import type { Command } from "commander";
import { DEFAULT_API, searchMovies } from "../lib/api-client.js";
import { logger } from "../lib/logger.js";
import { formatMovie, plural, usage } from "../lib/utils.js";

interface SearchOptions {
  api?: string;
  name?: string;
  actor?: string;
}

export async function cmdSearch(options: SearchOptions): Promise<void> {
  const api = options.api || DEFAULT_API;
  const name = options.name?.trim() || undefined;
  const actor = options.actor?.trim() || undefined;

  if (!name && !actor) {
    usage("at least one of --name or --actor is required");
  }

  const data = await searchMovies(api, { name, actor });

  const lines = [`Found ${plural(data.count, "movie")}`];
  for (const movie of data.movies) {
    lines.push(`  ${formatMovie(movie)}`);
    if (movie.cast.length > 0) lines.push(`    cast: ${movie.cast.join(", ")}`);
  }
  logger.result(data, lines);
}

export function registerSearchCommand(program: Command): void {
  program
    .command("search")
    .description("Search movies by title and/or cast member (case-insensitive substring)")
    .option("--api <url>", "filmbridge API URL", DEFAULT_API)
    .option("--name <text>", "Part of the movie title")
    .option("--actor <text>", "Part of a cast member's name")
    .action(cmdSearch);
}
