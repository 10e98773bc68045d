import type { Command } from "commander";
import { DEFAULT_API, listMovies } from "../lib/api-client.js";
import { logger } from "../lib/logger.js";
import { formatMovie, parsePositiveInt, usage } from "../lib/utils.js";

interface MoviesOptions {
  api?: string;
  page?: string;
  limit?: string;
}

export async function cmdMovies(options: MoviesOptions): Promise<void> {
  const api = options.api || DEFAULT_API;
  const page = parsePositiveInt(options.page);
  const limit = parsePositiveInt(options.limit);

  if (page === null) usage(`--page must be a positive integer, got: ${options.page}`);
  if (limit === null) usage(`--limit must be a positive integer, got: ${options.limit}`);

  const data = await listMovies(api, page, limit);

  const first = (data.page - 1) * data.limit + 1;
  const header = data.count === 0
    ? `Page ${data.page}: no movies (${data.total} in total)`
    : `Page ${data.page}: movies ${first}-${first + data.count - 1} of ${data.total}`;
  logger.result(data, [header, ...data.movies.map((movie) => `  ${formatMovie(movie)}`)]);
}

export function registerMoviesCommand(program: Command): void {
  program
    .command("movies")
    .description("List movies from the document store, one page at a time")
    .option("--api <url>", "filmbridge API URL", DEFAULT_API)
    .option("--page <n>", "Page number, starting at 1")
    .option("--limit <n>", "Movies per page (max 100)")
    .action(cmdMovies);
}
