import type { Command } from "commander";
import { DEFAULT_API, getUserRatings } from "../lib/api-client.js";
import { logger } from "../lib/logger.js";
import { formatRatedMovie, plural } from "../lib/utils.js";

interface UserOptions {
  api?: string;
}

export async function cmdUser(name: string, options: UserOptions): Promise<void> {
  const api = options.api || DEFAULT_API;

  const data = await getUserRatings(api, name);

  const who = data.born === null ? data.user : `${data.user} (born ${data.born})`;
  logger.result(data, [
    `${who} rated ${plural(data.movies_rated_count, "movie")}`,
    ...data.rated_movies.map((movie) => `  - ${formatRatedMovie(movie)}`),
  ]);
}

export function registerUserCommand(program: Command): void {
  program
    .command("user")
    .description("Show the movies rated by the first person whose name contains <name>")
    .argument("<name>", "Part of the person's name")
    .option("--api <url>", "filmbridge API URL", DEFAULT_API)
    .action(cmdUser);
}
