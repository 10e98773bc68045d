import type { Command } from "commander";
import { DEFAULT_API, getMovieUsers } from "../lib/api-client.js";
import { logger } from "../lib/logger.js";
import { formatReviewer, plural } from "../lib/utils.js";

interface ReviewersOptions {
  api?: string;
}

export async function cmdReviewers(movie: string, options: ReviewersOptions): Promise<void> {
  const api = options.api || DEFAULT_API;

  const data = await getMovieUsers(api, movie);

  logger.result(data, [
    `${data.movie}: ${plural(data.users_count, "review")}`,
    ...data.users.map((reviewer) => `  - ${formatReviewer(reviewer)}`),
  ]);
}

export function registerReviewersCommand(program: Command): void {
  program
    .command("reviewers")
    .description("Show who reviewed the first movie whose title contains <movie>")
    .argument("<movie>", "Part of the movie title")
    .option("--api <url>", "filmbridge API URL", DEFAULT_API)
    .action(cmdReviewers);
}
