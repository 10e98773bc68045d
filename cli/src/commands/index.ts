import type { Command } from "commander";
import { registerCommonCommand } from "./common.js";
import { registerHealthCommand } from "./health.js";
import { registerMoviesCommand } from "./movies.js";
import { registerReviewersCommand } from "./reviewers.js";
import { registerSearchCommand } from "./search.js";
import { registerUpdateCommand } from "./update.js";
import { registerUserCommand } from "./user.js";

export function registerCommands(program: Command): void {
  registerMoviesCommand(program);
  registerSearchCommand(program);
  registerUpdateCommand(program);
  registerCommonCommand(program);
  registerReviewersCommand(program);
  registerUserCommand(program);
  registerHealthCommand(program);
}
