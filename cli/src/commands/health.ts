import type { Command } from "commander";
import { DEFAULT_API, getHealth } from "../lib/api-client.js";
import { logger } from "../lib/logger.js";
import type { StoreStatus } from "../lib/types.js";

interface HealthOptions {
  api?: string;
}

function describeStore(label: string, store: StoreStatus): string {
  return store.error ? `${label}: ${store.status} (${store.error})` : `${label}: ${store.status}`;
}

/** Resolves `true` when both stores are reachable. */
export async function cmdHealth(options: HealthOptions): Promise<boolean> {
  const api = options.api || DEFAULT_API;

  const data = await getHealth(api);

  logger.result(data, [
    describeStore("MongoDB", data.mongodb),
    describeStore("Neo4j", data.neo4j),
    `Status: ${data.status}`,
  ]);
  return data.status === "healthy";
}

export function registerHealthCommand(program: Command): void {
  program
    .command("health")
    .description("Check connectivity to both stores; exits 1 when degraded")
    .option("--api <url>", "filmbridge API URL", DEFAULT_API)
    .action(async (options: HealthOptions) => {
      if (!(await cmdHealth(options))) process.exitCode = 1;
    });
}
