import { pino } from "pino";
import type { Logger } from "pino";
import { buildApp } from "./server.js";
import { loadConfig, validateConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { connectMongo } from "./db.js";
import { createGraphConnection } from "./graph-client.js";
import { MongoDocumentStore } from "./services/mongo-document-store.js";
import { Neo4jGraphStore } from "./services/neo4j-graph-store.js";
import { fileURLToPath } from "node:url";
import path from "node:path";

/** Logs every configuration problem and reports whether startup may continue. */
export function checkConfig(config: AppConfig, log: Logger): boolean {
  const configErrors = validateConfig(config);
  if (configErrors.length > 0) {
    log.error("Configuration validation failed:");
    configErrors.forEach((error) => log.error(`  - ${error}`));
    return false;
  }

  log.info("Configuration validation passed");
  return true;
}

export async function init(config: AppConfig, log: Logger) {
  const mongo = await connectMongo(config.mongo, {
    timeoutMs: config.queryTimeoutMs,
    log: (message) => log.info(message),
    warn: (message) => log.warn(message),
  });
  const graph = createGraphConnection(config.neo4j, { timeoutMs: config.queryTimeoutMs });

  // The app logs through the same pino instance as startup
  const app = buildApp(
    {
      documents: new MongoDocumentStore(mongo.movies, {
        timeoutMs: config.queryTimeoutMs,
        ping: () => mongo.ping(),
      }),
      graph: new Neo4jGraphStore(graph, config.queryTimeoutMs),
      match: { escape: config.escapePatterns },
      sampleCap: config.sampleCap,
    },
    { http: config.http, logger: log },
  );

  app.addHook("onClose", async () => {
    await Promise.all([mongo.close(), graph.close()]);
  });

  app.log.info(
    { sampleCap: config.sampleCap, queryTimeoutMs: config.queryTimeoutMs, escapePatterns: config.escapePatterns },
    "Store clients initialised",
  );
  return app;
}

async function main() {
  const config = loadConfig();
  const log = pino({ level: config.http.logLevel });
  if (!checkConfig(config, log)) {
    process.exit(1);
  }

  const app = await init(config, log);
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.log.info(`Received ${signal}, shutting down`);
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, "Shutdown failed");
          process.exit(1);
        },
      );
    });
  }

  await app.listen({ port: config.http.port, host: config.http.host });
}

// Only run when this file is executed directly
const entrypointPath = process.argv[1] ? path.resolve(process.argv[1]) : "";

if (entrypointPath && fileURLToPath(import.meta.url) === entrypointPath) {
  main().catch((err: unknown) => {
    console.error("Server startup failed:", err);
    process.exit(1);
  });
}
