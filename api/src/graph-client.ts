import neo4j from "neo4j-driver";
import type { Neo4jConfig } from "./config.js";

export type GraphRow = Record<string, unknown>;

/** One read session; callers close it in a `finally` block. */
export interface GraphSession {
  run(query: string, params: Record<string, unknown>, timeoutMs: number): Promise<GraphRow[]>;
  close(): Promise<void>;
}

export interface GraphConnection {
  session(): GraphSession;
  close(): Promise<void>;
}

export interface CreateGraphOptions {
  timeoutMs: number;
}

export function createGraphConnection(
  config: Neo4jConfig,
  options: CreateGraphOptions,
): GraphConnection {
  const driver = neo4j.driver(config.uri, neo4j.auth.basic(config.user, config.password), {
    // Integers come back as JS numbers
    disableLosslessIntegers: true,
    connectionAcquisitionTimeout: options.timeoutMs,
    connectionTimeout: options.timeoutMs,
  });

  return {
    session() {
      const session = driver.session({
        defaultAccessMode: neo4j.session.READ,
        database: config.database,
      });
      return {
        async run(query, params, timeoutMs) {
          const result = await session.run(query, params, { timeout: timeoutMs });
          return result.records.map((record) => record.toObject());
        },
        close: () => session.close(),
      };
    },
    close: () => driver.close(),
  };
}
