import { MongoClient } from "mongodb";
import type { Collection, Db } from "mongodb";
import type { MongoConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import type { MovieDocument } from "./services/mongo-document-store.js";

export interface MongoConnection {
  client: MongoClient;
  db: Db;
  movies: Collection<MovieDocument>;
  ping(): Promise<void>;
  close(): Promise<void>;
}

export interface ConnectMongoOptions {
  timeoutMs: number;
  log?: (message: string) => void;
  warn?: (message: string) => void;
}

/**
 * Opens one pooled client for the process. Each driver operation checks a
 * connection out of the pool and returns it when the operation settles.
 */
export async function connectMongo(
  config: MongoConfig,
  options: ConnectMongoOptions,
): Promise<MongoConnection> {
  const client = new MongoClient(config.uri, {
    appName: "filmbridge",
    serverSelectionTimeoutMS: options.timeoutMs,
    connectTimeoutMS: options.timeoutMs,
  });

  // The driver reconnects on the next operation, so an unreachable server at
  // startup is reported by /health rather than aborting the process.
  try {
    await client.connect();
    options.log?.(`Connected to MongoDB database "${config.database}"`);
  } catch (err) {
    options.warn?.(`MongoDB is not reachable yet: ${errorMessage(err)}`);
  }

  const db = client.db(config.database);
  return {
    client,
    db,
    movies: db.collection<MovieDocument>(config.collection),
    async ping() {
      await db.command({ ping: 1 });
    },
    async close() {
      await client.close();
    },
  };
}
