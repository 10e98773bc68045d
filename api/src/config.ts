export interface MongoConfig {
  uri: string;
  database: string;
  collection: string;
}

export interface Neo4jConfig {
  uri: string;
  user: string;
  password: string;
  database?: string;
}

export interface HttpConfig {
  port: number;
  host: string;
  logLevel: string;
  trustProxy: boolean;
  bodyLimit: number;
  corsOrigin: string | string[] | false;
  rateLimitMax: number;
}

export interface AppConfig {
  mongo: MongoConfig;
  neo4j: Neo4jConfig;
  http: HttpConfig;
  /** Per-operation timeout applied to both stores. */
  queryTimeoutMs: number;
  /** Upper bound on titles sampled from each store by reconciliation. */
  sampleCap: number;
  /** Escape regex metacharacters in substring searches. */
  escapePatterns: boolean;
}

type Env = Record<string, string | undefined>;

const DEFAULT_BODY_LIMIT = 1_048_576;
const DEFAULT_QUERY_TIMEOUT_MS = 10_000;
export const DEFAULT_SAMPLE_CAP = 1000;
export const MAX_SAMPLE_CAP = 10_000;

function positiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(raw ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function parseCorsOrigin(raw: string | undefined): string | string[] | false {
  if (!raw) return false;
  const origins = raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  if (origins.length === 0) return false;
  return origins.length === 1 ? origins[0] : origins;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    mongo: {
      uri: env.MONGO_URI || "",
      database: env.MONGO_DB || "",
      collection: env.MONGO_COLLECTION || "movies",
    },
    neo4j: {
      uri: env.NEO4J_URI || "",
      user: env.NEO4J_USER || "neo4j",
      password: env.NEO4J_PASSWORD || "",
      database: env.NEO4J_DATABASE || undefined,
    },
    http: {
      port: positiveInt(env.PORT, 5000),
      host: env.HOST || "0.0.0.0",
      logLevel: env.LOG_LEVEL || "info",
      // Trust proxy only when explicitly enabled
      trustProxy: env.TRUST_PROXY === "true",
      bodyLimit: positiveInt(env.BODY_LIMIT_BYTES, DEFAULT_BODY_LIMIT),
      corsOrigin: parseCorsOrigin(env.CORS_ORIGIN),
      rateLimitMax: positiveInt(env.RATE_LIMIT_MAX, 100),
    },
    queryTimeoutMs: positiveInt(env.QUERY_TIMEOUT_MS, DEFAULT_QUERY_TIMEOUT_MS),
    sampleCap: Math.min(positiveInt(env.RECONCILE_SAMPLE_CAP, DEFAULT_SAMPLE_CAP), MAX_SAMPLE_CAP),
    escapePatterns: env.MATCH_ESCAPE_REGEX !== "false",
  };
}

/**
 * Validate required configuration.
 * Returns an array of error messages, or empty array if valid.
 */
export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [];

  if (!config.mongo.uri) {
    errors.push("MONGO_URI is required (e.g., mongodb://localhost:27017)");
  } else if (!/^mongodb(\+srv)?:\/\//.test(config.mongo.uri)) {
    errors.push("MONGO_URI must start with mongodb:// or mongodb+srv://");
  }

  if (!config.mongo.database) {
    errors.push("MONGO_DB is required (e.g., sample_mflix)");
  }

  if (!config.neo4j.uri) {
    errors.push("NEO4J_URI is required (e.g., neo4j://localhost:7687)");
  }

  if (!config.neo4j.password) {
    errors.push("NEO4J_PASSWORD is required");
  }

  return errors;
}
