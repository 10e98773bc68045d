import Fastify from "fastify";
import type { FastifyBaseLogger } from "fastify";
import cors from "@fastify/cors";
import rateLimit from "@fastify/rate-limit";
import type { HttpConfig } from "./config.js";
import { loadConfig } from "./config.js";
import { registerErrorHandler } from "./errors.js";
import {
  listMoviesSchema,
  searchMoviesSchema,
  updateMovieSchema,
  commonMoviesSchema,
  movieUsersSchema,
  userRatingsSchema,
} from "./schemas.js";
import type { FederationDeps, ListMoviesParams, SearchMoviesParams } from "./services/federation.js";
import {
  listMovies,
  searchMovies,
  updateMovie,
  commonMovies,
  movieUsers,
  userRatings,
  endpointIndex,
} from "./services/federation.js";
import { checkHealth } from "./services/health.js";

export interface BuildAppOptions {
  http?: HttpConfig;
  /**
   * Overrides the pino logger built from `http.logLevel`. Startup passes the
   * instance it has already logged through; tests pass `false`.
   */
  logger?: boolean | FastifyBaseLogger;
}

interface NameParams {
  name: string;
}

export function buildApp(deps: FederationDeps, options: BuildAppOptions = {}) {
  const http = options.http ?? loadConfig().http;
  const app = Fastify({
    logger: options.logger ?? { level: http.logLevel },
    trustProxy: http.trustProxy,
    bodyLimit: http.bodyLimit,
  });
  registerErrorHandler(app);

  // CORS is disabled unless CORS_ORIGIN names one or more origins
  app.register(cors, {
    origin: http.corsOrigin,
  });

  app.setNotFoundHandler(async (req, reply) => {
    return reply.code(404).send({ success: false, error: `Route not found: ${req.method} ${req.url}` });
  });

  // Probes and the index are never throttled
  app.get("/", async () => endpointIndex());

  app.get("/health", async (_req, reply) => {
    const health = await checkHealth(deps);
    return reply.code(health.status === "healthy" ? 200 : 503).send(health);
  });

  // Everything in this scope is rate limited per client address
  app.register(async (api) => {
    await api.register(rateLimit, {
      max: http.rateLimitMax,
      timeWindow: "1 minute",
    });

    api.get<{ Querystring: ListMoviesParams }>("/movies", { schema: listMoviesSchema }, async (req) => {
      return listMovies(deps, req.query);
    });

    api.get<{ Querystring: SearchMoviesParams }>(
      "/movies/search",
      { schema: searchMoviesSchema },
      async (req) => searchMovies(deps, req.query),
    );

    api.get<{ Querystring: { sample?: number } }>(
      "/movies/common",
      { schema: commonMoviesSchema },
      async (req) => commonMovies(deps, req.query.sample),
    );

    api.put<{ Params: NameParams; Body: unknown }>(
      "/movies/:name",
      { schema: updateMovieSchema },
      async (req) => updateMovie(deps, req.params.name, req.body),
    );

    api.get<{ Params: NameParams }>(
      "/movies/:name/users",
      { schema: movieUsersSchema },
      async (req) => movieUsers(deps, req.params.name),
    );

    api.get<{ Params: NameParams }>(
      "/users/:name",
      { schema: userRatingsSchema },
      async (req) => userRatings(deps, req.params.name),
    );
  });

  return app;
}
