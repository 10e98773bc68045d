/**
 * Request handlers for every endpoint. Each one validates its input, picks
 * the store(s) to call and shapes the response envelope; the query details
 * live in the store clients.
 */
import { ValidationError } from "../errors.js";
import type { MovieRecord, RatedMovie, Reviewer } from "../types.js";
import type { DocumentStoreClient, MovieUpdate } from "./document-store.js";
import type { GraphStoreClient } from "./graph-store.js";
import type { MatchOptions } from "./match.js";
import { buildMatch, requireFragment } from "./match.js";
import { reconcile } from "./reconciliation.js";

export interface FederationDeps {
  documents: DocumentStoreClient;
  graph: GraphStoreClient;
  match: MatchOptions;
  /** Default sample size per store for reconciliation. */
  sampleCap: number;
}

export const DEFAULT_PAGE = 1;
export const DEFAULT_LIMIT = 20;

export interface ListMoviesParams {
  page?: number;
  limit?: number;
}

export interface ListMoviesResponse {
  success: true;
  page: number;
  limit: number;
  total: number;
  count: number;
  movies: MovieRecord[];
}

export interface SearchMoviesParams {
  name?: string;
  actor?: string;
}

export interface SearchMoviesResponse {
  success: true;
  count: number;
  movies: MovieRecord[];
}

export interface UpdateMovieResponse {
  success: true;
  message: string;
  modified_count: number;
}

export interface CommonMoviesResponse {
  success: true;
  mongodb_count: number;
  neo4j_count: number;
  common_count: number;
  common_movies: string[];
}

export interface MovieUsersResponse {
  success: true;
  movie: string;
  users_count: number;
  users: Reviewer[];
}

export interface UserRatingsResponse {
  success: true;
  user: string;
  born: number | null;
  movies_rated_count: number;
  rated_movies: RatedMovie[];
}

function positive(value: number | undefined, field: string, fallback: number): number {
  if (value === undefined) return fallback;
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(`Parameter '${field}' must be a positive integer`);
  }
  return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function listMovies(
  deps: Pick<FederationDeps, "documents">,
  params: ListMoviesParams,
): Promise<ListMoviesResponse> {
  const page = positive(params.page, "page", DEFAULT_PAGE);
  const limit = positive(params.limit, "limit", DEFAULT_LIMIT);

  const { records, total } = await deps.documents.listPage((page - 1) * limit, limit);
  return { success: true, page, limit, total, count: records.length, movies: records };
}

export async function searchMovies(
  deps: Pick<FederationDeps, "documents" | "match">,
  params: SearchMoviesParams,
): Promise<SearchMoviesResponse> {
  if (params.name === undefined && params.actor === undefined) {
    throw new ValidationError("At least one of 'name' or 'actor' is required");
  }

  const title = params.name === undefined
    ? undefined
    : buildMatch(requireFragment(params.name, "name"), "substring", deps.match);
  const cast = params.actor === undefined
    ? undefined
    : buildMatch(requireFragment(params.actor, "actor"), "substring", deps.match);

  const movies = await deps.documents.search({ title, cast });
  return { success: true, count: movies.length, movies };
}

export async function updateMovie(
  deps: Pick<FederationDeps, "documents">,
  name: string,
  body: unknown,
): Promise<UpdateMovieResponse> {
  const title = requireFragment(name, "name");
  if (!isPlainObject(body) || Object.keys(body).length === 0) {
    throw new ValidationError("Request body must be a non-empty JSON object");
  }

  const fields: MovieUpdate = body;
  const { modifiedCount } = await deps.documents.updateByTitle(buildMatch(title, "exact"), fields);
  return {
    success: true,
    message: modifiedCount > 0 ? `Movie '${title}' updated` : `Movie '${title}' already up to date`,
    modified_count: modifiedCount,
  };
}

export async function commonMovies(
  deps: Pick<FederationDeps, "documents" | "graph" | "sampleCap">,
  sample?: number,
): Promise<CommonMoviesResponse> {
  const sampleCap = positive(sample, "sample", deps.sampleCap);
  const result = await reconcile(deps, sampleCap);
  return {
    success: true,
    mongodb_count: result.mongoCount,
    neo4j_count: result.graphCount,
    common_count: result.commonCount,
    common_movies: result.commonTitles,
  };
}

export async function movieUsers(
  deps: Pick<FederationDeps, "graph" | "match">,
  name: string,
): Promise<MovieUsersResponse> {
  const pattern = buildMatch(requireFragment(name, "name"), "substring", deps.match);
  const { title, reviewers } = await deps.graph.reviewersOf(pattern.graph);
  return { success: true, movie: title, users_count: reviewers.length, users: reviewers };
}

export async function userRatings(
  deps: Pick<FederationDeps, "graph" | "match">,
  name: string,
): Promise<UserRatingsResponse> {
  const pattern = buildMatch(requireFragment(name, "name"), "substring", deps.match);
  const person = await deps.graph.moviesRatedBy(pattern.graph);
  return {
    success: true,
    user: person.name,
    born: person.born,
    movies_rated_count: person.ratedCount,
    rated_movies: person.ratedMovies,
  };
}

export const ENDPOINTS = {
  "GET /": "This endpoint listing",
  "GET /health": "MongoDB and Neo4j connectivity",
  "GET /movies": "List movies from MongoDB (query: page, limit)",
  "GET /movies/search": "Search movies by title and/or cast member (query: name, actor)",
  "PUT /movies/:name": "Update fields of the movie whose title equals :name, ignoring case",
  "GET /movies/common": "Titles present in both MongoDB and Neo4j (query: sample)",
  "GET /movies/:name/users": "Users who reviewed the movie matching :name in Neo4j",
  "GET /users/:name": "Movies rated by the user matching :name in Neo4j",
} as const;

export function endpointIndex() {
  return { name: "filmbridge", endpoints: ENDPOINTS };
}
