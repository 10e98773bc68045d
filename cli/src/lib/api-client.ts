import type {
  CommonMoviesResponse,
  ErrorResponse,
  HealthResponse,
  MovieFields,
  MoviePageResponse,
  MovieSearchResponse,
  MovieUpdateResponse,
  MovieUsersResponse,
  UserRatingsResponse,
} from "./types.js";

export const DEFAULT_API = "http://localhost:5000";

export class ApiError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "ApiError";
  }
}

function isErrorResponse(value: unknown): value is ErrorResponse {
  return typeof value === "object" && value !== null && "error" in value && typeof value.error === "string";
}

/** The API's `error` field when the body is a structured error, else the raw text. */
export function errorDetail(text: string): string {
  try {
    const body: unknown = JSON.parse(text);
    return isErrorResponse(body) ? body.error : text;
  } catch {
    return text;
  }
}

function endpoint(api: string, path: string, query?: URLSearchParams): string {
  const qs = query?.toString();
  return `${api.replace(/\/$/, "")}${path}${qs ? `?${qs}` : ""}`;
}

async function request<T>(url: string, action: string, init: RequestInit = {}, accept: number[] = []): Promise<T> {
  const res = await fetch(url, init);
  if (!res.ok && !accept.includes(res.status)) {
    throw new ApiError(res.status, `${action} failed: ${res.status} ${errorDetail(await res.text())}`);
  }
  return (await res.json()) as T;
}

export async function listMovies(api: string, page?: number, limit?: number): Promise<MoviePageResponse> {
  const params = new URLSearchParams();
  if (page !== undefined) params.set("page", String(page));
  if (limit !== undefined) params.set("limit", String(limit));
  return request<MoviePageResponse>(endpoint(api, "/movies", params), "List movies");
}

export async function searchMovies(
  api: string,
  criteria: { name?: string; actor?: string },
): Promise<MovieSearchResponse> {
  const params = new URLSearchParams();
  if (criteria.name !== undefined) params.set("name", criteria.name);
  if (criteria.actor !== undefined) params.set("actor", criteria.actor);
  return request<MovieSearchResponse>(endpoint(api, "/movies/search", params), "Search");
}

export async function updateMovie(api: string, title: string, fields: MovieFields): Promise<MovieUpdateResponse> {
  return request<MovieUpdateResponse>(endpoint(api, `/movies/${encodeURIComponent(title)}`), "Update", {
    method: "PUT",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(fields),
  });
}

export async function getCommonMovies(api: string, sample?: number): Promise<CommonMoviesResponse> {
  const params = new URLSearchParams();
  if (sample !== undefined) params.set("sample", String(sample));
  return request<CommonMoviesResponse>(endpoint(api, "/movies/common", params), "Reconciliation");
}

export async function getMovieUsers(api: string, movie: string): Promise<MovieUsersResponse> {
  return request<MovieUsersResponse>(endpoint(api, `/movies/${encodeURIComponent(movie)}/users`), "Reviewer lookup");
}

export async function getUserRatings(api: string, user: string): Promise<UserRatingsResponse> {
  return request<UserRatingsResponse>(endpoint(api, `/users/${encodeURIComponent(user)}`), "User lookup");
}

/** A degraded service answers 503 with the same body, so both are results. */
export async function getHealth(api: string): Promise<HealthResponse> {
  return request<HealthResponse>(endpoint(api, "/health"), "Health check", {}, [503]);
}
