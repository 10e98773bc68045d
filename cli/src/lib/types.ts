// Response bodies of the filmbridge HTTP API

export interface Movie {
  title: string | null;
  year: number | null;
  genres: string[];
  directors: string[];
  cast: string[];
  plot: string | null;
  rating: number | null;
}

export interface MoviePageResponse {
  success: true;
  page: number;
  limit: number;
  total: number;
  count: number;
  movies: Movie[];
}

export interface MovieSearchResponse {
  success: true;
  count: number;
  movies: Movie[];
}

export interface MovieUpdateResponse {
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

export interface Reviewer {
  name: string;
  rating: number | null;
  summary: string | null;
}

export interface MovieUsersResponse {
  success: true;
  movie: string;
  users_count: number;
  users: Reviewer[];
}

export interface RatedMovie {
  title: string;
  released: number | null;
  rating: number | null;
  summary: string | null;
}

export interface UserRatingsResponse {
  success: true;
  user: string;
  born: number | null;
  movies_rated_count: number;
  rated_movies: RatedMovie[];
}

export interface StoreStatus {
  status: "connected" | "disconnected";
  error: string | null;
}

export interface HealthResponse {
  mongodb: StoreStatus;
  neo4j: StoreStatus;
  status: "healthy" | "degraded";
}

export interface ErrorResponse {
  success: false;
  error: string;
}

export type MovieFields = Record<string, unknown>;
