// Shared domain types for both stores

export interface MovieRecord {
  title: string | null;
  year: number | null;
  genres: string[];
  directors: string[];
  cast: string[];
  plot: string | null;
  rating: number | null;
}

export interface Reviewer {
  name: string;
  rating: number | null;
  summary: string | null;
}

export interface RatedMovie {
  title: string;
  released: number | null;
  rating: number | null;
  summary: string | null;
}

export interface MovieReviewers {
  title: string;
  reviewers: Reviewer[];
}

export interface PersonRatings {
  name: string;
  born: number | null;
  ratedCount: number;
  ratedMovies: RatedMovie[];
}

export interface ReconciliationResult {
  mongoCount: number;
  graphCount: number;
  commonCount: number;
  commonTitles: string[];
}

export type ProbeStatus = "connected" | "disconnected";

export interface ProbeResult {
  status: ProbeStatus;
  error: string | null;
}

export interface CompositeHealth {
  mongodb: ProbeResult;
  neo4j: ProbeResult;
  status: "healthy" | "degraded";
}
