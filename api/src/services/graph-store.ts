/**
 * GraphStoreClient interface for the review graph
 * `(:Person)-[:REVIEWED]->(:Movie)`. Implementations collapse traversal
 * fan-out into nested collections; callers never see Cypher.
 */
import type { MovieReviewers, PersonRatings } from "../types.js";

export interface GraphStoreClient {
  /** Throws NotFoundError when no movie title matches `titlePattern`. */
  reviewersOf(titlePattern: string): Promise<MovieReviewers>;
  /** Throws NotFoundError when no person name matches `namePattern`. */
  moviesRatedBy(namePattern: string): Promise<PersonRatings>;
  allMovieTitles(sampleCap: number): Promise<Set<string>>;
  ping(): Promise<void>;
}
