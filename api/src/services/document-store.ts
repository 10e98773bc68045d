/**
 * DocumentStoreClient interface for the movie catalogue.
 * Implementations own all query-language details. Callers pass patterns
 * produced by the match normalizer and receive normalized records.
 */
import type { MovieRecord } from "../types.js";
import type { MatchPattern } from "./match.js";

export const SEARCH_RESULT_CAP = 50;

export interface MoviePage {
  records: MovieRecord[];
  /** Count over an empty filter, read independently of the page. */
  total: number;
}

export interface MovieSearch {
  title?: MatchPattern;
  cast?: MatchPattern;
}

/** Field updates keyed by read-model attribute name (`rating`, `year`, ...). */
export type MovieUpdate = Record<string, unknown>;

export interface UpdateOutcome {
  matchedCount: number;
  modifiedCount: number;
}

export interface DocumentStoreClient {
  listPage(skip: number, limit: number): Promise<MoviePage>;
  search(criteria: MovieSearch): Promise<MovieRecord[]>;
  updateByTitle(title: MatchPattern, fields: MovieUpdate): Promise<UpdateOutcome>;
  listAllTitles(sampleCap: number): Promise<Set<string>>;
  ping(): Promise<void>;
}
