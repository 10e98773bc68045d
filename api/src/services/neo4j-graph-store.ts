import neo4j from "neo4j-driver";
import { NotFoundError, withBackend } from "../errors.js";
import type { GraphConnection, GraphRow } from "../graph-client.js";
import type { MovieReviewers, PersonRatings, RatedMovie, Reviewer } from "../types.js";
import type { GraphStoreClient } from "./graph-store.js";

// Candidates are ordered by title so the chosen movie is stable; the optional
// match keeps movies that have no reviews, which then collect one all-null entry.
export const REVIEWERS_QUERY = `
  MATCH (m:Movie)
  WHERE m.title =~ $pattern
  WITH m ORDER BY m.title LIMIT 1
  OPTIONAL MATCH (p:Person)-[r:REVIEWED]->(m)
  RETURN m.title AS title,
         collect({ name: p.name, rating: r.rating, summary: r.summary }) AS reviewers
`;

export const RATINGS_QUERY = `
  MATCH (p:Person)
  WHERE p.name =~ $pattern
  WITH p ORDER BY p.name LIMIT 1
  OPTIONAL MATCH (p)-[r:REVIEWED]->(m:Movie)
  RETURN p.name AS name,
         p.born AS born,
         collect({ title: m.title, released: m.released, rating: r.rating, summary: r.summary }) AS movies
`;

export const TITLES_QUERY = `
  MATCH (m:Movie)
  WHERE m.title IS NOT NULL
  RETURN DISTINCT m.title AS title
  LIMIT $cap
`;

export const PING_QUERY = "RETURN 1 AS ok";

function isRow(value: unknown): value is GraphRow {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function rows(value: unknown): GraphRow[] {
  return Array.isArray(value) ? value.filter(isRow) : [];
}

function text(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function num(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (neo4j.isInt(value)) return value.toNumber();
  return null;
}

export function toReviewers(value: unknown): Reviewer[] {
  const reviewers: Reviewer[] = [];
  for (const entry of rows(value)) {
    const name = text(entry.name);
    // Placeholder from a movie with no REVIEWED edges
    if (name === null) continue;
    reviewers.push({ name, rating: num(entry.rating), summary: text(entry.summary) });
  }
  return reviewers;
}

export function toRatedMovies(value: unknown): RatedMovie[] {
  const movies: RatedMovie[] = [];
  for (const entry of rows(value)) {
    const title = text(entry.title);
    if (title === null) continue;
    movies.push({
      title,
      released: num(entry.released),
      rating: num(entry.rating),
      summary: text(entry.summary),
    });
  }
  return movies;
}

export class Neo4jGraphStore implements GraphStoreClient {
  constructor(
    private readonly connection: GraphConnection,
    private readonly timeoutMs: number,
  ) {}

  private read(query: string, params: Record<string, unknown> = {}): Promise<GraphRow[]> {
    return withBackend("neo4j", async () => {
      const session = this.connection.session();
      let failed = false;
      try {
        return await session.run(query, params, this.timeoutMs);
      } catch (err) {
        failed = true;
        throw err;
      } finally {
        try {
          await session.close();
        } catch (closeErr) {
          // The query's own error wins over a failed close
          if (!failed) throw closeErr;
        }
      }
    });
  }

  async reviewersOf(titlePattern: string): Promise<MovieReviewers> {
    const [record] = await this.read(REVIEWERS_QUERY, { pattern: titlePattern });
    const title = record ? text(record.title) : null;
    if (!record || title === null) {
      throw new NotFoundError("Movie not found in Neo4j");
    }
    return { title, reviewers: toReviewers(record.reviewers) };
  }

  async moviesRatedBy(namePattern: string): Promise<PersonRatings> {
    const [record] = await this.read(RATINGS_QUERY, { pattern: namePattern });
    const name = record ? text(record.name) : null;
    if (!record || name === null) {
      throw new NotFoundError("User not found in Neo4j");
    }

    const ratedMovies = toRatedMovies(record.movies);
    return {
      name,
      born: num(record.born),
      ratedCount: new Set(ratedMovies.map((m) => m.title)).size,
      ratedMovies,
    };
  }

  async allMovieTitles(sampleCap: number): Promise<Set<string>> {
    // LIMIT rejects floats, so the cap goes over the wire as a Neo4j integer
    const records = await this.read(TITLES_QUERY, { cap: neo4j.int(sampleCap) });
    const titles = new Set<string>();
    for (const record of records) {
      const title = text(record.title);
      if (title) titles.add(title);
    }
    return titles;
  }

  async ping(): Promise<void> {
    await this.read(PING_QUERY);
  }
}
