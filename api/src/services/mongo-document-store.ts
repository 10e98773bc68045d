import type {
  CountDocumentsOptions,
  Document,
  Filter,
  FindOptions,
  UpdateFilter,
  UpdateOptions,
} from "mongodb";
import { NotFoundError, ValidationError, withBackend } from "../errors.js";
import type { MovieRecord } from "../types.js";
import type {
  DocumentStoreClient,
  MoviePage,
  MovieSearch,
  MovieUpdate,
  UpdateOutcome,
} from "./document-store.js";
import { SEARCH_RESULT_CAP } from "./document-store.js";
import type { MatchPattern } from "./match.js";

/** Shape of a document in the movies collection (only the fields we read). */
export interface MovieDocument extends Document {
  title?: string | null;
  year?: number | string | null;
  genres?: string[];
  directors?: string[];
  cast?: string[];
  plot?: string | null;
  imdb?: { rating?: number | string | null };
}

/** The subset of `Collection<MovieDocument>` this store uses. */
export interface MovieCollection {
  find(filter: Filter<MovieDocument>, options: FindOptions): { toArray(): Promise<MovieDocument[]> };
  countDocuments(filter: Filter<MovieDocument>, options: CountDocumentsOptions): Promise<number>;
  updateOne(
    filter: Filter<MovieDocument>,
    update: UpdateFilter<MovieDocument>,
    options: UpdateOptions,
  ): Promise<UpdateOutcome>;
}

export interface MongoDocumentStoreOptions {
  timeoutMs: number;
  ping: () => Promise<unknown>;
}

export const MOVIE_PROJECTION = {
  _id: 0,
  title: 1,
  year: 1,
  genres: 1,
  directors: 1,
  cast: 1,
  plot: 1,
  "imdb.rating": 1,
} as const;

const TITLE_PROJECTION = { _id: 0, title: 1 } as const;

// Read-model attribute → stored field path
const FIELD_PATHS: Record<string, string> = {
  rating: "imdb.rating",
};

const IDENTITY_FIELDS = new Set(["_id", "title"]);

function toStrings(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === "string");
}

function toNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function toText(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

export function toMovieRecord(doc: MovieDocument): MovieRecord {
  return {
    title: toText(doc.title),
    year: toNumber(doc.year),
    genres: toStrings(doc.genres),
    directors: toStrings(doc.directors),
    cast: toStrings(doc.cast),
    plot: toText(doc.plot),
    rating: toNumber(doc.imdb?.rating),
  };
}

/**
 * Builds the `$set` document for a partial update. Identity fields are
 * dropped so a title is never rewritten through this path.
 */
export function toSetDocument(fields: MovieUpdate): Document {
  const set: Document = {};
  for (const [key, value] of Object.entries(fields)) {
    if (IDENTITY_FIELDS.has(key)) continue;
    // Operators, empty names and paths into the identity fields are refused by the server
    const root = key.split(".")[0];
    if (key.length === 0 || key.startsWith("$") || IDENTITY_FIELDS.has(root)) {
      throw new ValidationError(`Field '${key}' cannot be updated`);
    }
    set[FIELD_PATHS[key] ?? key] = value;
  }
  return set;
}

export class MongoDocumentStore implements DocumentStoreClient {
  constructor(
    private readonly movies: MovieCollection,
    private readonly options: MongoDocumentStoreOptions,
  ) {}

  async listPage(skip: number, limit: number): Promise<MoviePage> {
    const maxTimeMS = this.options.timeoutMs;
    return withBackend("mongodb", async () => {
      // No sort: natural order. The count is a separate read.
      const [docs, total] = await Promise.all([
        this.movies.find({}, { projection: MOVIE_PROJECTION, skip, limit, maxTimeMS }).toArray(),
        this.movies.countDocuments({}, { maxTimeMS }),
      ]);
      return { records: docs.map(toMovieRecord), total };
    });
  }

  async search(criteria: MovieSearch): Promise<MovieRecord[]> {
    if (!criteria.title && !criteria.cast) {
      throw new ValidationError("At least one of a title or cast pattern is required");
    }

    const filter: Filter<MovieDocument> = {
      ...(criteria.title ? { title: criteria.title.document } : {}),
      ...(criteria.cast ? { cast: criteria.cast.document } : {}),
    };

    return withBackend("mongodb", async () => {
      const docs = await this.movies
        .find(filter, {
          projection: MOVIE_PROJECTION,
          limit: SEARCH_RESULT_CAP,
          maxTimeMS: this.options.timeoutMs,
        })
        .toArray();
      return docs.map(toMovieRecord);
    });
  }

  async updateByTitle(title: MatchPattern, fields: MovieUpdate): Promise<UpdateOutcome> {
    const set = toSetDocument(fields);
    if (Object.keys(set).length === 0) {
      throw new ValidationError("Request body must contain at least one field other than title");
    }

    return withBackend("mongodb", async () => {
      const result = await this.movies.updateOne(
        { title: title.document },
        { $set: set },
        { maxTimeMS: this.options.timeoutMs },
      );
      if (result.matchedCount === 0) {
        throw new NotFoundError(`Movie not found in MongoDB: ${title.source}`);
      }
      return { matchedCount: result.matchedCount, modifiedCount: result.modifiedCount };
    });
  }

  async listAllTitles(sampleCap: number): Promise<Set<string>> {
    return withBackend("mongodb", async () => {
      const docs = await this.movies
        .find({}, { projection: TITLE_PROJECTION, limit: sampleCap, maxTimeMS: this.options.timeoutMs })
        .toArray();

      const titles = new Set<string>();
      for (const doc of docs) {
        if (typeof doc.title === "string" && doc.title.length > 0) {
          titles.add(doc.title);
        }
      }
      return titles;
    });
  }

  async ping(): Promise<void> {
    await withBackend("mongodb", this.options.ping);
  }
}
