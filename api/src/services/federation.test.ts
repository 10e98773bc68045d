import { describe, it, expect, vi } from "vitest";
import {
  listMovies,
  searchMovies,
  updateMovie,
  commonMovies,
  movieUsers,
  userRatings,
  endpointIndex,
  ENDPOINTS,
} from "./federation.js";
import type { FederationDeps } from "./federation.js";
import type { DocumentStoreClient, MovieSearch, MovieUpdate } from "./document-store.js";
import type { GraphStoreClient } from "./graph-store.js";
import type { MatchPattern } from "./match.js";
import type { MovieRecord } from "../types.js";
import { NotFoundError, ValidationError } from "../errors.js";

const inception: MovieRecord = {
  title: "Inception",
  year: 2010,
  genres: ["Action"],
  directors: ["Christopher Nolan"],
  cast: ["Leonardo DiCaprio"],
  plot: "A thief steals secrets through dreams.",
  rating: 8.8,
};

function makeDocuments(overrides: Partial<DocumentStoreClient> = {}) {
  return {
    listPage: vi.fn(async (_skip: number, _limit: number) => ({ records: [inception], total: 21349 })),
    search: vi.fn(async () => [inception]),
    updateByTitle: vi.fn(async () => ({ matchedCount: 1, modifiedCount: 1 })),
    listAllTitles: vi.fn(async () => new Set(["Inception", "The Matrix"])),
    ping: vi.fn(async () => {}),
    ...overrides,
  };
}

function makeGraph(overrides: Partial<GraphStoreClient> = {}) {
  return {
    reviewersOf: vi.fn(async () => ({
      title: "The Matrix",
      reviewers: [{ name: "Jessica Thompson", rating: 95, summary: "Brilliant" }],
    })),
    moviesRatedBy: vi.fn(async () => ({
      name: "Jessica Thompson",
      born: null,
      ratedCount: 1,
      ratedMovies: [{ title: "Cloud Atlas", released: 2012, rating: 95, summary: "An amazing journey" }],
    })),
    allMovieTitles: vi.fn(async () => new Set(["Inception", "Interstellar"])),
    ping: vi.fn(async () => {}),
    ...overrides,
  };
}

function searchSpy() {
  return vi.fn(async (_criteria: MovieSearch) => [inception]);
}

function makeDeps(documents = makeDocuments(), graph = makeGraph()) {
  const deps: FederationDeps = { documents, graph, match: { escape: true }, sampleCap: 1000 };
  return { deps, documents, graph };
}

describe("listMovies", () => {
  it("uses page 1 and limit 20 by default", async () => {
    const { deps, documents } = makeDeps();

    const result = await listMovies(deps, {});

    expect(documents.listPage).toHaveBeenCalledWith(0, 20);
    expect(result).toEqual({ success: true, page: 1, limit: 20, total: 21349, count: 1, movies: [inception] });
  });

  it("skips (page - 1) * limit records", async () => {
    const { deps, documents } = makeDeps();

    await listMovies(deps, { page: 3, limit: 10 });

    expect(documents.listPage).toHaveBeenCalledWith(20, 10);
  });

  it("reports an empty page past the end with the full total", async () => {
    const documents = makeDocuments({ listPage: vi.fn(async () => ({ records: [], total: 21349 })) });
    const { deps } = makeDeps(documents);

    const result = await listMovies(deps, { page: 5000, limit: 20 });

    expect(result.count).toBe(0);
    expect(result.total).toBe(21349);
  });

  it.each([0, -1, 1.5])("rejects page %s", async (page) => {
    const { deps, documents } = makeDeps();

    await expect(listMovies(deps, { page })).rejects.toThrow("Parameter 'page' must be a positive integer");
    expect(documents.listPage).not.toHaveBeenCalled();
  });
});

describe("searchMovies", () => {
  it("requires a title or an actor", async () => {
    const { deps } = makeDeps();

    await expect(searchMovies(deps, {})).rejects.toThrow("At least one of 'name' or 'actor' is required");
  });

  it("rejects a blank fragment", async () => {
    const { deps } = makeDeps();

    await expect(searchMovies(deps, { name: "  " })).rejects.toThrow("Parameter 'name' must not be empty");
  });

  it("builds substring patterns for both criteria", async () => {
    const search = searchSpy();
    const { deps } = makeDeps(makeDocuments({ search }));

    const result = await searchMovies(deps, { name: "incep", actor: "dicaprio" });

    const [criteria] = search.mock.lastCall ?? [];
    expect(criteria?.title?.graph).toBe("(?isu).*incep.*");
    expect(criteria?.cast?.document.test("Leonardo DiCaprio")).toBe(true);
    expect(result).toEqual({ success: true, count: 1, movies: [inception] });
  });

  it("leaves the title criterion unset for an actor-only search", async () => {
    const search = searchSpy();
    const { deps } = makeDeps(makeDocuments({ search }));

    await searchMovies(deps, { actor: "keanu" });

    const [criteria] = search.mock.lastCall ?? [];
    expect(criteria?.title).toBeUndefined();
    expect(criteria?.cast?.source).toBe("keanu");
  });

  it("honours disabled escaping", async () => {
    const search = searchSpy();
    const { deps } = makeDeps(makeDocuments({ search }));
    deps.match = { escape: false };

    await searchMovies(deps, { name: "^The" });

    const [criteria] = search.mock.lastCall ?? [];
    expect(criteria?.title?.graph).toBe("(?isu).*^The.*");
  });
});

describe("updateMovie", () => {
  it("updates the exact title and reports the modification", async () => {
    const updateByTitle = vi.fn(async (_title: MatchPattern, _fields: MovieUpdate) => ({
      matchedCount: 1,
      modifiedCount: 1,
    }));
    const { deps } = makeDeps(makeDocuments({ updateByTitle }));

    const result = await updateMovie(deps, "Inception", { year: 2010 });

    const [pattern, fields] = updateByTitle.mock.lastCall ?? [];
    expect(pattern?.document.source).toBe("^Inception$");
    expect(fields).toEqual({ year: 2010 });
    expect(result).toEqual({ success: true, message: "Movie 'Inception' updated", modified_count: 1 });
  });

  it("succeeds with modified_count 0 when nothing changed", async () => {
    const documents = makeDocuments({
      updateByTitle: vi.fn(async () => ({ matchedCount: 1, modifiedCount: 0 })),
    });
    const { deps } = makeDeps(documents);

    const result = await updateMovie(deps, "Inception", { year: 2010 });

    expect(result).toEqual({ success: true, message: "Movie 'Inception' already up to date", modified_count: 0 });
  });

  it.each([{}, [], null, "year=2010"])("rejects body %j", async (body) => {
    const { deps, documents } = makeDeps();

    await expect(updateMovie(deps, "Inception", body)).rejects.toThrow(
      "Request body must be a non-empty JSON object",
    );
    expect(documents.updateByTitle).not.toHaveBeenCalled();
  });

  it("propagates NotFoundError from the store", async () => {
    const documents = makeDocuments({
      updateByTitle: vi.fn(async () => {
        throw new NotFoundError("Movie not found in MongoDB: Nonexistent Film");
      }),
    });
    const { deps } = makeDeps(documents);

    await expect(updateMovie(deps, "Nonexistent Film", { year: 2010 })).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe("commonMovies", () => {
  it("shapes the reconciliation result", async () => {
    const { deps, documents, graph } = makeDeps();

    const result = await commonMovies(deps);

    expect(documents.listAllTitles).toHaveBeenCalledWith(1000);
    expect(graph.allMovieTitles).toHaveBeenCalledWith(1000);
    expect(result).toEqual({
      success: true,
      mongodb_count: 2,
      neo4j_count: 2,
      common_count: 1,
      common_movies: ["Inception"],
    });
  });

  it("uses an explicit sample size for both stores", async () => {
    const { deps, documents, graph } = makeDeps();

    await commonMovies(deps, 50);

    expect(documents.listAllTitles).toHaveBeenCalledWith(50);
    expect(graph.allMovieTitles).toHaveBeenCalledWith(50);
  });
});

describe("movieUsers", () => {
  it("queries the graph with a substring pattern and counts reviewers", async () => {
    const { deps, graph } = makeDeps();

    const result = await movieUsers(deps, "matrix");

    expect(graph.reviewersOf).toHaveBeenCalledWith("(?isu).*matrix.*");
    expect(result).toEqual({
      success: true,
      movie: "The Matrix",
      users_count: 1,
      users: [{ name: "Jessica Thompson", rating: 95, summary: "Brilliant" }],
    });
  });

  it("rejects a blank name before touching the graph", async () => {
    const { deps, graph } = makeDeps();

    await expect(movieUsers(deps, " ")).rejects.toBeInstanceOf(ValidationError);
    expect(graph.reviewersOf).not.toHaveBeenCalled();
  });
});

describe("userRatings", () => {
  it("reports the matched person and their rated movies", async () => {
    const { deps, graph } = makeDeps();

    const result = await userRatings(deps, "jessica");

    expect(graph.moviesRatedBy).toHaveBeenCalledWith("(?isu).*jessica.*");
    expect(result).toEqual({
      success: true,
      user: "Jessica Thompson",
      born: null,
      movies_rated_count: 1,
      rated_movies: [{ title: "Cloud Atlas", released: 2012, rating: 95, summary: "An amazing journey" }],
    });
  });
});

describe("endpointIndex", () => {
  it("lists every route", () => {
    expect(endpointIndex()).toEqual({ name: "filmbridge", endpoints: ENDPOINTS });
    expect(Object.keys(ENDPOINTS)).toHaveLength(8);
  });
});
