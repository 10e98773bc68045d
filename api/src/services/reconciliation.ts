import type { ReconciliationResult } from "../types.js";
import type { DocumentStoreClient } from "./document-store.js";
import type { GraphStoreClient } from "./graph-store.js";
import { normalizeIdentityKey } from "./match.js";

export interface ReconcileDeps {
  documents: Pick<DocumentStoreClient, "listAllTitles">;
  graph: Pick<GraphStoreClient, "allMovieTitles">;
}

/** Identity key → first spelling seen for it. */
export function keyTitles(titles: Iterable<string>): Map<string, string> {
  const keyed = new Map<string, string>();
  for (const title of titles) {
    const key = normalizeIdentityKey(title);
    if (key.length > 0 && !keyed.has(key)) keyed.set(key, title);
  }
  return keyed;
}

export function compareTitles(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Intersects two title samples by identity key. Reported members use the
 * document store's spelling, sorted by code unit.
 */
export function intersectTitles(
  documentTitles: Iterable<string>,
  graphTitles: Iterable<string>,
): ReconciliationResult {
  const documentKeys = keyTitles(documentTitles);
  const graphKeys = keyTitles(graphTitles);

  const commonTitles: string[] = [];
  for (const [key, title] of documentKeys) {
    if (graphKeys.has(key)) commonTitles.push(title);
  }
  commonTitles.sort(compareTitles);

  return {
    mongoCount: documentKeys.size,
    graphCount: graphKeys.size,
    commonCount: commonTitles.length,
    commonTitles,
  };
}

/**
 * Samples up to `sampleCap` titles from each store and intersects them.
 * The two reads are independent snapshots; either failing fails the whole
 * reconciliation.
 */
export async function reconcile(deps: ReconcileDeps, sampleCap: number): Promise<ReconciliationResult> {
  const [documentTitles, graphTitles] = await Promise.all([
    deps.documents.listAllTitles(sampleCap),
    deps.graph.allMovieTitles(sampleCap),
  ]);
  return intersectTitles(documentTitles, graphTitles);
}
