import { errorMessage } from "../errors.js";
import type { CompositeHealth, ProbeResult } from "../types.js";
import type { DocumentStoreClient } from "./document-store.js";
import type { GraphStoreClient } from "./graph-store.js";

export interface HealthDeps {
  documents: Pick<DocumentStoreClient, "ping">;
  graph: Pick<GraphStoreClient, "ping">;
}

export async function probe(ping: () => Promise<void>): Promise<ProbeResult> {
  try {
    await ping();
    return { status: "connected", error: null };
  } catch (err) {
    return { status: "disconnected", error: errorMessage(err) };
  }
}

/**
 * Pings both stores concurrently. A failing probe is recorded on its own
 * sub-result and never prevents the other from completing.
 */
export async function checkHealth(deps: HealthDeps): Promise<CompositeHealth> {
  const [mongodb, neo4j] = await Promise.all([
    probe(() => deps.documents.ping()),
    probe(() => deps.graph.ping()),
  ]);
  const healthy = mongodb.status === "connected" && neo4j.status === "connected";
  return { mongodb, neo4j, status: healthy ? "healthy" : "degraded" };
}
