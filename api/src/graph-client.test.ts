import { describe, it, expect, vi } from "vitest";
import { createGraphConnection } from "./graph-client.js";

const mocks = vi.hoisted(() => {
  const session = {
    run: vi.fn(async (_query: string, _params: Record<string, unknown>, _config: { timeout: number }) => ({
      records: [
        { toObject: () => ({ title: "The Matrix", released: 1999 }) },
        { toObject: () => ({ title: "Cloud Atlas", released: 2012 }) },
      ],
    })),
    close: vi.fn(async () => {}),
  };
  const driver = {
    session: vi.fn((_config: { defaultAccessMode: string; database?: string }) => session),
    close: vi.fn(async () => {}),
  };
  return {
    session,
    driver,
    createDriver: vi.fn((_uri: string, _auth: unknown, _config: Record<string, unknown>) => driver),
    basic: vi.fn((principal: string, credentials: string) => ({ scheme: "basic", principal, credentials })),
  };
});

vi.mock("neo4j-driver", () => ({
  default: {
    driver: mocks.createDriver,
    auth: { basic: mocks.basic },
    session: { READ: "READ", WRITE: "WRITE" },
  },
}));

const config = { uri: "neo4j://localhost:7687", user: "neo4j", password: "test-secret", database: "movies" };

describe("graph-client", () => {
  describe("createGraphConnection", () => {
    it("builds one driver with basic auth, plain numbers and the operation timeout", () => {
      createGraphConnection(config, { timeoutMs: 5000 });

      expect(mocks.basic).toHaveBeenCalledWith("neo4j", "test-secret");
      expect(mocks.createDriver).toHaveBeenCalledWith(
        "neo4j://localhost:7687",
        { scheme: "basic", principal: "neo4j", credentials: "test-secret" },
        { disableLosslessIntegers: true, connectionAcquisitionTimeout: 5000, connectionTimeout: 5000 },
      );
    });

    it("opens read sessions against the configured database", () => {
      const connection = createGraphConnection(config, { timeoutMs: 5000 });

      connection.session();

      expect(mocks.driver.session).toHaveBeenCalledWith({ defaultAccessMode: "READ", database: "movies" });
    });

    it("runs queries with a transaction timeout and returns plain rows", async () => {
      const session = createGraphConnection(config, { timeoutMs: 5000 }).session();

      const rows = await session.run("MATCH (m:Movie) RETURN m.title AS title", { cap: 2 }, 3000);

      expect(mocks.session.run).toHaveBeenCalledWith(
        "MATCH (m:Movie) RETURN m.title AS title",
        { cap: 2 },
        { timeout: 3000 },
      );
      expect(rows).toEqual([
        { title: "The Matrix", released: 1999 },
        { title: "Cloud Atlas", released: 2012 },
      ]);
    });

    it("closes sessions and the driver", async () => {
      const connection = createGraphConnection(config, { timeoutMs: 5000 });

      await connection.session().close();
      await connection.close();

      expect(mocks.session.close).toHaveBeenCalledTimes(1);
      expect(mocks.driver.close).toHaveBeenCalledTimes(1);
    });
  });
});
