import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { cmdUpdate } from "./update.js";
import { logger } from "../lib/logger.js";

describe("update command", () => {
  let output: string[];
  let errors: string[];

  beforeEach(() => {
    output = [];
    errors = [];
    vi.spyOn(console, "log").mockImplementation((line: unknown) => {
      output.push(String(line));
    });
    vi.spyOn(console, "error").mockImplementation((line: unknown) => {
      errors.push(String(line));
    });
    logger.setOptions({ quiet: false, json: false });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
  });

  it("sends the decoded fields and prints the server message", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      Response.json({ success: true, message: "Movie 'Inception' updated", modified_count: 1 }),
    );
    vi.stubGlobal("fetch", fetchMock);

    await cmdUpdate("Inception", { set: ["year=2010", 'genres=["Sci-Fi"]', "plot=Dreams within dreams"] });

    expect(fetchMock).toHaveBeenCalledWith("http://localhost:5000/movies/Inception", {
      method: "PUT",
      headers: { "content-type": "application/json" },
      body: '{"year":2010,"genres":["Sci-Fi"],"plot":"Dreams within dreams"}',
    });
    expect(output).toEqual(["Movie 'Inception' updated"]);
  });

  it("reports a missing movie", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () =>
        Response.json({ success: false, error: "Movie not found in MongoDB: Nonexistent Film" }, { status: 404 }),
      ),
    );

    await expect(cmdUpdate("Nonexistent Film", { set: ["year=2010"] })).rejects.toThrow(
      "Update failed: 404 Movie not found in MongoDB: Nonexistent Film",
    );
  });

  it("requires at least one field", async () => {
    const exit = vi.spyOn(process, "exit").mockImplementation(() => {
      throw new Error("exit");
    });

    await expect(cmdUpdate("Inception", {})).rejects.toThrow("exit");

    expect(exit).toHaveBeenCalledWith(2);
    expect(errors).toEqual(["Error: at least one --set field=value is required"]);
  });

  it("rejects a malformed assignment", async () => {
    vi.spyOn(process, "exit").mockImplementation(() => {
      throw new Error("exit");
    });

    await expect(cmdUpdate("Inception", { set: ["year"] })).rejects.toThrow("exit");

    expect(errors).toEqual(['Error: invalid --set value "year", expected field=value']);
  });
});
