import { describe, it, expect, vi, beforeEach } from "vitest";
import type { PostgresSettings } from "./config.js";
import type { CommandRunner } from "./exec.js";

const { query, end, on, poolConfigs } = vi.hoisted(() => {
  const poolConfigs: unknown[] = [];
  return { query: vi.fn(), end: vi.fn(), on: vi.fn(), poolConfigs };
});

vi.mock("pg", () => ({
  Pool: class MockPool {
    query = query;
    end = end;
    on = on;
    constructor(config: unknown) {
      poolConfigs.push(config);
    }
  },
}));

import { countRowsSql, LIST_TABLES_SQL, PostgresStore, PsqlContainerStore, QUERY_TIMEOUT_MS } from "./store.js";

const settings: PostgresSettings = {
  host: "localhost",
  port: 5432,
  database: "llamastack",
  user: "llamastack",
  password: "test-secret",
  client: "pg",
  container: "postgres",
};

describe("countRowsSql", () => {
  it("builds the count query for a plain table name", () => {
    expect(countRowsSql("inference_store")).toBe("SELECT COUNT(*) FROM inference_store;");
  });

  it("refuses names that are not bare identifiers", () => {
    expect(() => countRowsSql("inference_store; DROP TABLE x")).toThrow("unsafe name");
    expect(() => countRowsSql("")).toThrow("unsafe name");
  });
});

describe("PostgresStore", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    poolConfigs.length = 0;
  });

  it("bounds connecting and every query", () => {
    new PostgresStore(settings, () => {});

    expect(poolConfigs).toEqual([
      expect.objectContaining({
        host: "localhost",
        port: 5432,
        connectionTimeoutMillis: 5_000,
        query_timeout: QUERY_TIMEOUT_MS,
        statement_timeout: QUERY_TIMEOUT_MS,
      }),
    ]);
  });

  it("fails a stalled query instead of waiting on it", async () => {
    query.mockRejectedValue(new Error("Query read timeout"));
    await expect(new PostgresStore(settings, () => {}).listTables()).rejects.toThrow("Query read timeout");
  });

  it("lists public tables", async () => {
    query.mockResolvedValue({ rows: [{ tablename: "llamastack_kvstore" }, { tablename: "inference_store" }] });
    const store = new PostgresStore(settings, () => {});

    await expect(store.listTables()).resolves.toEqual(["llamastack_kvstore", "inference_store"]);
    expect(query).toHaveBeenCalledWith(LIST_TABLES_SQL);
  });

  it("returns COUNT(*) as text", async () => {
    query.mockResolvedValue({ rows: [{ count: "7" }] });
    const store = new PostgresStore(settings, () => {});

    await expect(store.countRows("inference_store")).resolves.toBe("7");
    expect(query).toHaveBeenCalledWith("SELECT COUNT(*) FROM inference_store;");
  });

  it("returns an empty count when no row comes back", async () => {
    query.mockResolvedValue({ rows: [] });
    await expect(new PostgresStore(settings, () => {}).countRows("inference_store")).resolves.toBe("");
  });

  it("describes tables without throwing on query errors", async () => {
    query.mockRejectedValue(new Error("connection terminated"));
    await expect(new PostgresStore(settings, () => {}).describeTables()).resolves.toBe(
      "(could not list tables: connection terminated)",
    );
  });

  it("logs pool errors instead of crashing", () => {
    const lines: string[] = [];
    new PostgresStore(settings, (m) => lines.push(m));

    const [event, handler] = on.mock.calls[0];
    expect(event).toBe("error");
    handler(new Error("terminating connection due to administrator command"));
    expect(lines).toEqual(["PostgreSQL pool error: terminating connection due to administrator command"]);
  });

  it("ends the pool on close", async () => {
    await new PostgresStore(settings, () => {}).close();
    expect(end).toHaveBeenCalledTimes(1);
  });
});

describe("PsqlContainerStore", () => {
  it("runs psql inside the database container and parses tuples-only output", async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue({
      exitCode: 0,
      stdout: " llamastack_kvstore\n inference_store\n\n",
      stderr: "",
    });
    const store = new PsqlContainerStore({ ...settings, client: "docker-psql" }, "docker", run);

    await expect(store.listTables()).resolves.toEqual(["llamastack_kvstore", "inference_store"]);
    expect(run).toHaveBeenCalledWith(
      "docker",
      ["exec", "postgres", "psql", "-U", "llamastack", "-d", "llamastack", "-t", "-c", LIST_TABLES_SQL],
      { timeoutMs: QUERY_TIMEOUT_MS },
    );
  });

  it("passes its timeout to every psql call and fails when it runs out", async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue({
      exitCode: 124,
      stdout: "",
      stderr: "docker timed out after 250ms",
    });
    const store = new PsqlContainerStore(settings, "docker", run, 250);

    await expect(store.countRows("inference_store")).rejects.toThrow("psql exited with 124: docker timed out after 250ms");
    expect(run.mock.calls[0][2]).toEqual({ timeoutMs: 250 });
  });

  it("strips whitespace from the count", async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue({ exitCode: 0, stdout: "     3\n\n", stderr: "" });
    const store = new PsqlContainerStore(settings, "docker", run);
    await expect(store.countRows("inference_store")).resolves.toBe("3");
  });

  it("rejects when psql fails", async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue({
      exitCode: 1,
      stdout: "",
      stderr: 'ERROR:  relation "inference_store" does not exist\n',
    });
    const store = new PsqlContainerStore(settings, "docker", run);

    await expect(store.countRows("inference_store")).rejects.toThrow(
      'psql exited with 1: ERROR:  relation "inference_store" does not exist',
    );
  });
});
