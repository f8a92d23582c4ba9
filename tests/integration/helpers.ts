import express from "express";
import type { Server } from "http";
import type { ContainerRuntime } from "../../src/harness/container.js";
import type { SqlStore } from "../../src/harness/store.js";

export interface FakeStackOptions {
  /** Model identifiers registered with the stack. */
  models: string[];
  /** Health polls answered with a "starting" body before the stack reports OK. */
  warmupPolls?: number;
  /** Answer given to every chat completion. */
  reply?: string;
  /** Tables that exist before any request arrives. */
  tables?: string[];
}

/** In-memory stand-in for the stack's PostgreSQL store. */
export class MemoryStore implements SqlStore {
  readonly rows = new Map<string, number>();

  constructor(tables: string[]) {
    for (const table of tables) this.rows.set(table, 0);
  }

  insert(table: string): void {
    this.rows.set(table, (this.rows.get(table) ?? 0) + 1);
  }

  async listTables(): Promise<string[]> {
    return [...this.rows.keys()];
  }

  async countRows(table: string): Promise<string> {
    const count = this.rows.get(table);
    if (count === undefined) throw new Error(`relation "${table}" does not exist`);
    return String(count);
  }

  async describeTables(): Promise<string> {
    return [...this.rows.keys()].join("\n");
  }

  async close(): Promise<void> {}
}

export interface FakeStack {
  baseUrl: string;
  store: MemoryStore;
  /** Requests received, as `METHOD path`. */
  requests: string[];
  close(): Promise<void>;
}

/**
 * Serves the health, model listing and chat completion routes on an ephemeral port.
 * Each successful completion writes a row to `inference_store`.
 */
export async function startFakeStack(options: FakeStackOptions): Promise<FakeStack> {
  const store = new MemoryStore(options.tables ?? ["llamastack_kvstore", "inference_store"]);
  const requests: string[] = [];
  let healthPolls = 0;

  const app = express();
  app.use(express.json());
  app.use((req, _res, next) => {
    requests.push(`${req.method} ${req.path}`);
    next();
  });

  app.get("/v1/health", (_req, res) => {
    healthPolls++;
    if (healthPolls <= (options.warmupPolls ?? 0)) {
      res.status(503).json({ status: "starting" });
      return;
    }
    res.type("application/json").send('{"status":"OK"}');
  });

  app.get("/v1/models", (_req, res) => {
    res.json({ data: options.models.map((identifier) => ({ identifier, provider_id: "fake" })) });
  });

  app.post("/v1/chat/completions", (req, res) => {
    const model: unknown = req.body?.model;
    if (typeof model !== "string" || !options.models.includes(model)) {
      res.status(404).json({ detail: `Model '${String(model)}' not found` });
      return;
    }
    store.insert("inference_store");
    res.json({
      id: `chatcmpl-${store.rows.get("inference_store")}`,
      model,
      choices: [{ index: 0, message: { role: "assistant", content: options.reply ?? "Grass is green." } }],
    });
  });

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Fake stack did not bind a TCP port");
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    store,
    requests,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

/** Container runtime that records calls instead of launching anything. */
export function createFakeRuntime(logs = "INFO:     Uvicorn running on http://0.0.0.0:8321"): ContainerRuntime & {
  started: string[][];
  stopped: string[];
} {
  const started: string[][] = [];
  const stopped: string[] = [];
  return {
    started,
    stopped,
    async start(args) {
      started.push(args);
      return "f4ke";
    },
    async logs() {
      return logs;
    },
    async stop(name) {
      stopped.push(name);
    },
  };
}
