import type { StackClient } from "../client.js";
import { errorMessage, type Logger } from "../log.js";
import type { Sleep } from "../poll.js";
import type { SqlStore } from "../store.js";

export type ProbeKind = "list" | "inference" | "schema" | "data" | "integration";
export type ProbeStatus = "pass" | "fail";

export interface ProbeResult {
  kind: ProbeKind;
  subject: string;
  status: ProbeStatus;
  /** Everything a human needs to root-cause a failure without rerunning. */
  diagnostic: string;
}

const TAG_PREFIX: Record<ProbeKind, string> = {
  list: "model_list",
  inference: "inference",
  schema: "postgres",
  data: "postgres",
  integration: "integration",
};

/** Ledger label, e.g. `model_list:llama-3-8b` or `postgres:tables`. */
export function probeTag(kind: ProbeKind, subject: string): string {
  return `${TAG_PREFIX[kind]}:${subject}`;
}

export interface ScheduledProbe {
  kind: ProbeKind;
  subject: string;
  run(): Promise<ProbeResult>;
}

export interface ProbeContext {
  client: Pick<StackClient, "listModels" | "chatCompletion">;
  store: SqlStore;
  /** Recent container output, appended to HTTP probe failures. */
  collectLogs: () => Promise<string>;
  log: Logger;
  sleep?: Sleep;
}

export function pass(kind: ProbeKind, subject: string, diagnostic = ""): ProbeResult {
  return { kind, subject, status: "pass", diagnostic };
}

export function fail(kind: ProbeKind, subject: string, diagnostic: string): ProbeResult {
  return { kind, subject, status: "fail", diagnostic };
}

/** Appends container logs to a failure diagnostic; a log collection error is reported inline. */
export async function withContainerLogs(ctx: ProbeContext, diagnostic: string): Promise<string> {
  let logs: string;
  try {
    logs = await ctx.collectLogs();
  } catch (err) {
    logs = `(could not collect container logs: ${errorMessage(err)})`;
  }
  return `${diagnostic}\nContainer logs:\n${logs}`;
}

export async function describeStore(ctx: ProbeContext): Promise<string> {
  try {
    return await ctx.store.describeTables();
  } catch (err) {
    return `(could not describe tables: ${errorMessage(err)})`;
  }
}
