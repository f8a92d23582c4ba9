import { errorMessage, log, type Logger } from "./log.js";
import type { ModelMatrix } from "./matrix.js";
import { probeData } from "./probes/postgres-data.js";
import { probeInference } from "./probes/inference.js";
import { probeModelList } from "./probes/model-list.js";
import { probeTables } from "./probes/postgres-tables.js";
import { fail, probeTag, type ProbeContext, type ProbeResult, type ScheduledProbe } from "./probes/types.js";

/** Append-only record of failure tags for one run. */
export class FailureLedger {
  private readonly entries: string[] = [];

  record(tag: string): void {
    this.entries.push(tag);
  }

  get tags(): readonly string[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }
}

export interface RunReport {
  results: ProbeResult[];
  ledger: FailureLedger;
}

/**
 * Runs every probe in order. A failing (or contract-breaking, throwing) probe is
 * recorded and the run moves on; nothing here stops early.
 */
export async function runAll(
  probes: readonly ScheduledProbe[],
  options: { log?: Logger } = {},
): Promise<RunReport> {
  const logger = options.log ?? log;
  const ledger = new FailureLedger();
  const results: ProbeResult[] = [];

  for (const probe of probes) {
    let result: ProbeResult;
    try {
      result = await probe.run();
    } catch (err) {
      result = fail(probe.kind, probe.subject, `probe raised: ${errorMessage(err)}`);
    }

    results.push(result);
    if (result.status === "fail") {
      ledger.record(probeTag(result.kind, result.subject));
      if (result.diagnostic) logger(result.diagnostic, "dim");
    }
  }

  return { results, ledger };
}

/**
 * Fixed probe order: listing for every model, inference for every model, then the
 * schema and data checks. Reduced mode keeps only the schema check.
 */
export function planProbes(
  matrix: Pick<ModelMatrix, "listing" | "inference">,
  ctx: ProbeContext,
  options: { skipInference: boolean },
): ScheduledProbe[] {
  const tables: ScheduledProbe = { kind: "schema", subject: "tables", run: () => probeTables(ctx) };
  if (options.skipInference) return [tables];

  return [
    ...matrix.listing.map((model): ScheduledProbe => ({
      kind: "list",
      subject: model,
      run: () => probeModelList(ctx, model),
    })),
    ...matrix.inference.map((model): ScheduledProbe => ({
      kind: "inference",
      subject: model,
      run: () => probeInference(ctx, model),
    })),
    tables,
    { kind: "data", subject: "data", run: () => probeData(ctx) },
  ];
}

export function printSummary(ledger: FailureLedger, logger: Logger = log, title = "Smoke test"): boolean {
  if (ledger.isEmpty()) {
    logger(`===> ${title} completed successfully!`, "green");
    return true;
  }
  logger(`===> ${title} failed for the following:`, "red");
  for (const tag of ledger.tags) {
    logger(`  - ${tag}`, "red");
  }
  return false;
}

export function exitCodeFor(ledger: FailureLedger): number {
  return ledger.isEmpty() ? 0 : 1;
}
