import { errorMessage } from "../log.js";
import { pollUntil, type RetryBudget } from "../poll.js";
import { describeStore, fail, pass, type ProbeContext, type ProbeResult } from "./types.js";

export const COMPLETIONS_TABLE = "inference_store";
export const DATA_BUDGET: RetryBudget = { attempts: 10, intervalMs: 1_000 };

/** Parses a raw COUNT(*) value; anything but a positive integer is "not populated yet". */
export function parsePositiveCount(raw: string): number | undefined {
  const text = raw.trim();
  if (!/^\d+$/.test(text)) return undefined;
  const count = Number.parseInt(text, 10);
  return count > 0 ? count : undefined;
}

export async function probeData(
  ctx: ProbeContext,
  table: string = COMPLETIONS_TABLE,
  budget: RetryBudget = DATA_BUDGET,
): Promise<ProbeResult> {
  ctx.log(`===> Verifying PostgreSQL table ${table} has been populated...`, "cyan");

  const outcome = await pollUntil(
    budget,
    async () => {
      const raw = await ctx.store.countRows(table);
      return { done: parsePositiveCount(raw) !== undefined, value: raw };
    },
    {
      sleep: ctx.sleep,
      onRetry: (attempt) => ctx.log(`Attempt ${attempt}: ${table} table not yet populated...`, "yellow"),
    },
  );

  if (outcome.ok) {
    ctx.log(`  ✅ ${table} table has ${outcome.value.trim()} record(s)`, "green");
    return pass("data", "data", `${table} rows: ${outcome.value.trim()}`);
  }

  ctx.log(`  ❌ PostgreSQL ${table} table is empty or doesn't exist after ${outcome.attempts} attempts`, "red");
  const lines = [`${table} row count: ${JSON.stringify(outcome.value ?? "")}`];
  if (outcome.error !== undefined) lines.push(`Last error: ${errorMessage(outcome.error)}`);
  lines.push("Tables in database:", await describeStore(ctx));
  return fail("data", "data", lines.join("\n"));
}
