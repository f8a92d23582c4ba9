import { errorMessage } from "../log.js";
import { containsText } from "../match.js";
import { pollUntil, type RetryBudget } from "../poll.js";
import { describeStore, fail, pass, type ProbeContext, type ProbeResult } from "./types.js";

export const EXPECTED_TABLES = ["llamastack_kvstore", "inference_store"];
export const TABLES_BUDGET: RetryBudget = { attempts: 10, intervalMs: 1_000 };

/** Table creation lags service readiness, so the listing is polled. */
export async function probeTables(
  ctx: ProbeContext,
  expected: string[] = EXPECTED_TABLES,
  budget: RetryBudget = TABLES_BUDGET,
): Promise<ProbeResult> {
  ctx.log("===> Verifying PostgreSQL tables have been created...", "cyan");

  const outcome = await pollUntil(
    budget,
    async () => {
      const listing = (await ctx.store.listTables()).join(" ");
      return { done: expected.every((table) => containsText(listing, table)), value: listing };
    },
    {
      sleep: ctx.sleep,
      onRetry: (attempt, err) =>
        ctx.log(
          `Attempt ${attempt}: Waiting for tables to be created...${err === undefined ? "" : ` (${errorMessage(err)})`}`,
          "yellow",
        ),
    },
  );

  if (outcome.ok) {
    ctx.log(`  ✅ All expected tables found: ${expected.join(" ")}`, "green");
    return pass("schema", "tables", `Available tables: ${outcome.value}`);
  }

  ctx.log(`  ❌ PostgreSQL tables not created after ${outcome.attempts} attempts`, "red");
  const lines = [
    `Expected tables: ${expected.join(" ")}`,
    `Available tables: ${outcome.value ?? "(none retrieved)"}`,
  ];
  if (outcome.error !== undefined) lines.push(`Last error: ${errorMessage(outcome.error)}`);
  lines.push(await describeStore(ctx));
  return fail("schema", "tables", lines.join("\n"));
}
