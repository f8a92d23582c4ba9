import type { StackClient } from "./client.js";
import { isHealthyBody } from "./match.js";
import { pollUntil, type RetryBudget, type Sleep } from "./poll.js";
import { errorMessage, log, type Logger } from "./log.js";

export type Readiness =
  | { ready: true; attempts: number }
  | { ready: false; attempts: number; lastBody?: string; lastError?: string };

export const READINESS_PROFILES = {
  fast: { attempts: 60, intervalMs: 1_000 },
  // QEMU-emulated images can take several minutes to load providers
  emulated: { attempts: 180, intervalMs: 5_000 },
} satisfies Record<string, RetryBudget>;

export type ReadinessProfile = keyof typeof READINESS_PROFILES;

/**
 * Polls `/v1/health` until it answers exactly `{"status":"OK"}` or the budget runs out.
 * Error statuses and connection failures are just another "not ready yet".
 */
export async function waitUntilReady(
  client: Pick<StackClient, "health">,
  budget: RetryBudget,
  options: { sleep?: Sleep; log?: Logger } = {},
): Promise<Readiness> {
  const logger = options.log ?? log;

  const outcome = await pollUntil(
    budget,
    async (attempt) => {
      logger(`Attempt ${attempt} to connect to Llama Stack...`, "dim");
      const res = await client.health();
      return { done: res.ok && isHealthyBody(res.body), value: res.body };
    },
    { sleep: options.sleep },
  );

  if (outcome.ok) return { ready: true, attempts: outcome.attempts };
  return {
    ready: false,
    attempts: outcome.attempts,
    lastBody: outcome.value,
    lastError: outcome.error === undefined ? undefined : errorMessage(outcome.error),
  };
}
