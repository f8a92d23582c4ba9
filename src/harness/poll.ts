export interface RetryBudget {
  attempts: number;
  intervalMs: number;
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * One poll attempt. Return `done: true` to stop polling; `value` is kept either
 * way so the caller can report what the last attempt saw.
 */
export type Attempt<T> = (attempt: number) => Promise<{ done: boolean; value: T }>;

export type PollOutcome<T> =
  | { ok: true; attempts: number; value: T }
  | { ok: false; attempts: number; value?: T; error?: unknown };

export interface PollOptions {
  sleep?: Sleep;
  /** Called after every unsuccessful attempt, before sleeping. */
  onRetry?: (attempt: number, error?: unknown) => void;
}

/**
 * Runs `attempt` until it reports done or `budget.attempts` tries have been made,
 * sleeping `budget.intervalMs` between tries. A throwing attempt counts as a
 * failed try; it never ends the loop early.
 */
export async function pollUntil<T>(
  budget: RetryBudget,
  attempt: Attempt<T>,
  options: PollOptions = {},
): Promise<PollOutcome<T>> {
  const wait = options.sleep ?? sleep;
  const total = Math.max(1, Math.floor(budget.attempts));
  let last: { value?: T; error?: unknown } = {};

  for (let i = 1; i <= total; i++) {
    try {
      const { done, value } = await attempt(i);
      if (done) return { ok: true, attempts: i, value };
      last = { value };
    } catch (err) {
      last = { value: last.value, error: err };
    }

    options.onRetry?.(i, last.error);
    if (i < total) await wait(budget.intervalMs);
  }

  return { ok: false, attempts: total, ...last };
}
