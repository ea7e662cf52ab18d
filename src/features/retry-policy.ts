import { sleep } from "../utils";

export type RetryPolicy = {
  maxAttempts: number;
  /** Delay after the zero-based `attempt` failed. */
  backoffMs(attempt: number): number;
};

export type RetryResult<T> = { ok: true; value: T; attempts: number } | { ok: false; error: unknown; attempts: number };

export type RetryHooks = {
  onRetry?(error: unknown, attempt: number, delayMs: number): void;
  sleep?(ms: number): Promise<unknown>;
};

const ratio = 2;

export const exponentialBackoff =
  (baseTimeout = 1000, maximumTimeout = 60_000) =>
  (attempt: number): number => {
    const timeout = baseTimeout * ratio ** attempt;
    return timeout > maximumTimeout ? maximumTimeout : timeout;
  };

export function createRetryPolicy(maxAttempts: number, backoffMs = exponentialBackoff()): RetryPolicy {
  return { maxAttempts: Math.max(1, Math.floor(maxAttempts)), backoffMs };
}

/** Runs `task` until it resolves or the policy runs out of attempts. Never throws. */
export async function withRetry<T>(
  policy: RetryPolicy,
  task: (attempt: number) => Promise<T>,
  { onRetry, sleep: wait = sleep }: RetryHooks = {}
): Promise<RetryResult<T>> {
  let lastError: unknown;
  for (let attempt = 0; attempt < policy.maxAttempts; attempt++) {
    try {
      return { ok: true, value: await task(attempt), attempts: attempt + 1 };
    } catch (err) {
      lastError = err;
      if (attempt < policy.maxAttempts - 1) {
        const delay = policy.backoffMs(attempt);
        onRetry?.(err, attempt, delay);
        await wait(delay);
      }
    }
  }
  return { ok: false, error: lastError, attempts: policy.maxAttempts };
}
