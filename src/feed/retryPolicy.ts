import { setTimeout as delay } from "timers/promises";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryPolicy {
  intervalMs: number;
  /** null retries forever. */
  maxAttempts: number | null;
  sleep: Sleep;
}

/** Resolves after `ms`, or early (without throwing) when the signal aborts. */
export const realSleep: Sleep = async (ms, signal) => {
  if (signal?.aborted) return;
  try {
    await delay(ms, undefined, signal ? { signal } : undefined);
  } catch (err) {
    if (signal?.aborted) return;
    throw err;
  }
};

export function fixedIntervalRetry(intervalMs: number, opts: { maxAttempts?: number | null; sleep?: Sleep } = {}): RetryPolicy {
  return {
    intervalMs,
    maxAttempts: opts.maxAttempts ?? null,
    sleep: opts.sleep ?? realSleep
  };
}

export function shouldRetry(policy: RetryPolicy, failedAttempts: number): boolean {
  return policy.maxAttempts === null || failedAttempts < policy.maxAttempts;
}
