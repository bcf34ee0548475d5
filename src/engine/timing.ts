import type { BackoffConfig } from "../schemas/config.js";

export const DEFAULT_BACKOFF: BackoffConfig = {
  base_ms: 100,
  max_ms: 10_000,
  factor: 2,
  jitter: 0.25,
};

/**
 * Discriminated result from withTimeout, so an engine result can never be
 * mistaken for a timeout or a cancellation.
 */
export type TimeoutResult<T> =
  | { type: "resolved"; value: T }
  | { type: "timeout" }
  | { type: "aborted" };

/**
 * Race a promise against a timeout and an optional abort signal.
 * Rejections of `promise` propagate.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<TimeoutResult<T>> {
  if (signal?.aborted) {
    return { type: "aborted" };
  }

  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  let onAbort: (() => void) | undefined;

  const timeoutPromise = new Promise<{ type: "timeout" }>((resolve) => {
    timeoutId = setTimeout(() => {
      resolve({ type: "timeout" });
    }, timeoutMs);
  });
  const abortPromise = new Promise<{ type: "aborted" }>((resolve) => {
    onAbort = () => resolve({ type: "aborted" });
    signal?.addEventListener("abort", onAbort, { once: true });
  });

  try {
    return await Promise.race([
      promise.then((value) => ({ type: "resolved" as const, value })),
      timeoutPromise,
      abortPromise,
    ]);
  } finally {
    clearTimeout(timeoutId);
    if (onAbort !== undefined) signal?.removeEventListener("abort", onAbort);
  }
}

/**
 * Calculate exponential backoff with jitter.
 * Jitter prevents thundering herd when several invocations retry together.
 */
export function calculateBackoff(
  attempt: number,
  config: BackoffConfig = DEFAULT_BACKOFF,
): number {
  const delay = config.base_ms * config.factor ** attempt;
  const capped = Math.min(delay, config.max_ms);
  // Apply jitter: ±(jitter * 100)%
  const jitterRange = capped * config.jitter;
  const jitterOffset = jitterRange * (Math.random() * 2 - 1);
  return Math.max(0, Math.round(capped + jitterOffset));
}

/** Resolves after `ms`, or early once `signal` aborts */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
