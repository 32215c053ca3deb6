import { CancelledError } from "../errors";

export interface RetryPolicy {
  /** Total sends allowed for transient failures, the first one included. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  /** Budget across all attempts and backoff sleeps. */
  maxElapsedMs: number;
  /**
   * Retries allowed for a non-idempotent request after a failure that may
   * have reached the server.
   */
  maxAmbiguousRetries: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  multiplier: 2,
  maxElapsedMs: 60_000,
  maxAmbiguousRetries: 1,
};

/**
 * Exponential backoff with jitter: base * multiplier^(attempt-1), capped,
 * scaled by a random factor in [0.5, 1). A server-provided Retry-After wins.
 */
export function computeDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random,
  retryAfterMs?: number
): number {
  if (retryAfterMs !== undefined) return retryAfterMs;
  const exponential = policy.baseDelayMs * Math.pow(policy.multiplier, attempt - 1);
  const capped = Math.min(policy.maxDelayMs, exponential);
  return Math.round(capped * (0.5 + random() * 0.5));
}

/** Parses a Retry-After header given in seconds or as an HTTP date. */
export function parseRetryAfter(
  value: string | undefined,
  now: () => number = Date.now
): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) return Number(trimmed) * 1000;
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now());
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Resolves after `ms`, or rejects with CancelledError as soon as `signal` fires. */
export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError("Operation cancelled", { cause: signal.reason }));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError("Operation cancelled", { cause: signal?.reason }));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
