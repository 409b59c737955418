import { sleep } from "./cancellation.js";
import { isRetryWorthy } from "./classify.js";
import { isCancelledError, toCancelledError } from "./errors.js";
import { probeOnce, type AttemptResult, type ProbeOptions } from "./prober.js";
import type { ProbeResult } from "./types.js";

const BASE_BACKOFF_MS = 100;

export interface RetryOptions extends ProbeOptions {
  /** Extra attempts beyond the first */
  retries: number;
  /** Delay before the attempt following `attempt` (default: backoffDelay) */
  backoff?: (attempt: number) => number;
}

export type RetriedResult = AttemptResult & Pick<ProbeResult, "attempts">;

/**
 * Exponential backoff with multiplicative jitter: for the 0-based attempt
 * `a` the delay lies in `[100 * 2^a, 200 * 2^a)` milliseconds. Uncapped.
 */
export function backoffDelay(
  attempt: number,
  random: () => number = Math.random,
): number {
  const base = BASE_BACKOFF_MS * 2 ** attempt;
  return base + random() * base;
}

/**
 * Probe `url` up to `retries + 1` times, stopping at the first attempt that
 * is not a retry-worthy failure. Returns the last result either way.
 *
 * Cancellation before an attempt or during a backoff wait ends the loop with
 * a CancelledError result.
 */
export async function probeWithRetries(
  url: string,
  options: RetryOptions,
): Promise<RetriedResult> {
  const { signal, retries } = options;
  const backoff = options.backoff ?? ((attempt: number) => backoffDelay(attempt));
  const now = options.now ?? Date.now;

  let last: RetriedResult | undefined;

  for (let attempt = 0; attempt <= retries; attempt++) {
    if (signal.aborted) {
      return cancelledResult(url, signal.reason, now(), attempt);
    }

    last = { ...(await probeOnce(url, options)), attempts: attempt + 1 };

    if (!isRetryWorthy(last)) {
      return last;
    }
    if (last.error && isCancelledError(last.error)) {
      return last;
    }

    if (attempt < retries) {
      try {
        await sleep(backoff(attempt), signal);
      } catch (error) {
        return cancelledResult(url, error, now(), attempt + 1);
      }
    }
  }

  return last ?? cancelledResult(url, signal.reason, now(), 0);
}

export function cancelledResult(
  url: string,
  reason: unknown,
  at: number,
  attempts: number,
): RetriedResult {
  return {
    url,
    statusCode: 0,
    durationMs: 0,
    error: toCancelledError(reason),
    timestamp: new Date(at),
    attempts,
  };
}
