import type { ProbeResult } from "./types.js";

type Outcome = Pick<ProbeResult, "statusCode" | "error">;

/**
 * Whether another attempt should be made: no HTTP response, or a 5xx.
 */
export function isRetryWorthy(outcome: Outcome): boolean {
  return outcome.error !== undefined || outcome.statusCode >= 500;
}

/**
 * Whether the result counts as a success in the summary.
 *
 * The threshold (400) is stricter than the retry one (500): a 4xx is not
 * retried but is still tallied as a failure.
 */
export function isAggregateSuccess(outcome: Outcome): boolean {
  return (
    outcome.error === undefined &&
    (outcome.statusCode === 0 || outcome.statusCode < 400)
  );
}
