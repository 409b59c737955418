import type { ProbeError } from "./errors.js";

/**
 * The function used to issue HTTP requests. Shared by every task so the
 * underlying connection pool is reused; defaults to the global fetch.
 */
export type Fetcher = typeof fetch;

/**
 * Outcome of one (round, URL) task.
 */
export interface ProbeResult {
  readonly url: string;
  /** 0 when no HTTP response was obtained */
  readonly statusCode: number;
  /** Wall-clock time of the attempt that produced this result */
  readonly durationMs: number;
  /** Set when the attempt failed before yielding an HTTP status */
  readonly error?: ProbeError;
  /** Start time of the attempt */
  readonly timestamp: Date;
  /** Attempts made by the task; 0 when cancelled before the first one */
  readonly attempts: number;
  /** 0-based round index */
  readonly round: number;
}

/**
 * Running statistics kept by the aggregator.
 */
export interface AggregateStats {
  total: number;
  successCount: number;
  failedCount: number;
  /** Number of error-free results feeding the latency fields */
  latencySamples: number;
  sumLatencyMs: number;
  /** Infinity until the first latency sample */
  minLatencyMs: number;
  maxLatencyMs: number;
  /** Extra attempts beyond the first, summed over all tasks */
  retries: number;
  /** Count per HTTP status code of error-free results */
  statusCodes: Record<number, number>;
}

/**
 * Final summary of a run.
 */
export interface ProbeSummary {
  total: number;
  successCount: number;
  failedCount: number;
  avgLatencyMs: number;
  minLatencyMs: number;
  maxLatencyMs: number;
  retries: number;
  statusCodes: Record<number, number>;
  totalRuntimeMs: number;
  /** Whether the run was cut short by cancellation */
  cancelled: boolean;
  /** Highest number of tasks that held an admission permit at once */
  peakConcurrency: number;
}

/**
 * Called for every result as the aggregator consumes it.
 */
export type ResultCallback = (result: ProbeResult) => void | Promise<void>;

/**
 * Options for the Pinger.
 */
export interface PingerOptions {
  /** Max simultaneously in-flight tasks (default: 50) */
  concurrency?: number;
  /** Requests per second, 0 = unlimited (default: 0) */
  rate?: number;
  /** Per-request deadline in milliseconds (default: 5000) */
  timeoutMs?: number;
  /** Number of rounds (default: 1) */
  count?: number;
  /** Pause between rounds in milliseconds (default: 2000) */
  intervalMs?: number;
  /** Extra attempts beyond the first (default: 2) */
  retries?: number;
  /** HTTP execution function shared by all tasks (default: global fetch) */
  fetch?: Fetcher;
  /** External cancellation trigger */
  signal?: AbortSignal;
  /** Receives every result in completion order */
  onResult?: ResultCallback;
  /** Clock used for durations (default: Date.now) */
  now?: () => number;
  /** Uniform random source in [0, 1) used for backoff jitter (default: Math.random) */
  random?: () => number;
}
