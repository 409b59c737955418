import { AdmissionGate } from "./admissionGate.js";
import { Aggregator } from "./aggregator.js";
import { CancellationController, MAX_TIMER_DELAY_MS } from "./cancellation.js";
import { ResultChannel } from "./channel.js";
import { dispatchRounds } from "./dispatcher.js";
import { ConfigError } from "./errors.js";
import { RateLimiter } from "./rateLimiter.js";
import { backoffDelay, probeWithRetries } from "./retry.js";
import type {
  Fetcher,
  PingerOptions,
  ProbeResult,
  ProbeSummary,
  ResultCallback,
} from "./types.js";

type ResolvedOptions = {
  concurrency: number;
  rate: number;
  timeoutMs: number;
  count: number;
  intervalMs: number;
  retries: number;
  fetch: Fetcher;
  now: () => number;
  random: () => number;
  onResult?: ResultCallback;
};

const DEFAULT_OPTIONS = {
  concurrency: 50,
  rate: 0,
  timeoutMs: 5_000,
  count: 1,
  intervalMs: 2_000,
  retries: 2,
};

/**
 * Pinger probes a list of URLs over several rounds with bounded concurrency,
 * an optional requests-per-second ceiling, retries with backoff and
 * cooperative cancellation.
 *
 * @example
 * ```ts
 * const pinger = new Pinger(["https://a.example.com", "https://b.example.com"], {
 *   concurrency: 10,
 *   count: 3,
 *   onResult: (result) => console.log(result.url, result.statusCode),
 * });
 *
 * process.once("SIGINT", () => pinger.cancel("interrupted"));
 * const summary = await pinger.run();
 * ```
 */
export class Pinger {
  private readonly urls: readonly string[];
  private readonly options: ResolvedOptions;
  private readonly cancellation: CancellationController;
  private started = false;

  constructor(urls: readonly string[], options?: PingerOptions) {
    if (!urls.length) {
      throw new ConfigError("Pinger requires at least one URL.");
    }
    if (urls.some((url) => !url)) {
      throw new ConfigError("URLs must be non-empty.");
    }

    this.options = {
      concurrency: options?.concurrency ?? DEFAULT_OPTIONS.concurrency,
      rate: options?.rate ?? DEFAULT_OPTIONS.rate,
      timeoutMs: options?.timeoutMs ?? DEFAULT_OPTIONS.timeoutMs,
      count: options?.count ?? DEFAULT_OPTIONS.count,
      intervalMs: options?.intervalMs ?? DEFAULT_OPTIONS.intervalMs,
      retries: options?.retries ?? DEFAULT_OPTIONS.retries,
      fetch: options?.fetch ?? ((input, init) => fetch(input, init)),
      now: options?.now ?? Date.now,
      random: options?.random ?? Math.random,
      onResult: options?.onResult,
    };
    validate(this.options);

    this.urls = [...urls];
    this.cancellation = new CancellationController(options?.signal);
  }

  /**
   * The run's cancellation signal.
   */
  get signal(): AbortSignal {
    return this.cancellation.signal;
  }

  /**
   * Cancel the run. Safe to call repeatedly and after the run has finished.
   */
  cancel(reason?: string): void {
    this.cancellation.cancel(reason);
  }

  /**
   * Probe every URL `count` times. Resolves with the summary once every task
   * has reported, including after a cancellation.
   */
  async run(): Promise<ProbeSummary> {
    if (this.started) {
      throw new Error("Pinger can only run once.");
    }
    this.started = true;

    const { now } = this.options;
    const { signal } = this.cancellation;
    const startedAt = now();

    const limiter = new RateLimiter(this.options.rate, signal);
    const gate = new AdmissionGate(this.options.concurrency);
    const channel = new ResultChannel<ProbeResult>();
    const aggregator = new Aggregator(this.options.onResult);

    limiter.start();
    const consuming = aggregator.consume(channel);

    try {
      await dispatchRounds(this.urls, {
        count: this.options.count,
        intervalMs: this.options.intervalMs,
        signal,
        limiter,
        gate,
        channel,
        now,
        probe: (url, taskSignal) =>
          probeWithRetries(url, {
            fetch: this.options.fetch,
            signal: taskSignal,
            timeoutMs: this.options.timeoutMs,
            retries: this.options.retries,
            now,
            backoff: (attempt) => backoffDelay(attempt, this.options.random),
          }),
      });
    } finally {
      limiter.stop();
      await consuming;
      this.cancellation.dispose();
    }

    return aggregator.summarize({
      totalRuntimeMs: now() - startedAt,
      cancelled: signal.aborted,
      peakConcurrency: gate.peak,
    });
  }
}

function validate(options: ResolvedOptions): void {
  const problems: string[] = [];
  if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
    problems.push("concurrency must be a positive integer");
  }
  if (!Number.isInteger(options.rate) || options.rate < 0) {
    problems.push("rate must be a non-negative integer");
  }
  if (!(options.timeoutMs > 0)) {
    problems.push("timeoutMs must be positive");
  } else if (options.timeoutMs > MAX_TIMER_DELAY_MS) {
    problems.push(`timeoutMs must be at most ${MAX_TIMER_DELAY_MS}`);
  }
  if (!Number.isInteger(options.count) || options.count < 1) {
    problems.push("count must be a positive integer");
  }
  if (!(options.intervalMs >= 0)) {
    problems.push("intervalMs must be non-negative");
  } else if (options.intervalMs > MAX_TIMER_DELAY_MS) {
    problems.push(`intervalMs must be at most ${MAX_TIMER_DELAY_MS}`);
  }
  if (!Number.isInteger(options.retries) || options.retries < 0) {
    problems.push("retries must be a non-negative integer");
  }

  if (problems.length) {
    throw new ConfigError(`Invalid options: ${problems.join("; ")}.`);
  }
}
