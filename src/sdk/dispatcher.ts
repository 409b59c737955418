import type { AdmissionGate } from "./admissionGate.js";
import { sleep } from "./cancellation.js";
import type { ResultChannel } from "./channel.js";
import { isCancelledError } from "./errors.js";
import type { RateLimiter } from "./rateLimiter.js";
import { cancelledResult, type RetriedResult } from "./retry.js";
import type { ProbeResult } from "./types.js";

export interface DispatchOptions {
  /** Number of rounds */
  count: number;
  /** Pause after each round but the last */
  intervalMs: number;
  signal: AbortSignal;
  limiter: RateLimiter;
  gate: AdmissionGate;
  /** Receives exactly one result per task; closed once every task is done */
  channel: ResultChannel<ProbeResult>;
  /** Runs one task's attempts (the retry policy) */
  probe: (url: string, signal: AbortSignal) => Promise<RetriedResult>;
  now?: () => number;
}

export interface DispatchReport {
  /** Tasks spawned across all rounds */
  spawned: number;
  /** Rounds whose tasks were all spawned */
  rounds: number;
  /** Whether cancellation cut the schedule short */
  aborted: boolean;
}

/**
 * Spawn one task per (round, URL) without waiting for a round to finish
 * before the next one starts. Tasks share the rate limiter and the admission
 * gate; round boundaries do not gate them.
 *
 * Resolves once every spawned task has finished and the channel is closed.
 */
export async function dispatchRounds(
  urls: readonly string[],
  options: DispatchOptions,
): Promise<DispatchReport> {
  const { count, intervalMs, signal, channel } = options;
  const tasks: Promise<void>[] = [];
  let rounds = 0;
  let aborted = false;

  try {
    for (let round = 0; round < count; round++) {
      for (const url of urls) {
        if (signal.aborted) {
          aborted = true;
          break;
        }
        tasks.push(runTask(url, round, options));
      }
      if (aborted) {
        break;
      }
      rounds += 1;

      if (round < count - 1) {
        try {
          await sleep(intervalMs, signal);
        } catch (error) {
          if (!isCancelledError(error)) {
            throw error;
          }
          aborted = true;
          break;
        }
      }
    }
  } finally {
    const settled = await Promise.allSettled(tasks);
    channel.close();

    const failure = settled.find(
      (outcome): outcome is PromiseRejectedResult => outcome.status === "rejected",
    );
    if (failure) {
      throw failure.reason;
    }
  }

  return { spawned: tasks.length, rounds, aborted };
}

async function runTask(
  url: string,
  round: number,
  options: DispatchOptions,
): Promise<void> {
  const { signal, limiter, gate, channel } = options;
  const now = options.now ?? Date.now;

  try {
    await limiter.acquire(signal);
    await gate.run(async () => {
      const result = await options.probe(url, signal);
      channel.send({ ...result, round });
    }, signal);
  } catch (error) {
    if (!isCancelledError(error)) {
      throw error;
    }
    // Cancelled while waiting for a token or a permit.
    channel.send({ ...cancelledResult(url, error, now(), 0), round });
  }
}
