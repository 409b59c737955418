import { isAggregateSuccess } from "./classify.js";
import type { ResultChannel } from "./channel.js";
import type {
  AggregateStats,
  ProbeResult,
  ProbeSummary,
  ResultCallback,
} from "./types.js";

export function emptyStats(): AggregateStats {
  return {
    total: 0,
    successCount: 0,
    failedCount: 0,
    latencySamples: 0,
    sumLatencyMs: 0,
    minLatencyMs: Number.POSITIVE_INFINITY,
    maxLatencyMs: 0,
    retries: 0,
    statusCodes: {},
  };
}

/**
 * Sole owner of the run's statistics. Consumes results in arrival order and
 * forwards each one to the presentation callback.
 */
export class Aggregator {
  private readonly stats: AggregateStats = emptyStats();

  constructor(private readonly onResult?: ResultCallback) {}

  /**
   * Drain `channel` until it is closed. Resolves with the final stats.
   */
  async consume(channel: ResultChannel<ProbeResult>): Promise<AggregateStats> {
    for await (const result of channel) {
      this.record(result);
      await this.forward(result);
    }
    return this.snapshot();
  }

  record(result: ProbeResult): void {
    const stats = this.stats;
    stats.total += 1;
    if (isAggregateSuccess(result)) {
      stats.successCount += 1;
    } else {
      stats.failedCount += 1;
    }

    if (result.attempts > 1) {
      stats.retries += result.attempts - 1;
    }

    // Latency comes from every result that got an HTTP response.
    if (result.error === undefined) {
      stats.latencySamples += 1;
      stats.sumLatencyMs += result.durationMs;
      stats.minLatencyMs = Math.min(stats.minLatencyMs, result.durationMs);
      stats.maxLatencyMs = Math.max(stats.maxLatencyMs, result.durationMs);
      stats.statusCodes[result.statusCode] =
        (stats.statusCodes[result.statusCode] ?? 0) + 1;
    }
  }

  snapshot(): AggregateStats {
    return { ...this.stats, statusCodes: { ...this.stats.statusCodes } };
  }

  summarize(run: {
    totalRuntimeMs: number;
    cancelled: boolean;
    peakConcurrency: number;
  }): ProbeSummary {
    const stats = this.stats;
    const hasLatency = stats.latencySamples > 0;

    return {
      total: stats.total,
      successCount: stats.successCount,
      failedCount: stats.failedCount,
      avgLatencyMs: hasLatency ? stats.sumLatencyMs / stats.total : 0,
      minLatencyMs: hasLatency ? stats.minLatencyMs : 0,
      maxLatencyMs: stats.maxLatencyMs,
      retries: stats.retries,
      statusCodes: { ...stats.statusCodes },
      totalRuntimeMs: run.totalRuntimeMs,
      cancelled: run.cancelled,
      peakConcurrency: run.peakConcurrency,
    };
  }

  private async forward(result: ProbeResult): Promise<void> {
    if (!this.onResult) {
      return;
    }
    try {
      await this.onResult(result);
    } catch (error) {
      console.error("Error in result callback:", error);
    }
  }
}
