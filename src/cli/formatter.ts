import chalk from "chalk";
import type { ProbeResult, ProbeSummary } from "../sdk/types.js";

/**
 * Human-readable duration: `850µs`, `12.5ms`, `1.25s`, `2m5s`.
 */
export function formatDuration(ms: number): string {
  if (ms === 0) {
    return "0s";
  }
  if (ms < 1) {
    return `${Math.round(ms * 1000)}µs`;
  }
  if (ms < 1_000) {
    return `${Number(ms.toFixed(2))}ms`;
  }
  if (ms < 60_000) {
    return `${Number((ms / 1_000).toFixed(3))}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Number(((ms % 60_000) / 1_000).toFixed(3));
  return `${minutes}m${seconds}s`;
}

/** Local wall-clock time as HH:MM:SS */
export function formatClock(date: Date): string {
  return [date.getHours(), date.getMinutes(), date.getSeconds()]
    .map((part) => String(part).padStart(2, "0"))
    .join(":");
}

function colorStatus(status: number): string {
  if (status >= 500) return chalk.red(status);
  if (status >= 400) return chalk.yellow(status);
  return chalk.green(status);
}

/**
 * One line per result: `[HH:MM:SS] <url> <status> in <duration>` or
 * `[HH:MM:SS] <url> ERROR: <message>`.
 */
export function formatResult(result: ProbeResult): string {
  const when = chalk.gray(`[${formatClock(result.timestamp)}]`);
  if (result.error) {
    return `${when} ${result.url} ${chalk.red("ERROR:")} ${result.error.message}`;
  }
  return `${when} ${result.url} ${colorStatus(result.statusCode)} in ${formatDuration(result.durationMs)}`;
}

export function formatSummary(summary: ProbeSummary): string[] {
  const failedColor = summary.failedCount > 0 ? chalk.red : chalk.green;
  const lines = [
    chalk.bold("---- summary ----"),
    `requests: ${summary.total}, success: ${chalk.green(summary.successCount)}, failed: ${failedColor(summary.failedCount)}`,
  ];

  if (summary.total > 0) {
    lines.push(
      `avg latency: ${formatDuration(summary.avgLatencyMs)}, min: ${formatDuration(summary.minLatencyMs)}, max: ${formatDuration(summary.maxLatencyMs)}`,
    );
  }

  const codes = Object.entries(summary.statusCodes)
    .sort(([a], [b]) => Number(a) - Number(b))
    .map(([code, count]) => `${code}=${count}`);
  if (codes.length) {
    lines.push(`status codes: ${codes.join(", ")}`);
  }

  if (summary.retries > 0) {
    lines.push(chalk.yellow(`retries: ${summary.retries}`));
  }
  if (summary.cancelled) {
    lines.push(chalk.yellow("run cancelled before completion"));
  }

  lines.push(`total runtime: ${formatDuration(summary.totalRuntimeMs)}`);
  return lines;
}

export function printResult(result: ProbeResult): void {
  console.log(formatResult(result));
}

export function printSummary(summary: ProbeSummary): void {
  for (const line of formatSummary(summary)) {
    console.log(line);
  }
}
