import chalk from "chalk";
import { Command } from "commander";
import { Pinger } from "../sdk/pinger.js";
import { ConfigError, errorMessage } from "../sdk/errors.js";
import type { Fetcher } from "../sdk/types.js";
import {
  DEFAULT_CLI_OPTIONS,
  parseCliOptions,
  toPingerOptions,
  type CliConfig,
  type RawCliOptions,
} from "./config.js";
import { printResult, printSummary } from "./formatter.js";
import { onShutdownSignal } from "./signals.js";
import { loadUrls } from "./urls.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED_TWICE = 130;

export interface RunDependencies {
  fetch?: Fetcher;
  /** Override SIGINT/SIGTERM registration */
  onShutdown?: typeof onShutdownSignal;
}

function fail(message: string): number {
  console.error(chalk.red(`[fleetping] ${message}`));
  return EXIT_FAILURE;
}

/**
 * Load the URL list, probe it and print every result plus the summary.
 * Resolves with the process exit code.
 */
export async function runProbe(
  raw: RawCliOptions,
  deps: RunDependencies = {},
): Promise<number> {
  let config: CliConfig;
  try {
    config = parseCliOptions(raw);
  } catch (error) {
    if (error instanceof ConfigError) {
      return fail(error.message);
    }
    throw error;
  }

  let urls: string[];
  try {
    urls = await loadUrls(config.urls);
  } catch (error) {
    return fail(`failed to load urls: ${errorMessage(error)}`);
  }
  if (!urls.length) {
    return fail("no urls provided");
  }

  const pinger = new Pinger(urls, {
    ...toPingerOptions(config),
    fetch: deps.fetch,
    onResult: printResult,
  });

  const register = deps.onShutdown ?? onShutdownSignal;
  const dispose = register(() => {
    if (pinger.signal.aborted) {
      process.exit(EXIT_INTERRUPTED_TWICE);
    }
    console.log(chalk.yellow("\nreceived interrupt, shutting down..."));
    pinger.cancel("interrupted");
  });

  try {
    const summary = await pinger.run();
    printSummary(summary);
  } finally {
    dispose();
  }
  return EXIT_OK;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("fleetping")
    .description("Probe a list of URLs over HTTP with bounded concurrency, rate limiting and retries")
    .version("0.1.0")
    .option("--urls <path>", "file with URLs (one per line); lines starting with # are ignored", DEFAULT_CLI_OPTIONS.urls)
    .option("--concurrency <number>", "max concurrent requests", DEFAULT_CLI_OPTIONS.concurrency)
    .option("--rate <number>", "rate limit in requests per second (0 = unlimited)", DEFAULT_CLI_OPTIONS.rate)
    .option("--timeout <duration>", "HTTP request timeout, e.g. 500ms, 5s", DEFAULT_CLI_OPTIONS.timeout)
    .option("--count <number>", "how many pings per URL", DEFAULT_CLI_OPTIONS.count)
    .option("--interval <duration>", "interval between ping rounds", DEFAULT_CLI_OPTIONS.interval)
    .option("--retries <number>", "retries on failure (per request)", DEFAULT_CLI_OPTIONS.retries)
    .action(async (options: RawCliOptions) => {
      process.exitCode = await runProbe(options);
    });

  return program;
}
