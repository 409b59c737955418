import { z } from "zod";
import { MAX_TIMER_DELAY_MS } from "../sdk/cancellation.js";
import { ConfigError } from "../sdk/errors.js";
import type { PingerOptions } from "../sdk/types.js";

const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  "µs": 1e-3,
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
};

const DURATION_PART = /(\d+(?:\.\d+)?)(ns|us|µs|ms|s|m|h)/gy;

/**
 * Parse a duration such as `500ms`, `5s`, `1m30s` or `1.5h` into
 * milliseconds. A bare number is taken as milliseconds.
 */
export function parseDuration(text: string): number {
  const input = text.trim();
  if (/^\d+(?:\.\d+)?$/.test(input)) {
    return Number(input);
  }

  let total = 0;
  let consumed = 0;
  for (const [part, amount, unit] of input.matchAll(DURATION_PART)) {
    total += Number(amount) * UNIT_MS[unit];
    consumed += part.length;
  }

  if (!input || consumed !== input.length) {
    throw new ConfigError(`Invalid duration: "${text}"`);
  }
  return total;
}

const integer = (min: number) =>
  z.coerce
    .number({ invalid_type_error: "must be a number" })
    .int({ message: "must be an integer" })
    .min(min, { message: `must be at least ${min}` });

// Range checks live inside the transform so they never see a failed parse.
const duration = ({ positive }: { positive: boolean }) =>
  z.string().transform((value, ctx) => {
    let ms: number;
    try {
      ms = parseDuration(value);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: error instanceof Error ? error.message : String(error),
      });
      return z.NEVER;
    }

    if (positive && ms <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be positive" });
      return z.NEVER;
    }
    if (ms > MAX_TIMER_DELAY_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `must be at most ${MAX_TIMER_DELAY_MS}ms`,
      });
      return z.NEVER;
    }
    return ms;
  });

export const cliOptionsSchema = z.object({
  urls: z.string().trim().min(1, { message: "must not be empty" }),
  concurrency: integer(1),
  rate: integer(0),
  timeout: duration({ positive: true }),
  count: integer(1),
  interval: duration({ positive: false }),
  retries: integer(0),
});

/** Raw option values as commander hands them over */
export interface RawCliOptions {
  urls: string;
  concurrency: string;
  rate: string;
  timeout: string;
  count: string;
  interval: string;
  retries: string;
}

export type CliConfig = z.output<typeof cliOptionsSchema>;

export const DEFAULT_CLI_OPTIONS: RawCliOptions = {
  urls: "urls.txt",
  concurrency: "50",
  rate: "0",
  timeout: "5s",
  count: "1",
  interval: "2s",
  retries: "2",
};

/**
 * Validate raw flag values. Throws a ConfigError naming every bad flag.
 */
export function parseCliOptions(raw: RawCliOptions): CliConfig {
  const parsed = cliOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `--${issue.path.join(".")} ${issue.message}`,
    );
    throw new ConfigError(`Invalid flags: ${problems.join("; ")}`);
  }
  return parsed.data;
}

export function toPingerOptions(config: CliConfig): PingerOptions {
  return {
    concurrency: config.concurrency,
    rate: config.rate,
    timeoutMs: config.timeout,
    count: config.count,
    intervalMs: config.interval,
    retries: config.retries,
  };
}
