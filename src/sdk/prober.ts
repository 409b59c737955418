import { linkedTimeoutSignal } from "./cancellation.js";
import {
  ProbeError,
  TransportError,
  errorMessage,
  toCancelledError,
} from "./errors.js";
import type { Fetcher, ProbeResult } from "./types.js";

/**
 * What a single attempt yields, before the retry loop and the scheduler add
 * their own fields.
 */
export type AttemptResult = Pick<
  ProbeResult,
  "url" | "statusCode" | "durationMs" | "error" | "timestamp"
>;

export interface ProbeOptions {
  fetch: Fetcher;
  signal: AbortSignal;
  /** Deadline for each request of the attempt */
  timeoutMs: number;
  now?: () => number;
}

/**
 * Perform one probe attempt: HEAD first, GET if HEAD fails at the transport
 * level. A non-2xx status is a response, not a failure, and is returned as is.
 *
 * The result carries an error only when no HTTP response was obtained.
 */
export async function probeOnce(
  url: string,
  options: ProbeOptions,
): Promise<AttemptResult> {
  const now = options.now ?? Date.now;
  const start = now();

  let response: Response | undefined;
  let error: ProbeError | undefined;

  try {
    response = await request(url, "HEAD", options);
  } catch (headError) {
    if (options.signal.aborted) {
      error = toProbeError(headError);
    } else {
      try {
        response = await request(url, "GET", options);
      } catch (getError) {
        error = toProbeError(getError);
      }
    }
  }

  if (response) {
    await releaseBody(response);
  }

  return {
    url,
    statusCode: response?.status ?? 0,
    durationMs: now() - start,
    error,
    timestamp: new Date(start),
  };
}

async function request(
  url: string,
  method: "HEAD" | "GET",
  options: ProbeOptions,
): Promise<Response> {
  const { signal, clear } = linkedTimeoutSignal(
    options.signal,
    options.timeoutMs,
  );

  try {
    return await options.fetch(url, { method, signal, redirect: "follow" });
  } catch (error) {
    if (signal.aborted) {
      throw abortReason(signal);
    }
    throw new TransportError(describeFetchError(error));
  } finally {
    clear();
  }
}

// Discard the body so the connection goes back to the pool.
async function releaseBody(response: Response): Promise<void> {
  if (!response.body || response.bodyUsed) {
    return;
  }
  await response.body.cancel().catch(() => undefined);
}

function abortReason(signal: AbortSignal): ProbeError {
  const reason: unknown = signal.reason;
  if (reason instanceof ProbeError) {
    return reason;
  }
  return toCancelledError(reason);
}

function toProbeError(error: unknown): ProbeError {
  if (error instanceof ProbeError) {
    return error;
  }
  return new TransportError(errorMessage(error));
}

// undici reports "fetch failed" and keeps the useful part in `cause`.
function describeFetchError(error: unknown): string {
  if (error instanceof Error && error.cause instanceof Error) {
    return `${error.message}: ${error.cause.message}`;
  }
  return errorMessage(error);
}
