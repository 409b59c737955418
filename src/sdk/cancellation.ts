import { CancelledError, TimeoutError, toCancelledError } from "./errors.js";

/**
 * A single cancellation signal shared by every suspension point of a run.
 *
 * `cancel()` may be called any number of times, before, during or after the
 * run; only the first call has an effect.
 */
export class CancellationController {
  private readonly controller = new AbortController();
  private readonly detach?: () => void;

  /**
   * @param parent - Optional external signal; its abort cancels this controller.
   */
  constructor(parent?: AbortSignal) {
    if (parent) {
      if (parent.aborted) {
        this.cancel(toCancelledError(parent.reason));
      } else {
        const onAbort = () => this.cancel(toCancelledError(parent.reason));
        parent.addEventListener("abort", onAbort, { once: true });
        this.detach = () => parent.removeEventListener("abort", onAbort);
      }
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  cancel(reason?: string | CancelledError): void {
    if (this.controller.signal.aborted) {
      return;
    }
    const error = typeof reason === "string" || reason === undefined
      ? new CancelledError(reason)
      : reason;
    this.controller.abort(error);
  }

  /**
   * Stop listening to the parent signal.
   */
  dispose(): void {
    this.detach?.();
  }
}

/**
 * Throw the signal's CancelledError if it has fired.
 */
export function throwIfCancelled(signal: AbortSignal): void {
  if (signal.aborted) {
    throw toCancelledError(signal.reason);
  }
}

/** Longest delay Node timers honour; larger values fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Resolve after `ms`, or reject with CancelledError as soon as the signal
 * fires.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(toCancelledError(signal.reason));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(toCancelledError(signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * A signal that fires when the parent fires (with the parent's reason) or
 * when `timeoutMs` elapses (with a TimeoutError). Call `clear()` once the
 * request settles so the timer and listener are released.
 */
export function linkedTimeoutSignal(
  parent: AbortSignal,
  timeoutMs: number,
): { signal: AbortSignal; clear: () => void } {
  const controller = new AbortController();
  const onAbort = () => controller.abort(parent.reason);

  if (parent.aborted) {
    controller.abort(parent.reason);
  } else {
    parent.addEventListener("abort", onAbort, { once: true });
  }

  const timer = setTimeout(
    () => controller.abort(new TimeoutError(timeoutMs)),
    timeoutMs,
  );

  return {
    signal: controller.signal,
    clear: () => {
      clearTimeout(timer);
      parent.removeEventListener("abort", onAbort);
    },
  };
}
