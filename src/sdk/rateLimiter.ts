import { toCancelledError } from "./errors.js";

type Waiter = {
  resolve: () => void;
  detach: () => void;
};

/** Node timers never fire more often than once per millisecond. */
const MIN_TICK_MS = 1;

/**
 * Leaky-bucket approximation of a requests-per-second ceiling.
 *
 * A ticker produces tokens at `rate` per second, independent of consumption:
 * one every `1000 / rate` ms, or for rates above 1000 several per 1ms tick in
 * proportion to the time elapsed, with the fraction carried to the next tick.
 * A token goes to the oldest waiter, else into a buffer of `2 * rate` tokens;
 * when the buffer is full the token is dropped, so idle periods allow at most
 * a short burst.
 *
 * With `rate = 0` the limiter is disabled and `acquire` never waits.
 */
export class RateLimiter {
  readonly capacity: number;
  private tokens = 0;
  private readonly waiters: Waiter[] = [];
  private timer?: ReturnType<typeof setInterval>;
  private dropped = 0;
  private lastTickAt = 0;
  private credit = 0;

  constructor(
    readonly rate: number,
    private readonly signal?: AbortSignal,
  ) {
    if (!Number.isInteger(rate) || rate < 0) {
      throw new RangeError("rate must be a non-negative integer.");
    }
    this.capacity = rate * 2;
  }

  get enabled(): boolean {
    return this.rate > 0;
  }

  /** Tokens currently buffered */
  get available(): number {
    return this.tokens;
  }

  /** Tokens discarded because the buffer was full */
  get droppedTicks(): number {
    return this.dropped;
  }

  /**
   * Start the ticker. Stops by itself when the limiter's signal fires.
   */
  start(): void {
    if (!this.enabled || this.timer || this.signal?.aborted) {
      return;
    }

    this.lastTickAt = Date.now();
    this.credit = 0;
    this.timer = setInterval(
      () => this.tick(),
      Math.max(MIN_TICK_MS, 1000 / this.rate),
    );
    this.signal?.addEventListener("abort", () => this.stop(), { once: true });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  /**
   * Wait for one token. Rejects with CancelledError when `signal` fires
   * first.
   */
  acquire(signal?: AbortSignal): Promise<void> {
    if (!this.enabled) {
      return Promise.resolve();
    }
    if (signal?.aborted) {
      return Promise.reject(toCancelledError(signal.reason));
    }
    if (this.tokens > 0) {
      this.tokens -= 1;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        reject(toCancelledError(signal?.reason));
      };
      const waiter: Waiter = {
        resolve,
        detach: () => signal?.removeEventListener("abort", onAbort),
      };
      this.waiters.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  private tick(): void {
    const at = Date.now();
    this.credit += ((at - this.lastTickAt) * this.rate) / 1000;
    this.lastTickAt = at;

    const produced = Math.floor(this.credit);
    this.credit -= produced;
    for (let i = 0; i < produced; i++) {
      this.release();
    }
  }

  private release(): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.detach();
      waiter.resolve();
      return;
    }

    // Best-effort deposit: never block the ticker.
    if (this.tokens < this.capacity) {
      this.tokens += 1;
    } else {
      this.dropped += 1;
    }
  }
}
