import { toCancelledError } from "./errors.js";

export type Release = () => void;

type Waiter = {
  grant: (release: Release) => void;
  detach: () => void;
};

/**
 * Counting permit that bounds how many tasks do network work at once.
 * Waiters are served in arrival order.
 */
export class AdmissionGate {
  private inFlight = 0;
  private highWater = 0;
  private readonly queue: Waiter[] = [];

  constructor(readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError("concurrency must be a positive integer.");
    }
  }

  /** Permits currently held */
  get active(): number {
    return this.inFlight;
  }

  /** Tasks queued for a permit */
  get waiting(): number {
    return this.queue.length;
  }

  /** Highest number of permits ever held at once */
  get peak(): number {
    return this.highWater;
  }

  /**
   * Take a permit, waiting if none is free. The returned function gives it
   * back; calling it more than once has no further effect.
   */
  acquire(signal?: AbortSignal): Promise<Release> {
    if (signal?.aborted) {
      return Promise.reject(toCancelledError(signal.reason));
    }
    if (this.inFlight < this.concurrency) {
      return Promise.resolve(this.grant());
    }

    return new Promise<Release>((resolve, reject) => {
      const onAbort = () => {
        const index = this.queue.indexOf(waiter);
        if (index !== -1) {
          this.queue.splice(index, 1);
        }
        reject(toCancelledError(signal?.reason));
      };
      const waiter: Waiter = {
        grant: resolve,
        detach: () => signal?.removeEventListener("abort", onAbort),
      };
      this.queue.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /**
   * Run `fn` while holding a permit. The permit is released on every exit
   * path, including a rejection from `fn`.
   */
  async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private grant(): Release {
    this.inFlight += 1;
    this.highWater = Math.max(this.highWater, this.inFlight);
    return this.permit();
  }

  private permit(): Release {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      this.handOff();
    };
  }

  // A freed permit passes straight to the next waiter, if any.
  private handOff(): void {
    const next = this.queue.shift();
    if (next) {
      next.detach();
      next.grant(this.permit());
      return;
    }
    this.inFlight -= 1;
  }
}
