import { jest, describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import { RateLimiter } from "./rateLimiter.js";
import { CancelledError } from "./errors.js";

describe("RateLimiter", () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe("constructor", () => {
    it("should reject a negative or fractional rate", () => {
      expect(() => new RateLimiter(-1)).toThrow(
        "rate must be a non-negative integer."
      );
      expect(() => new RateLimiter(1.5)).toThrow(
        "rate must be a non-negative integer."
      );
    });

    it("should size the buffer at twice the rate", () => {
      expect(new RateLimiter(5).capacity).toBe(10);
    });
  });

  describe("disabled", () => {
    it("should admit immediately when rate is 0", async () => {
      const limiter = new RateLimiter(0);
      limiter.start();

      expect(limiter.enabled).toBe(false);
      await expect(limiter.acquire()).resolves.toBeUndefined();
      expect(jest.getTimerCount()).toBe(0);
    });
  });

  describe("token production", () => {
    it("should deposit one token per tick", () => {
      const limiter = new RateLimiter(10);
      limiter.start();

      jest.advanceTimersByTime(350);

      expect(limiter.available).toBe(3);
      limiter.stop();
    });

    it("should drop ticks once the buffer is full", () => {
      const limiter = new RateLimiter(2);
      limiter.start();

      // 20 ticks at 500ms
      jest.advanceTimersByTime(10_000);

      expect(limiter.available).toBe(4);
      expect(limiter.droppedTicks).toBe(16);
      limiter.stop();
    });

    it("should keep up with rates above one token per millisecond", () => {
      const limiter = new RateLimiter(4000);
      limiter.start();

      jest.advanceTimersByTime(1000);

      expect(limiter.available).toBe(4000);
      expect(limiter.droppedTicks).toBe(0);
      limiter.stop();
    });

    it("should carry fractional tokens between ticks", () => {
      const limiter = new RateLimiter(1500);
      limiter.start();

      jest.advanceTimersByTime(1);
      expect(limiter.available).toBe(1);

      jest.advanceTimersByTime(1);
      expect(limiter.available).toBe(3);

      jest.advanceTimersByTime(998);
      expect(limiter.available).toBe(1500);
      limiter.stop();
    });

    it("should stop producing after stop()", () => {
      const limiter = new RateLimiter(10);
      limiter.start();
      jest.advanceTimersByTime(100);
      limiter.stop();
      jest.advanceTimersByTime(1000);

      expect(limiter.available).toBe(1);
    });

    it("should stop producing when its signal fires", () => {
      const controller = new AbortController();
      const limiter = new RateLimiter(10, controller.signal);
      limiter.start();

      controller.abort();
      jest.advanceTimersByTime(1000);

      expect(limiter.available).toBe(0);
      expect(jest.getTimerCount()).toBe(0);
    });
  });

  describe("acquire", () => {
    it("should draw a buffered token without waiting", async () => {
      const limiter = new RateLimiter(10);
      limiter.start();
      jest.advanceTimersByTime(300);

      await limiter.acquire();

      expect(limiter.available).toBe(2);
      limiter.stop();
    });

    it("should hand the next tick to a waiting consumer", async () => {
      const limiter = new RateLimiter(10);
      limiter.start();

      let admitted = false;
      const pending = limiter.acquire().then(() => {
        admitted = true;
      });
      await Promise.resolve();
      expect(admitted).toBe(false);

      jest.advanceTimersByTime(100);
      await pending;

      expect(admitted).toBe(true);
      expect(limiter.available).toBe(0);
      limiter.stop();
    });

    it("should serve waiters in arrival order", async () => {
      const limiter = new RateLimiter(10);
      limiter.start();
      const order: string[] = [];

      const first = limiter.acquire().then(() => order.push("first"));
      const second = limiter.acquire().then(() => order.push("second"));

      jest.advanceTimersByTime(100);
      await first;
      expect(order).toEqual(["first"]);

      jest.advanceTimersByTime(100);
      await second;
      expect(order).toEqual(["first", "second"]);
      limiter.stop();
    });

    it("should serve several waiters from one tick at high rates", async () => {
      const limiter = new RateLimiter(3000);
      limiter.start();

      const pending = [limiter.acquire(), limiter.acquire(), limiter.acquire()];
      jest.advanceTimersByTime(1);
      await Promise.all(pending);

      expect(limiter.available).toBe(0);
      limiter.stop();
    });

    it("should reject a waiter when cancelled and keep the next token", async () => {
      const limiter = new RateLimiter(10);
      limiter.start();
      const controller = new AbortController();

      const pending = limiter.acquire(controller.signal);
      controller.abort(new CancelledError("stop"));

      await expect(pending).rejects.toThrow("stop");
      jest.advanceTimersByTime(100);
      expect(limiter.available).toBe(1);
      limiter.stop();
    });

    it("should reject at once when already cancelled", async () => {
      const limiter = new RateLimiter(10);
      const controller = new AbortController();
      controller.abort();

      await expect(limiter.acquire(controller.signal)).rejects.toBeInstanceOf(
        CancelledError
      );
    });

    it("should admit about `rate` tokens per second", async () => {
      const limiter = new RateLimiter(5);
      limiter.start();
      let admitted = 0;

      for (let step = 0; step < 100; step++) {
        jest.advanceTimersByTime(100);
        while (limiter.available > 0) {
          await limiter.acquire();
          admitted += 1;
        }
      }

      // 10 seconds at 5/s
      expect(admitted).toBe(50);
      limiter.stop();
    });
  });
});
