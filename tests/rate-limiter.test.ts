import { describe, expect, it } from "vitest";
import { TokenBucket } from "../src/sync/rate-limiter.js";

function fakeClock(): { now: () => number; sleep: (ms: number) => Promise<void>; sleeps: number[] } {
  let current = 0;
  const sleeps: number[] = [];
  return {
    now: () => current,
    sleep: async (ms) => {
      sleeps.push(ms);
      current += ms;
    },
    sleeps,
  };
}

describe("token bucket", () => {
  it("serves the burst immediately and then waits for refill", async () => {
    const clock = fakeClock();
    const bucket = new TokenBucket({ ratePerSecond: 2, burst: 2, now: clock.now, sleep: clock.sleep });

    await Promise.all([bucket.acquire(), bucket.acquire(), bucket.acquire()]);

    expect(clock.sleeps).toEqual([500]);
    expect(bucket.getStats()).toEqual({ acquired_count: 3, waited_count: 1, total_wait_ms: 500 });
  });

  it("serves concurrent callers in call order", async () => {
    const clock = fakeClock();
    const bucket = new TokenBucket({ ratePerSecond: 1, burst: 1, now: clock.now, sleep: clock.sleep });
    const order: number[] = [];

    await Promise.all([1, 2, 3].map((index) => bucket.acquire().then(() => order.push(index))));

    expect(order).toEqual([1, 2, 3]);
    expect(clock.sleeps).toEqual([1000, 1000]);
  });

  it("does not refill past the burst size", async () => {
    const clock = fakeClock();
    const bucket = new TokenBucket({ ratePerSecond: 10, burst: 1, now: clock.now, sleep: clock.sleep });

    await bucket.acquire();
    await clock.sleep(5000);
    await bucket.acquire();
    await bucket.acquire();

    expect(clock.sleeps).toEqual([5000, 100]);
  });

  it("rejects invalid settings", () => {
    expect(() => new TokenBucket({ ratePerSecond: 0, burst: 1 })).toThrow(/ratePerSecond must be positive/);
    expect(() => new TokenBucket({ ratePerSecond: 1, burst: 0 })).toThrow(/burst must be at least 1/);
  });
});
