interface TokenBucketOptions {
  ratePerSecond: number;
  burst: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface TokenBucketStats {
  acquired_count: number;
  waited_count: number;
  total_wait_ms: number;
}

/**
 * One bucket is shared by every worker in a run. Acquisitions are queued on a promise chain, so
 * concurrent callers are served one at a time in call order.
 */
export class TokenBucket {
  private readonly ratePerSecond: number;
  private readonly capacity: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  private tokens: number;
  private lastRefillAt: number;
  private queue: Promise<void> = Promise.resolve();

  private readonly stats: TokenBucketStats = {
    acquired_count: 0,
    waited_count: 0,
    total_wait_ms: 0,
  };

  constructor(options: TokenBucketOptions) {
    if (!(options.ratePerSecond > 0)) {
      throw new Error(`TokenBucket ratePerSecond must be positive, got ${options.ratePerSecond}`);
    }
    if (!(options.burst >= 1)) {
      throw new Error(`TokenBucket burst must be at least 1, got ${options.burst}`);
    }

    this.ratePerSecond = options.ratePerSecond;
    this.capacity = options.burst;
    this.now = options.now ?? (() => Date.now());
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.tokens = options.burst;
    this.lastRefillAt = this.now();
  }

  getStats(): TokenBucketStats {
    return { ...this.stats };
  }

  acquire(): Promise<void> {
    const turn = this.queue.then(() => this.takeToken());
    this.queue = turn.catch(() => undefined);
    return turn;
  }

  private refill(): void {
    const now = this.now();
    const elapsedMs = Math.max(0, now - this.lastRefillAt);
    this.tokens = Math.min(this.capacity, this.tokens + (elapsedMs / 1000) * this.ratePerSecond);
    this.lastRefillAt = now;
  }

  private async takeToken(): Promise<void> {
    this.refill();
    while (this.tokens < 1) {
      const waitMs = Math.ceil(((1 - this.tokens) / this.ratePerSecond) * 1000);
      this.stats.waited_count += 1;
      this.stats.total_wait_ms += waitMs;
      await this.sleep(waitMs);
      this.refill();
    }

    this.tokens -= 1;
    this.stats.acquired_count += 1;
  }
}
