import { PROVIDER_LIMITS, type ProviderLimit } from '../../config/settings';
import { ConfigurationError } from '../pipeline/pipeline-error';
import { sleep, type Sleep } from './retry';

// ===========================================================================
// Rate-limited provider pool
//
// Each provider gets its own concurrency cap (Semaphore) and request rate
// (TokenBucket), so exhausting one provider's quota never blocks another.
// A pool belongs to a single pipeline run and is passed explicitly to every
// call site that reaches a billable API.
// ===========================================================================

/** Counting semaphore with FIFO hand-off to waiters. */
export class Semaphore {
  private available: number;
  private readonly waiters: (() => void)[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ConfigurationError(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
    this.available = capacity;
  }

  acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return Promise.resolve();
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  /** The slot passes straight to the oldest waiter, if any. */
  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }
    this.available = Math.min(this.capacity, this.available + 1);
  }

  get inFlight(): number {
    return this.capacity - this.available;
  }

  get waiting(): number {
    return this.waiters.length;
  }
}

/**
 * Leaky bucket: holds up to `maxRate` tokens and drains at
 * `maxRate / periodMs`. Callers are served in arrival order.
 */
export class TokenBucket {
  private level = 0;
  private lastLeak = Date.now();
  private queue: Promise<void> = Promise.resolve();

  constructor(
    readonly maxRate: number,
    readonly periodMs: number,
    private readonly wait: Sleep = sleep
  ) {
    if (maxRate <= 0 || periodMs <= 0) {
      throw new ConfigurationError(`Invalid rate limit: ${maxRate} per ${periodMs}ms`);
    }
  }

  acquire(): Promise<void> {
    const turn = this.queue.then(() => this.take());
    this.queue = turn;
    return turn;
  }

  private async take(): Promise<void> {
    for (;;) {
      this.leak();
      if (this.level + 1 <= this.maxRate) {
        this.level += 1;
        return;
      }
      await this.wait(Math.ceil(((this.level + 1 - this.maxRate) * this.periodMs) / this.maxRate));
    }
  }

  private leak(): void {
    const now = Date.now();
    this.level = Math.max(0, this.level - ((now - this.lastLeak) * this.maxRate) / this.periodMs);
    this.lastLeak = now;
  }
}

interface ProviderLimiter {
  semaphore: Semaphore;
  bucket: TokenBucket;
}

export class RateLimitedProviderPool {
  private readonly limits: Map<string, ProviderLimit>;
  private readonly limiters = new Map<string, ProviderLimiter>();

  constructor(
    limits: Readonly<Record<string, ProviderLimit>> = PROVIDER_LIMITS,
    private readonly wait: Sleep = sleep
  ) {
    this.limits = new Map(Object.entries(limits));
  }

  /**
   * Acquire the provider's concurrency slot, then a rate token, then call
   * `fn`. The slot is released however `fn` ends; the token drains on its own.
   */
  async run<T>(provider: string, fn: () => Promise<T>): Promise<T> {
    const limiter = this.limiterFor(provider);
    await limiter.semaphore.acquire();
    try {
      await limiter.bucket.acquire();
      return await fn();
    } finally {
      limiter.semaphore.release();
    }
  }

  stats(provider: string): { inFlight: number; waiting: number } {
    const limiter = this.limiters.get(provider);
    return limiter
      ? { inFlight: limiter.semaphore.inFlight, waiting: limiter.semaphore.waiting }
      : { inFlight: 0, waiting: 0 };
  }

  private limiterFor(provider: string): ProviderLimiter {
    const existing = this.limiters.get(provider);
    if (existing) return existing;

    const limit = this.limits.get(provider);
    if (!limit) {
      throw new ConfigurationError(
        `No rate limit configured for provider "${provider}". Available: ${Array.from(this.limits.keys()).join(', ')}`
      );
    }

    const limiter: ProviderLimiter = {
      semaphore: new Semaphore(limit.concurrency),
      bucket: new TokenBucket(limit.maxRate, limit.periodMs, this.wait),
    };
    this.limiters.set(provider, limiter);
    return limiter;
  }
}
