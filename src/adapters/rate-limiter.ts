import type { ProviderName } from './provider-types.js';

export interface RateLimiterOptions {
  /** Window size in ms (default one minute) */
  windowMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Serializes async critical sections. Each caller waits for the previous
 * holder's section to settle before running its own.
 */
class Lock {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.tail.then(fn);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}

interface Window {
  limit: number;
  calls: number[];
  lock: Lock;
}

/**
 * Sliding-window limiter keyed by provider.
 *
 * Each provider keeps the timestamps of its calls in the trailing window.
 * When the window is full, `acquire()` sleeps until the oldest call ages
 * out, so a call over the limit is delayed rather than rejected. The check
 * and the append happen under the provider's lock.
 */
export class SlidingWindowRateLimiter {
  private readonly windows = new Map<ProviderName, Window>();
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(limits: Iterable<[ProviderName, number]>, options: RateLimiterOptions = {}) {
    this.windowMs = options.windowMs ?? 60_000;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;

    for (const [provider, limit] of limits) {
      if (limit < 1) throw new Error(`Rate limit for ${provider} must be at least 1`);
      this.windows.set(provider, { limit, calls: [], lock: new Lock() });
    }
  }

  async acquire(provider: ProviderName): Promise<void> {
    const window = this.windows.get(provider);
    if (!window) {
      throw new Error(`No rate limit registered for provider ${provider}`);
    }

    await window.lock.runExclusive(async () => {
      for (;;) {
        const now = this.now();
        window.calls = window.calls.filter((ts) => now - ts < this.windowMs);

        if (window.calls.length < window.limit) {
          window.calls.push(now);
          return;
        }

        const oldest = window.calls[0] ?? now;
        await this.sleep(this.windowMs - (now - oldest));
      }
    });
  }

  /** Calls recorded in the current window. */
  callsInWindow(provider: ProviderName): number {
    const window = this.windows.get(provider);
    if (!window) return 0;
    const now = this.now();
    return window.calls.filter((ts) => now - ts < this.windowMs).length;
  }
}
