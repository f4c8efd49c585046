import { TooManyRequestsError } from './errors';

interface RateLimiterOptions {
  maxRequestsPerMinute: number;
  maxWaitMs?: number;
  now?: () => number;
}

/**
 * In-process token bucket guarding calls to the extraction model.
 * Each API and worker process holds its own bucket.
 */
export class RateLimiter {
  private tokens: number;
  private readonly maxTokens: number;
  private readonly refillRate: number; // tokens per ms
  private readonly maxWaitMs: number;
  private readonly now: () => number;
  private lastRefill: number;

  constructor(options: RateLimiterOptions) {
    this.maxTokens = options.maxRequestsPerMinute;
    this.tokens = this.maxTokens;
    this.refillRate = options.maxRequestsPerMinute / 60000;
    this.maxWaitMs = options.maxWaitMs ?? 30000;
    this.now = options.now ?? Date.now;
    this.lastRefill = this.now();
  }

  /**
   * Take a token, waiting for one to refill if needed.
   * Throws TooManyRequestsError when the wait would exceed maxWaitMs.
   */
  async acquire(): Promise<void> {
    const waitMs = this.reserve();
    if (waitMs > 0) {
      await new Promise<void>(resolve => setTimeout(resolve, waitMs));
    }
  }

  // Tokens may go negative: each waiter owns the deficit it created
  private reserve(): number {
    this.refill();

    const waitMs = this.tokens >= 1 ? 0 : Math.ceil((1 - this.tokens) / this.refillRate);
    if (waitMs > this.maxWaitMs) {
      throw new TooManyRequestsError(
        `Rate limit exceeded. Try again in ${Math.ceil(waitMs / 1000)} seconds`,
        Math.ceil(waitMs / 1000)
      );
    }

    this.tokens -= 1;
    return waitMs;
  }

  private refill(): void {
    const now = this.now();
    const elapsed = now - this.lastRefill;
    this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.refillRate);
    this.lastRefill = now;
  }
}
