/**
 * Token Bucket Rate Limiter: caps request throughput on the HTTP surface.
 * Tokens refill at a steady rate; each request consumes one. Requests that
 * find the bucket empty are refused rather than queued.
 */

export interface RateLimiterOptions {
  /** Maximum tokens in the bucket (burst capacity). Default: 60 */
  maxTokens?: number;
  /** Tokens added per refill interval. Default: 1 */
  refillRate?: number;
  /** Refill interval in milliseconds. Default: 1000 */
  refillIntervalMs?: number;
  /** Clock source, in milliseconds. */
  now?: () => number;
}

export class TokenBucketRateLimiter {
  private tokens: number;
  private readonly maxTokens: number;
  private readonly refillRate: number;
  private readonly refillIntervalMs: number;
  private readonly now: () => number;
  private lastRefillTime: number;

  constructor(options: RateLimiterOptions = {}) {
    this.maxTokens = options.maxTokens ?? 60;
    this.refillRate = options.refillRate ?? 1;
    this.refillIntervalMs = options.refillIntervalMs ?? 1000;
    this.now = options.now ?? Date.now;
    this.tokens = this.maxTokens;
    this.lastRefillTime = this.now();
  }

  /**
   * Take tokens if available.
   * @returns true if tokens were acquired, false if insufficient
   */
  tryAcquire(count: number = 1): boolean {
    this.refill();

    if (this.tokens >= count) {
      this.tokens -= count;
      return true;
    }

    return false;
  }

  /** Milliseconds until the next token arrives; 0 when one is available. */
  retryAfterMs(): number {
    this.refill();
    if (this.tokens >= 1) return 0;
    return Math.max(0, this.lastRefillTime + this.refillIntervalMs - this.now());
  }

  getAvailableTokens(): number {
    this.refill();
    return this.tokens;
  }

  reset(): void {
    this.tokens = this.maxTokens;
    this.lastRefillTime = this.now();
  }

  private refill(): void {
    const now = this.now();
    const elapsed = now - this.lastRefillTime;

    if (elapsed < this.refillIntervalMs) return;

    const intervals = Math.floor(elapsed / this.refillIntervalMs);
    this.tokens = Math.min(this.maxTokens, this.tokens + intervals * this.refillRate);
    this.lastRefillTime += intervals * this.refillIntervalMs;
  }
}
