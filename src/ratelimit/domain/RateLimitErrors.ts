/**
 * Raised when a caller-imposed bound on waiting for a rate-limit permit
 * is exceeded. The limiter itself never rejects; it only delays.
 */
export class RateLimitTimeoutError extends Error {
  public readonly code = 'RATE_LIMIT_TIMEOUT';
  public readonly maxWaitMs: number;

  public constructor(maxWaitMs: number) {
    super(`No rate-limit permit became available within ${maxWaitMs}ms`);
    this.name = 'RateLimitTimeoutError';
    this.maxWaitMs = maxWaitMs;
  }
}
