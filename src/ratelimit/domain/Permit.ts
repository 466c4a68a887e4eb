/**
 * One unit of rate-limit budget, consumed by one outbound model call.
 */
export interface Permit {
  /**
   * Epoch milliseconds at which the permit was granted.
   */
  grantedAt: number;

  /**
   * Time spent queued before the grant (0 when granted immediately).
   */
  waitedMs: number;
}

export interface AcquireOptions {
  /**
   * Aborting removes the caller from the queue and rejects with
   * OperationCancelledError.
   */
  signal?: AbortSignal;

  /**
   * Reject with RateLimitTimeoutError if no permit is granted in time.
   */
  maxWaitMs?: number;
}

/**
 * Port used by the dispatch bridge; lets tests swap in a no-op gate.
 */
export interface IRateLimiter {
  acquire(options?: AcquireOptions): Promise<Permit>;
}
