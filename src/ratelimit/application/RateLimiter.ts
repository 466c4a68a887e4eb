// src/ratelimit/application/RateLimiter.ts

/**
 * RateLimiter
 * -----------
 * Sliding-window gate in front of every outbound model call.
 *
 * - At most `maxRequests` permits are granted within any `windowMs` span.
 * - Callers that cannot be served immediately wait in a FIFO queue; a new
 *   caller never overtakes someone already waiting.
 * - acquire() only delays. Rejection happens solely through the caller's
 *   own signal (OperationCancelledError) or maxWaitMs (RateLimitTimeoutError),
 *   and in both cases the waiter is removed without touching granted state.
 *
 * All state changes happen synchronously between awaits, so concurrent
 * sessions sharing one limiter cannot interleave inside an update.
 */

import { logger as rootLogger, type AppLogger } from '../../shared/logging/Logger';
import { OperationCancelledError } from '../../shared/errors/OperationCancelledError';
import type { AcquireOptions, IRateLimiter, Permit } from '../domain/Permit';
import { RateLimitTimeoutError } from '../domain/RateLimitErrors';

export type RateLimiterOptions = {
  maxRequests: number;
  windowMs: number;
  now?: () => number;
  logger?: AppLogger;
};

export type RateLimiterSnapshot = {
  inWindow: number;
  waiting: number;
};

type Waiter = {
  enqueuedAt: number;
  grant(permit: Permit): void;
  fail(err: Error): void;
};

export class RateLimiter implements IRateLimiter {
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly logger: AppLogger;

  /** Grant timestamps still inside the window, oldest first. */
  private readonly granted: number[] = [];
  private readonly waiters: Waiter[] = [];
  private timer: NodeJS.Timeout | undefined;
  private disposed = false;

  public constructor(options: RateLimiterOptions) {
    if (!Number.isInteger(options.maxRequests) || options.maxRequests <= 0) {
      throw new Error('RateLimiter: maxRequests must be a positive integer');
    }
    if (!Number.isFinite(options.windowMs) || options.windowMs <= 0) {
      throw new Error('RateLimiter: windowMs must be a positive number');
    }

    this.maxRequests = options.maxRequests;
    this.windowMs = options.windowMs;
    this.now = options.now ?? (() => Date.now());
    this.logger = options.logger ?? rootLogger;
  }

  public acquire(options: AcquireOptions = {}): Promise<Permit> {
    if (this.disposed) {
      return Promise.reject(new OperationCancelledError('Rate limiter has been disposed'));
    }
    if (options.signal?.aborted) {
      return Promise.reject(new OperationCancelledError());
    }

    const now = this.now();
    this.prune(now);

    if (this.waiters.length === 0 && this.granted.length < this.maxRequests) {
      this.granted.push(now);
      return Promise.resolve({ grantedAt: now, waitedMs: 0 });
    }

    return this.enqueue(now, options);
  }

  public snapshot(): RateLimiterSnapshot {
    this.prune(this.now());
    return { inWindow: this.granted.length, waiting: this.waiters.length };
  }

  /**
   * Reject every waiter and stop the timer. Further acquire() calls reject.
   */
  public dispose(): void {
    this.disposed = true;
    this.clearTimer();

    const pending = this.waiters.splice(0, this.waiters.length);
    for (const waiter of pending) {
      waiter.fail(new OperationCancelledError('Rate limiter has been disposed'));
    }
  }

  private enqueue(now: number, options: AcquireOptions): Promise<Permit> {
    return new Promise<Permit>((resolve, reject) => {
      const { signal, maxWaitMs } = options;
      let waitTimer: NodeJS.Timeout | undefined;

      const cleanup = (): void => {
        if (waitTimer !== undefined) clearTimeout(waitTimer);
        signal?.removeEventListener('abort', onAbort);
      };

      const waiter: Waiter = {
        enqueuedAt: now,
        grant: (permit) => {
          cleanup();
          resolve(permit);
        },
        fail: (err) => {
          cleanup();
          reject(err);
        },
      };

      const onAbort = (): void => {
        this.remove(waiter);
        waiter.fail(new OperationCancelledError());
      };

      signal?.addEventListener('abort', onAbort, { once: true });

      if (maxWaitMs !== undefined) {
        waitTimer = setTimeout(() => {
          this.remove(waiter);
          waiter.fail(new RateLimitTimeoutError(maxWaitMs));
        }, maxWaitMs);
      }

      this.waiters.push(waiter);
      this.logger.info(
        { waiting: this.waiters.length, inWindow: this.granted.length, limit: this.maxRequests },
        'Rate limit reached; request queued',
      );
      this.schedule();
    });
  }

  private drain(): void {
    this.timer = undefined;

    const now = this.now();
    this.prune(now);

    while (this.waiters.length > 0 && this.granted.length < this.maxRequests) {
      const waiter = this.waiters.shift();
      if (!waiter) break;

      this.granted.push(now);
      waiter.grant({ grantedAt: now, waitedMs: now - waiter.enqueuedAt });
    }

    this.schedule();
  }

  private schedule(): void {
    if (this.timer !== undefined || this.waiters.length === 0) return;

    const oldest = this.granted[0];
    const delay =
      this.granted.length < this.maxRequests || oldest === undefined
        ? 0
        : Math.max(0, oldest + this.windowMs - this.now());

    this.timer = setTimeout(() => this.drain(), delay);
  }

  private remove(waiter: Waiter): void {
    const index = this.waiters.indexOf(waiter);
    if (index >= 0) {
      this.waiters.splice(index, 1);
    }
    if (this.waiters.length === 0) {
      this.clearTimer();
    }
  }

  private prune(now: number): void {
    while (this.granted.length > 0 && this.granted[0] <= now - this.windowMs) {
      this.granted.shift();
    }
  }

  private clearTimer(): void {
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }
}
