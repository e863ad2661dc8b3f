/**
 * Fixed-window Rate Limiter
 * Per-client request counting over an injectable, atomic counter store
 */

import { logger } from "../logger.js";

export interface RateLimitWindow {
  readonly windowStart: number;
  readonly count: number;
}

export interface AcquireResult {
  readonly acquired: boolean;
  readonly window: RateLimitWindow;
}

/**
 * Counter storage keyed by client id. `tryAcquire` must check and increment
 * as one atomic step so simultaneous admits cannot exceed the limit.
 */
export interface RateLimitStore {
  tryAcquire(
    clientId: string,
    limit: number,
    windowMs: number,
    now: number
  ): Promise<AcquireResult>;
  peek(
    clientId: string,
    windowMs: number,
    now: number
  ): Promise<RateLimitWindow | null>;
  purgeExpired(windowMs: number, now: number): Promise<number>;
  close(): Promise<void>;
}

export interface AdmissionResult {
  readonly allowed: boolean;
  readonly remaining: number;
  readonly limit: number;
  /** Epoch milliseconds at which the current window ends. */
  readonly resetAt: number;
}

export interface RateLimiterOptions {
  readonly limit: number;
  readonly windowMs: number;
  readonly clock?: () => number;
}

/**
 * One admission step for a stored window. An expired or missing window
 * restarts at `now`; a full window is returned unchanged and denies.
 */
export function advanceWindow(
  stored: RateLimitWindow | null,
  limit: number,
  windowMs: number,
  now: number
): AcquireResult {
  const current =
    !stored || now - stored.windowStart >= windowMs
      ? { windowStart: now, count: 0 }
      : stored;

  if (current.count >= limit) {
    return { acquired: false, window: current };
  }

  return {
    acquired: true,
    window: { windowStart: current.windowStart, count: current.count + 1 },
  };
}

/**
 * Single-process store. The read-check-write in `tryAcquire` runs without
 * yielding to the event loop, which serializes concurrent admits.
 */
export class InMemoryRateLimitStore implements RateLimitStore {
  private readonly windows = new Map<string, RateLimitWindow>();

  async tryAcquire(
    clientId: string,
    limit: number,
    windowMs: number,
    now: number
  ): Promise<AcquireResult> {
    const result = advanceWindow(
      this.windows.get(clientId) ?? null,
      limit,
      windowMs,
      now
    );
    this.windows.set(clientId, result.window);
    return result;
  }

  async peek(
    clientId: string,
    windowMs: number,
    now: number
  ): Promise<RateLimitWindow | null> {
    const existing = this.windows.get(clientId);
    if (!existing || now - existing.windowStart >= windowMs) {
      return null;
    }
    return existing;
  }

  async purgeExpired(windowMs: number, now: number): Promise<number> {
    let purged = 0;
    for (const [clientId, window] of this.windows.entries()) {
      if (now - window.windowStart >= windowMs) {
        this.windows.delete(clientId);
        purged++;
      }
    }
    return purged;
  }

  async close(): Promise<void> {
    this.windows.clear();
  }

  get size(): number {
    return this.windows.size;
  }
}

export class RateLimiter {
  private readonly limit: number;
  private readonly windowMs: number;
  private readonly clock: () => number;

  constructor(
    private readonly store: RateLimitStore,
    options: RateLimiterOptions
  ) {
    this.limit = options.limit;
    this.windowMs = options.windowMs;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Admit or deny one request for a client
   */
  async admit(clientId: string): Promise<AdmissionResult> {
    const now = this.clock();

    try {
      const { acquired, window } = await this.store.tryAcquire(
        clientId,
        this.limit,
        this.windowMs,
        now
      );
      const resetAt = window.windowStart + this.windowMs;

      if (!acquired) {
        logger.security("RATE_LIMIT_EXCEEDED", "WARNING", {
          clientId,
          limit: this.limit,
          windowMs: this.windowMs,
        });
        return { allowed: false, remaining: 0, limit: this.limit, resetAt };
      }

      return {
        allowed: true,
        remaining: Math.max(0, this.limit - window.count),
        limit: this.limit,
        resetAt,
      };
    } catch (error) {
      logger.error("Rate limit check failed", {
        error: error instanceof Error ? error.message : String(error),
        clientId,
      });

      // Fail open - allow request if the counter store is unreachable
      return {
        allowed: true,
        remaining: this.limit,
        limit: this.limit,
        resetAt: now + this.windowMs,
      };
    }
  }

  /**
   * Remaining quota without consuming a request
   */
  async peek(clientId: string): Promise<number> {
    const window = await this.store.peek(clientId, this.windowMs, this.clock());
    return window ? Math.max(0, this.limit - window.count) : this.limit;
  }

  async purgeExpired(): Promise<number> {
    return this.store.purgeExpired(this.windowMs, this.clock());
  }

  async close(): Promise<void> {
    await this.store.close();
  }
}
