/**
 * Session Management Service
 * In-memory per-client activity tracking
 */

import { logger } from "../logger.js";
import type { RateLimiter } from "../security/rate-limiter.js";

interface ClientSession {
  readonly clientId: string;
  readonly startedAt: number;
  lastSeenAt: number;
  requestCount: number;
}

export interface SessionInfo {
  readonly clientId: string;
  readonly sessionStart: string;
  readonly requestsMade: number;
  readonly rateLimitRemaining: number;
}

export interface SessionServiceOptions {
  readonly timeoutSeconds: number;
  readonly clock?: () => number;
}

export class SessionService {
  private sessions = new Map<string, ClientSession>();
  private readonly clock: () => number;

  constructor(
    private readonly rateLimiter: Pick<RateLimiter, "peek">,
    private readonly options: SessionServiceOptions
  ) {
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Record one request for a client, starting a new session when needed
   */
  touch(clientId: string): void {
    const now = this.clock();
    const session = this.sessions.get(clientId);

    if (!session || this.isSessionExpired(session, now)) {
      this.sessions.set(clientId, {
        clientId,
        startedAt: now,
        lastSeenAt: now,
        requestCount: 1,
      });
      logger.debug("Session created", { clientId });
      return;
    }

    session.lastSeenAt = now;
    session.requestCount += 1;
  }

  /**
   * Session info for a client; a client with no live session reports zero requests
   */
  async describe(clientId: string): Promise<SessionInfo> {
    const now = this.clock();
    const session = this.sessions.get(clientId);
    const live = session && !this.isSessionExpired(session, now) ? session : null;

    return {
      clientId,
      sessionStart: new Date(live?.startedAt ?? now).toISOString(),
      requestsMade: live?.requestCount ?? 0,
      rateLimitRemaining: await this.rateLimiter.peek(clientId),
    };
  }

  /**
   * Get session statistics
   */
  getStats(): { total: number; active: number } {
    const now = this.clock();
    let active = 0;

    for (const session of this.sessions.values()) {
      if (!this.isSessionExpired(session, now)) {
        active++;
      }
    }

    return { total: this.sessions.size, active };
  }

  /**
   * Drop sessions idle longer than the timeout
   */
  purgeExpired(): number {
    const now = this.clock();
    let cleanedCount = 0;

    for (const [clientId, session] of this.sessions.entries()) {
      if (this.isSessionExpired(session, now)) {
        this.sessions.delete(clientId);
        cleanedCount++;
      }
    }

    if (cleanedCount > 0) {
      logger.debug("Cleaned up expired sessions", {
        cleanedCount,
        remainingSessions: this.sessions.size,
      });
    }

    return cleanedCount;
  }

  private isSessionExpired(session: ClientSession, now: number): boolean {
    return now - session.lastSeenAt > this.options.timeoutSeconds * 1000;
  }
}
