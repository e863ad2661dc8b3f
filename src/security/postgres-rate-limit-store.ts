/**
 * PostgreSQL-backed rate limit counters
 * Shares windows across processes; a row lock serializes concurrent admits
 */
import postgres from "postgres";
import { logger } from "../logger.js";
import {
  type AcquireResult,
  type RateLimitStore,
  type RateLimitWindow,
  advanceWindow,
} from "./rate-limiter.js";

interface WindowRow {
  window_start: string;
  request_count: number;
}

export interface PostgresRateLimitStoreConfig {
  readonly connectionString: string;
  readonly maxConnections?: number;
  readonly debug?: boolean;
}

export class PostgresRateLimitStore implements RateLimitStore {
  private readonly sql: ReturnType<typeof postgres>;
  private initialized = false;

  constructor(config: PostgresRateLimitStoreConfig) {
    this.sql = postgres(config.connectionString, {
      max: config.maxConnections ?? 10,
      idle_timeout: 300,
      connect_timeout: 5,
      connection: {
        application_name: "doc-qa-rag",
      },
      debug: config.debug
        ? (_connection: number, query: string) => {
            logger.debug("Database Query", { query: query.slice(0, 100) });
          }
        : false,
    });
  }

  /**
   * Ensure the counters table exists
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    const initStart = Date.now();
    try {
      await this.sql`
        CREATE TABLE IF NOT EXISTS rate_limit_windows (
          client_id TEXT PRIMARY KEY,
          window_start BIGINT NOT NULL,
          request_count INTEGER NOT NULL
        )
      `;
      this.initialized = true;
      logger.info("Rate limit store initialized", {
        store: "postgres",
        initTime: Date.now() - initStart,
      });
    } catch (error) {
      logger.error("Rate limit store initialization failed", {
        error: String(error),
      });
      throw new Error(`Rate limit store initialization failed: ${error}`);
    }
  }

  async tryAcquire(
    clientId: string,
    limit: number,
    windowMs: number,
    now: number
  ): Promise<AcquireResult> {
    return this.sql.begin(async (tx) => {
      await tx`
        INSERT INTO rate_limit_windows (client_id, window_start, request_count)
        VALUES (${clientId}, ${now}, 0)
        ON CONFLICT (client_id) DO NOTHING
      `;

      const rows = await tx<WindowRow[]>`
        SELECT window_start, request_count
        FROM rate_limit_windows
        WHERE client_id = ${clientId}
        FOR UPDATE
      `;

      const row = rows[0];
      const result = advanceWindow(
        row
          ? { windowStart: Number(row.window_start), count: row.request_count }
          : null,
        limit,
        windowMs,
        now
      );

      await tx`
        UPDATE rate_limit_windows
        SET window_start = ${result.window.windowStart}, request_count = ${result.window.count}
        WHERE client_id = ${clientId}
      `;

      return result;
    });
  }

  async peek(
    clientId: string,
    windowMs: number,
    now: number
  ): Promise<RateLimitWindow | null> {
    const rows = await this.sql<WindowRow[]>`
      SELECT window_start, request_count
      FROM rate_limit_windows
      WHERE client_id = ${clientId}
    `;

    const row = rows[0];
    if (!row) return null;

    const windowStart = Number(row.window_start);
    if (now - windowStart >= windowMs) return null;

    return { windowStart, count: row.request_count };
  }

  async purgeExpired(windowMs: number, now: number): Promise<number> {
    const result = await this.sql`
      DELETE FROM rate_limit_windows
      WHERE window_start <= ${now - windowMs}
    `;
    return result.count;
  }

  async close(): Promise<void> {
    try {
      await this.sql.end();
    } catch (error) {
      logger.warn("Database close warning", { error: String(error) });
    }
  }
}
