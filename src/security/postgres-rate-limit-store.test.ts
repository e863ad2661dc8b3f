import { beforeEach, describe, expect, it, vi } from "vitest";
import { logger } from "../logger.js";
import { PostgresRateLimitStore } from "./postgres-rate-limit-store.js";
import { RateLimiter } from "./rate-limiter.js";

interface StoredRow {
  window_start: string;
  request_count: number;
}

/**
 * In-process stand-in for the postgres tag: keeps rate_limit_windows in a Map
 * and answers the statements the store issues.
 */
const db = vi.hoisted(() => {
  const rows = new Map<string, StoredRow>();
  const statements: string[] = [];
  const connections: { url: string; options: unknown }[] = [];
  const state = { failOn: "" };

  const tag = async (strings: TemplateStringsArray, ...values: unknown[]) => {
    const text = strings.join("?").replace(/\s+/g, " ").trim();
    const verb = text.split(" ")[0];
    statements.push(verb);

    if (state.failOn && verb === state.failOn) {
      throw new Error("connection terminated unexpectedly");
    }

    switch (verb) {
      case "CREATE":
        return [];
      case "INSERT": {
        const [clientId, windowStart] = values;
        if (!rows.has(String(clientId))) {
          rows.set(String(clientId), {
            window_start: String(windowStart),
            request_count: 0,
          });
        }
        return [];
      }
      case "SELECT": {
        const row = rows.get(String(values[0]));
        return row ? [{ ...row }] : [];
      }
      case "UPDATE": {
        const [windowStart, count, clientId] = values;
        rows.set(String(clientId), {
          window_start: String(windowStart),
          request_count: Number(count),
        });
        return [];
      }
      case "DELETE": {
        const cutoff = Number(values[0]);
        let count = 0;
        for (const [clientId, row] of rows) {
          if (Number(row.window_start) <= cutoff) {
            rows.delete(clientId);
            count++;
          }
        }
        return Object.assign([], { count });
      }
      default:
        throw new Error(`Unexpected statement: ${text}`);
    }
  };

  const sql = Object.assign(tag, {
    begin: async <T>(fn: (tx: typeof tag) => Promise<T>): Promise<T> => {
      statements.push("BEGIN");
      const result = await fn(tag);
      statements.push("COMMIT");
      return result;
    },
    end: async () => {
      statements.push("END");
    },
  });

  return { rows, statements, connections, state, sql };
});

vi.mock("postgres", () => ({
  default: (url: string, options: unknown) => {
    db.connections.push({ url, options });
    return db.sql;
  },
}));

const WINDOW_MS = 60000;

function createStore() {
  return new PostgresRateLimitStore({ connectionString: "postgres://test" });
}

describe("PostgresRateLimitStore", () => {
  beforeEach(() => {
    db.rows.clear();
    db.statements.length = 0;
    db.connections.length = 0;
    db.state.failOn = "";
    for (const level of ["info", "warn", "error", "debug"] as const) {
      vi.spyOn(logger, level).mockImplementation(() => {});
    }
  });

  it("should connect with the configured pool settings", () => {
    createStore();

    expect(db.connections).toEqual([
      {
        url: "postgres://test",
        options: expect.objectContaining({
          max: 10,
          connect_timeout: 5,
          connection: { application_name: "doc-qa-rag" },
          debug: false,
        }),
      },
    ]);
  });

  it("should create the counters table once", async () => {
    const store = createStore();

    await store.initialize();
    await store.initialize();

    expect(db.statements).toEqual(["CREATE"]);
  });

  it("should check and increment inside one transaction", async () => {
    const store = createStore();

    const result = await store.tryAcquire("client-a", 2, WINDOW_MS, 5000);

    expect(result).toEqual({
      acquired: true,
      window: { windowStart: 5000, count: 1 },
    });
    expect(db.statements).toEqual([
      "BEGIN",
      "INSERT",
      "SELECT",
      "UPDATE",
      "COMMIT",
    ]);
    expect(db.rows.get("client-a")).toEqual({
      window_start: "5000",
      request_count: 1,
    });
  });

  it("should deny at the limit without raising the stored count", async () => {
    const store = createStore();

    await store.tryAcquire("client-a", 2, WINDOW_MS, 5000);
    await store.tryAcquire("client-a", 2, WINDOW_MS, 6000);
    const denied = await store.tryAcquire("client-a", 2, WINDOW_MS, 7000);

    expect(denied).toEqual({
      acquired: false,
      window: { windowStart: 5000, count: 2 },
    });
    expect(db.rows.get("client-a")?.request_count).toBe(2);
  });

  it("should restart the window once it has elapsed", async () => {
    const store = createStore();

    await store.tryAcquire("client-a", 1, WINDOW_MS, 5000);
    const result = await store.tryAcquire("client-a", 1, WINDOW_MS, 65000);

    expect(result).toEqual({
      acquired: true,
      window: { windowStart: 65000, count: 1 },
    });
  });

  it("should peek at a live window and ignore an expired one", async () => {
    const store = createStore();
    await store.tryAcquire("client-a", 5, WINDOW_MS, 5000);

    expect(await store.peek("client-a", WINDOW_MS, 6000)).toEqual({
      windowStart: 5000,
      count: 1,
    });
    expect(await store.peek("client-a", WINDOW_MS, 65000)).toBeNull();
    expect(await store.peek("client-b", WINDOW_MS, 6000)).toBeNull();
  });

  it("should purge expired windows and report how many", async () => {
    const store = createStore();
    await store.tryAcquire("client-a", 5, WINDOW_MS, 5000);
    await store.tryAcquire("client-b", 5, WINDOW_MS, 30000);

    const purged = await store.purgeExpired(WINDOW_MS, 70000);

    expect(purged).toBe(1);
    expect([...db.rows.keys()]).toEqual(["client-b"]);
  });

  it("should end the connection pool on close", async () => {
    const store = createStore();

    await store.close();

    expect(db.statements).toEqual(["END"]);
  });

  it("should propagate a failed statement so the limiter fails open", async () => {
    const store = createStore();
    db.state.failOn = "UPDATE";

    await expect(
      store.tryAcquire("client-a", 2, WINDOW_MS, 5000)
    ).rejects.toThrow("connection terminated unexpectedly");

    const limiter = new RateLimiter(store, {
      limit: 2,
      windowMs: WINDOW_MS,
      clock: () => 5000,
    });
    expect(await limiter.admit("client-a")).toEqual({
      allowed: true,
      remaining: 2,
      limit: 2,
      resetAt: 65000,
    });
  });
});
