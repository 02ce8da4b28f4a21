/**
 * Tests for logger middleware.
 */

import { describe, it, expect } from "vitest";
import type { RequestLogEntry } from "../../src/middleware/logger.js";
import { asCaller, createTestApp } from "../setup.js";

describe("loggerMiddleware", () => {
  it("calls logFn with request details", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    const res = await app.request("/health");

    expect(entries).toHaveLength(1);
    const [entry] = entries;
    expect(entry?.method).toBe("GET");
    expect(entry?.path).toBe("/health");
    expect(entry?.status).toBe(200);
    expect(entry?.durationMs).toBeGreaterThanOrEqual(0);
    expect(entry?.requestId).toBe(res.headers.get("X-Request-Id"));
    expect(entry?.caller).toBeUndefined();
  });

  it("includes the caller and the status of a failed request", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request(asCaller("alice", "/api/v1/contributions", "POST", { amount: "0.001" }));

    expect(entries).toHaveLength(1);
    expect(entries[0]?.method).toBe("POST");
    expect(entries[0]?.path).toBe("/api/v1/contributions");
    expect(entries[0]?.status).toBe(422);
    expect(entries[0]?.caller).toBe("alice");
  });
});
