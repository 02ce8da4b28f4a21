/**
 * Tests for health and readiness routes.
 */

import { describe, it, expect } from "vitest";
import { createTestApp } from "./setup.js";

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { status: string; timestamp: string };
    expect(body.status).toBe("ok");
    expect(typeof body.timestamp).toBe("string");
  });

  it("sets an X-Request-Id header", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.headers.get("X-Request-Id")).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("propagates a well-formed incoming X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health", {
      headers: { "X-Request-Id": "trace-42" },
    });

    expect(res.headers.get("X-Request-Id")).toBe("trace-42");
  });

  it("replaces a malformed incoming X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health", {
      headers: { "X-Request-Id": "has spaces in it" },
    });

    expect(res.headers.get("X-Request-Id")).not.toBe("has spaces in it");
  });
});

describe("GET /ready", () => {
  it("returns 200 while the feed yields a usable rate", async () => {
    const { app } = createTestApp();
    const res = await app.request("/ready");

    expect(res.status).toBe(200);
    const body = (await res.json()) as {
      status: string;
      priceFeed: { status: string };
    };
    expect(body.status).toBe("ready");
    expect(body.priceFeed).toEqual({ status: "ok" });
  });

  it("returns 503 when the feed answers a non-positive price", async () => {
    const { app, feed } = createTestApp();
    feed.updateAnswer(0n);

    const res = await app.request("/ready");

    expect(res.status).toBe(503);
    const body = (await res.json()) as {
      status: string;
      priceFeed: { status: string; detail: string };
    };
    expect(body.status).toBe("not_ready");
    expect(body.priceFeed).toEqual({
      status: "down",
      detail: "Feed answered 0 in round 2",
    });
  });

  it("recovers once the feed answers a positive price again", async () => {
    const { app, feed } = createTestApp();
    feed.updateAnswer(-1n);
    expect((await app.request("/ready")).status).toBe(503);

    feed.updateAnswer(150_000_000_000n);
    expect((await app.request("/ready")).status).toBe(200);
  });
});
