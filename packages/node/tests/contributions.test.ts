/**
 * Tests for contribution routes.
 *
 * Covers: contribute, threshold rejection, body validation, per-contributor lookup.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { asCaller, createTestApp, jsonRequest } from "./setup.js";
import type { TestApp } from "./setup.js";

let instance: TestApp;

beforeEach(() => {
  instance = createTestApp();
});

interface ErrorBody {
  error: { code: string; message: string; details?: { issues: { path: string }[] } };
}

// =============================================================================
// POST /api/v1/contributions
// =============================================================================

describe("POST /api/v1/contributions", () => {
  it("records a contribution and returns 201 with its receipt", async () => {
    const { app } = instance;
    const res = await app.request(
      asCaller("alice", "/api/v1/contributions", "POST", { amount: "0.1" }),
    );

    expect(res.status).toBe(201);
    const body = (await res.json()) as { data: unknown };
    expect(body.data).toEqual({
      contributor: "alice",
      amount: "0.100000000000000000",
      referenceValue: "200.000000000000000000",
      position: 0,
      cumulative: "0.100000000000000000",
    });
  });

  it("accumulates repeat contributions and appends to the sequence", async () => {
    const { app } = instance;
    await app.request(asCaller("alice", "/api/v1/contributions", "POST", { amount: "0.1" }));
    await app.request(asCaller("bob", "/api/v1/contributions", "POST", { amount: "1" }));
    const res = await app.request(
      asCaller("alice", "/api/v1/contributions", "POST", { amount: "0.05" }),
    );

    expect(res.status).toBe(201);
    const body = (await res.json()) as { data: { position: number; cumulative: string } };
    expect(body.data.position).toBe(2);
    expect(body.data.cumulative).toBe("0.150000000000000000");
  });

  it("accepts a contribution worth exactly the minimum", async () => {
    const { app } = instance;
    // 0.0025 * 2000 = 5
    const res = await app.request(
      asCaller("alice", "/api/v1/contributions", "POST", { amount: "0.0025" }),
    );

    expect(res.status).toBe(201);
    const body = (await res.json()) as { data: { referenceValue: string } };
    expect(body.data.referenceValue).toBe("5.000000000000000000");
  });

  it("returns 422 when the contribution is worth less than the minimum", async () => {
    const { app, service } = instance;
    const res = await app.request(
      asCaller("alice", "/api/v1/contributions", "POST", { amount: "0.002" }),
    );

    expect(res.status).toBe(422);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("INSUFFICIENT_CONTRIBUTION");
    expect(body.error.message).toBe(
      "Contribution of 0.002000000000000000 is worth 4.000000000000000000, below the minimum of 5.000000000000000000",
    );
    expect(service.ledger.contributorCount).toBe(0);
  });

  it("returns 422 for a zero amount", async () => {
    const { app } = instance;
    const res = await app.request(
      asCaller("alice", "/api/v1/contributions", "POST", { amount: "0" }),
    );

    expect(res.status).toBe(422);
  });

  it("re-prices against the latest feed answer", async () => {
    const { app, feed } = instance;
    // 0.0025 is worth 5 at 2000, but only 2.5 at 1000
    feed.updateAnswer(100_000_000_000n);

    const res = await app.request(
      asCaller("alice", "/api/v1/contributions", "POST", { amount: "0.0025" }),
    );

    expect(res.status).toBe(422);
  });

  it("returns 503 when the feed answer is unusable", async () => {
    const { app, feed, service } = instance;
    feed.updateAnswer(0n);

    const res = await app.request(
      asCaller("alice", "/api/v1/contributions", "POST", { amount: "1" }),
    );

    expect(res.status).toBe(503);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("NON_POSITIVE_ANSWER");
    expect(service.ledger.balance).toBe(0n);
  });

  it("returns 401 without a caller identity", async () => {
    const { app } = instance;
    const res = await app.request(
      jsonRequest("/api/v1/contributions", "POST", { amount: "0.1" }),
    );

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("UNAUTHORIZED");
  });

  it.each([
    { name: "too many fractional digits", amount: "0.1234567890123456789" },
    { name: "negative", amount: "-1" },
    { name: "not a number", amount: "ten" },
    { name: "a JSON number", amount: 0.1 },
  ])("returns 400 for an amount that is $name", async ({ amount }) => {
    const { app } = instance;
    const res = await app.request(
      asCaller("alice", "/api/v1/contributions", "POST", { amount }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(body.error.details?.issues[0]?.path).toBe("amount");
  });

  it("returns 400 for a body that is not JSON", async () => {
    const { app } = instance;
    const res = await app.request(
      new Request("http://localhost/api/v1/contributions", {
        method: "POST",
        headers: { "Content-Type": "application/json", "X-Caller-Id": "alice" },
        body: "amount=0.1",
      }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.message).toBe("Invalid JSON in request body");
  });
});

// =============================================================================
// GET /api/v1/contributions/:contributor
// =============================================================================

describe("GET /api/v1/contributions/:contributor", () => {
  it("returns the cumulative amount for a contributor", async () => {
    const { app } = instance;
    await app.request(asCaller("alice", "/api/v1/contributions", "POST", { amount: "0.1" }));
    await app.request(asCaller("alice", "/api/v1/contributions", "POST", { amount: "0.2" }));

    const res = await app.request("/api/v1/contributions/alice");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: unknown };
    expect(body.data).toEqual({ contributor: "alice", amount: "0.300000000000000000" });
  });

  it("returns zero for an identity that never contributed", async () => {
    const { app } = instance;
    const res = await app.request("/api/v1/contributions/nobody");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: { amount: string } };
    expect(body.data.amount).toBe("0.000000000000000000");
  });
});
