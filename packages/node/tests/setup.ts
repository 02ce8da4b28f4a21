/**
 * Test helpers for @pledgebook/node.
 *
 * Provides a test app factory that creates a Hono app with
 * all middleware and routes, but no HTTP server.
 */

import { pino } from "pino";
import { MockPriceFeed } from "@pledgebook/price-feed";
import { InMemorySettlement } from "@pledgebook/ledger";
import { createApp } from "../src/app.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";

export const OWNER = "owner";
export const FEED_TIME = 1_700_000_000;

/** 2000.00000000 reference units per native unit, 8 decimals. */
export const INITIAL_ANSWER = 200_000_000_000n;

export interface TestApp extends AppInstance {
  readonly feed: MockPriceFeed;
  readonly settlement: InMemorySettlement;
}

/**
 * Create a test app with a mock feed, in-memory settlement
 * and silent logging.
 */
export function createTestApp(
  overrides?: Omit<CreateAppOptions, "serviceConfig">,
): TestApp {
  const feed = new MockPriceFeed(8, INITIAL_ANSWER, { clock: () => FEED_TIME });
  const settlement = new InMemorySettlement();
  const instance = createApp({
    ...overrides,
    serviceConfig: {
      owner: OWNER,
      priceFeed: feed,
      settlement,
      logger: pino({ level: "silent" }),
    },
  });
  return { ...instance, feed, settlement };
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

/**
 * Request acting as `caller` through the X-Caller-Id header.
 */
export function asCaller(
  caller: string,
  path: string,
  method: string = "GET",
  body?: unknown,
): Request {
  return jsonRequest(path, method, body, { "X-Caller-Id": caller });
}
