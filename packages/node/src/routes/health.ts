/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (200 only while the price feed yields a usable rate)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { FundService } from "../services/fund-service.js";

export function createHealthRoutes(service: FundService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const feed = service.feedStatus();
    const body = {
      status: feed.ready ? "ready" : "not_ready",
      priceFeed: feed.ready
        ? { status: "ok" }
        : { status: "down", detail: feed.detail },
      timestamp: new Date().toISOString(),
    };

    return feed.ready ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
