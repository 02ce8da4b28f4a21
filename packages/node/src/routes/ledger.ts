/**
 * Ledger summary route.
 *
 * GET /api/v1/ledger — Owner, held balance, contributor count, minimum and price feed
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createLedgerRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");
    return c.json({ data: service.summary() });
  });

  return routes;
}
