/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { FundService } from "./services/fund-service.js";
import type { FundServiceConfig } from "./services/fund-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { identifyCaller } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createContributionRoutes } from "./routes/contributions.js";
import { createWithdrawalRoutes } from "./routes/withdrawals.js";
import { createContributorRoutes } from "./routes/contributors.js";
import { createLedgerRoutes } from "./routes/ledger.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: FundServiceConfig;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** API key registry. When provided, X-Caller-Id is ignored. */
  readonly auth?: AuthConfig | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: FundService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new FundService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ──────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Health Routes (no auth) ────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });
  app.use("/api/*", identifyCaller(options.auth));

  app.route("/api/v1/contributions", createContributionRoutes());
  app.route("/api/v1/withdrawals", createWithdrawalRoutes());
  app.route("/api/v1/contributors", createContributorRoutes());
  app.route("/api/v1/ledger", createLedgerRoutes());

  return { app, service };
}
