/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { FundService } from "../services/fund-service.js";
import type { CallerContext } from "./auth.js";

/**
 * Hono environment type for the Pledgebook app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The ledger service (set by the app factory) */
    service: FundService;

    /** Resolved caller, if the request carried an identity (set by identify middleware) */
    caller: CallerContext | undefined;
  };
}
