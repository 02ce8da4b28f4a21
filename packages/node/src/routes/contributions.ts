/**
 * Contribution routes.
 *
 * POST /api/v1/contributions               — Contribute as the calling identity
 * GET  /api/v1/contributions/:contributor  — Cumulative amount recorded for a contributor
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ContributeSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { requireCaller } from "../middleware/auth.js";

export function createContributionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/contributions — Contribute
  routes.post("/", requireCaller(), validateBody(ContributeSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    const contribution = service.contribute(c.get("callerIdentity"), body.amount);
    return c.json({ data: contribution }, 201);
  });

  // GET /api/v1/contributions/:contributor — Amount contributed
  routes.get("/:contributor", (c) => {
    const service = c.get("service");
    const contributor = c.req.param("contributor");

    return c.json({
      data: {
        contributor,
        amount: service.getContribution(contributor),
      },
    });
  });

  return routes;
}
