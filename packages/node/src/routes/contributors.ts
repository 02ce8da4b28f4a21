/**
 * Contributor sequence routes.
 *
 * GET /api/v1/contributors/:index — Contributor at a position in the sequence
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ContributorIndexSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors } from "../middleware/validate.js";

export function createContributorRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:index", (c) => {
    const service = c.get("service");

    const parsed = ContributorIndexSchema.safeParse({ index: c.req.param("index") });
    if (!parsed.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Index must be a non-negative integer", {
          issues: formatZodErrors(parsed.error),
        }),
        400,
      );
    }

    const { index } = parsed.data;
    return c.json({
      data: {
        index,
        contributor: service.getContributor(index),
      },
    });
  });

  return routes;
}
