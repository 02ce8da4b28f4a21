/**
 * Withdrawal routes.
 *
 * POST /api/v1/withdrawals — Owner sweeps the held balance
 *
 * Body `{ mode: "compact" }` selects cheaperWithdraw; the default is the
 * standard withdraw.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { WithdrawSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { requireCaller } from "../middleware/auth.js";

export function createWithdrawalRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", requireCaller(), validateBody(WithdrawSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    const withdrawal = service.withdraw(c.get("callerIdentity"), body.mode);
    return c.json({ data: withdrawal });
  });

  return routes;
}
