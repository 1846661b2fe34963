/**
 * Deposit routes.
 *
 * POST /api/v1/deposits — Credit the wallet. Anyone may deposit, so no
 * caller is required; the sender is named in the body.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { DepositSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createDepositRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(DepositSchema), (c) => {
    const { from, amount } = c.get("validatedBody");
    return c.json({ data: c.get("service").deposit(from, amount) }, 201);
  });

  return routes;
}
