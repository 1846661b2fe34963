/**
 * Wallet routes.
 *
 * GET /api/v1/wallet  — Participants, threshold, balance, proposal count
 * GET /api/v1/payouts — Transfers sent through the recording rail
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createWalletRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/wallet", (c) => {
    return c.json({ data: c.get("service").summary() });
  });

  routes.get("/payouts", (c) => {
    return c.json({ data: c.get("service").payouts() });
  });

  return routes;
}
