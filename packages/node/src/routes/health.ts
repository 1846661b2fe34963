/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (event log hash chain, wallet invariants, snapshot)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const { ready, integrity, violations, snapshot } = c.get("service").readiness();

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        checks: {
          eventLog: integrity.valid
            ? { status: "ok", lastVerifiedPosition: integrity.lastVerifiedPosition }
            : { status: "down", errors: integrity.errors.length },
          invariants: violations.length === 0
            ? { status: "ok" }
            : { status: "down", violations },
          snapshot: snapshot.current
            ? { status: "ok", version: snapshot.version }
            : { status: "down", version: snapshot.version, error: snapshot.error },
        },
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
