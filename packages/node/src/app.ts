/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can create the app without
 * starting the HTTP server.
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { WalletService } from "./services/wallet-service.js";
import type { WalletServiceConfig } from "./services/wallet-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware, headerCallerMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createWalletRoutes } from "./routes/wallet.js";
import { createProposalRoutes } from "./routes/proposals.js";
import { createDepositRoutes } from "./routes/deposits.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: WalletServiceConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Called with every error that becomes a 500 response */
  readonly onUnexpectedError?: (err: unknown, c: Context<AppEnv>) => void;
  /** Auth configuration. When provided, every /api/* request must authenticate. */
  readonly auth?: AuthConfig;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: WalletService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new WalletService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  app.use("*", async (c, next) => {
    c.set("service", service);
    c.set("caller", undefined);
    await next();
  });

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.onUnexpectedError));

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes());

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    // Unsecured mode (tests, dev): X-Caller-Id header
    app.use("/api/*", headerCallerMiddleware());
  }

  app.route("/api/v1", createWalletRoutes());
  app.route("/api/v1/proposals", createProposalRoutes());
  app.route("/api/v1/deposits", createDepositRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
