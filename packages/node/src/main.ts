/**
 * @concord/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import { pino } from "pino";
import { FileSnapshotStore } from "@concord/event-store";
import { loadConfig, parseApiKeys, parseParticipants } from "./config.js";
import { createApp } from "./app.js";
import type { AuthConfig } from "./middleware/auth.js";
import type { ApiKeyRecord } from "./types/auth.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  // Build auth config from env vars
  let authConfig: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0 || config.JWT_SECRET !== undefined) {
    const keyMap = new Map<string, ApiKeyRecord>();
    for (const k of parsedKeys) {
      keyMap.set(k.key, k);
    }
    authConfig = {
      apiKeys: keyMap,
      jwtSecret: config.JWT_SECRET,
      jwtIssuer: config.JWT_ISSUER,
    };
    logger.info(
      { apiKeyCount: parsedKeys.length, jwtEnabled: config.JWT_SECRET !== undefined },
      "Auth configured",
    );
  } else {
    logger.warn("No API keys or JWT secret configured; trusting the X-Caller-Id header");
  }

  const { app, service } = createApp({
    serviceConfig: {
      walletId: config.WALLET_ID,
      participants: parseParticipants(config.WALLET_PARTICIPANTS),
      threshold: config.WALLET_THRESHOLD,
      asset: { currency: config.ASSET_CURRENCY, decimals: config.ASSET_DECIMALS },
      logger,
      ...(config.SNAPSHOT_DIR !== undefined
        ? { snapshotStore: new FileSnapshotStore(config.SNAPSHOT_DIR) }
        : {}),
    },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    onUnexpectedError: (err, c) => {
      logger.error({ err, requestId: c.get("requestId") }, "Unhandled request error");
    },
    ...(authConfig !== undefined ? { auth: authConfig } : {}),
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      walletId: service.walletId,
      snapshots: config.SNAPSHOT_DIR ?? "memory",
    },
    "Concord node started",
  );

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
