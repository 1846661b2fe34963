/**
 * @concord/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Wallet provisioning
  WALLET_ID: z.string().min(1).default("main"),
  WALLET_PARTICIPANTS: z.string().min(1),
  WALLET_THRESHOLD: z.coerce.number().int().min(1),
  ASSET_CURRENCY: z.string().min(1).default("USDC"),
  ASSET_DECIMALS: z.coerce.number().int().min(0).max(18).default(6),

  // Auth
  API_KEYS: z.string().default(""),
  JWT_SECRET: z.string().min(1).optional(),
  JWT_ISSUER: z.string().default("concord"),

  // Persistence
  SNAPSHOT_DIR: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// List Parsing
// =============================================================================

/**
 * Parse WALLET_PARTICIPANTS ("alice,bob,carol"). Duplicates are left for
 * the wallet itself to reject.
 */
export function parseParticipants(raw: string): readonly string[] {
  const participants = raw.split(",").map((p) => p.trim());
  if (participants.some((p) => p === "")) {
    throw new Error(`Invalid WALLET_PARTICIPANTS: "${raw}" contains an empty entry`);
  }
  return participants;
}

export interface ParsedApiKey {
  readonly key: string;
  readonly participant: string;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:participant1,key2:participant2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  return raw.split(",").map((entry) => {
    const [key, participant, ...rest] = entry.trim().split(":");
    if (key === undefined || participant === undefined || rest.length > 0) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:participant`,
      );
    }
    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (participant === "") {
      throw new Error(`Participant cannot be empty for API key "${key}"`);
    }
    return { key, participant };
  });
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
