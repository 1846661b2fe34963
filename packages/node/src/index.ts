/**
 * @concord/node — HTTP service for a threshold-governed wallet.
 *
 * @packageDocumentation
 */

export { WalletService } from "./services/wallet-service.js";
export type {
  WalletServiceConfig,
  WalletSummary,
  ProposalView,
  Readiness,
  SnapshotStatus,
} from "./services/wallet-service.js";
export { loadConfig, parseApiKeys, parseParticipants, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
