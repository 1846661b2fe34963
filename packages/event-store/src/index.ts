/**
 * @concord/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with a SHA-256 hash chain
 * - SnapshotStore (in-memory and file-based) for aggregate state
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";
export type { HashableEvent } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";

// Snapshot store
export type {
  StoredSnapshot,
  SaveSnapshotOptions,
  SnapshotStore,
} from "./snapshot-store.js";
export {
  InMemorySnapshotStore,
  FileSnapshotStore,
  computeSnapshotHash,
  verifySnapshotIntegrity,
} from "./snapshot-store.js";
