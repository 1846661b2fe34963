/**
 * @concord/event-store — Core types.
 *
 * Append-only persistence for the notifications a wallet publishes.
 *
 * Design principles:
 * - Events are immutable after creation
 * - Streams are append-only (no UPDATE, no DELETE)
 * - Every event has a contiguous version within its stream and a
 *   contiguous position across all streams
 * - Every event is linked into a SHA-256 hash chain
 */

import type { DomainEvent } from "@concord/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * An event as persisted in the store.
 */
export interface StoredEvent {
  readonly event: DomainEvent;

  readonly streamId: string;

  /** Position within this stream (1-based) */
  readonly version: number;

  /** Position across all streams (1-based) */
  readonly globalPosition: number;

  /** When the store persisted the event */
  readonly appendedAt: string;

  /** SHA-256 of this event's canonical content plus previousHash */
  readonly hash: string;

  /** Hash of the preceding event in global order, or GENESIS_HASH */
  readonly previousHash: string;
}

// =============================================================================
// Append / Read Options
// =============================================================================

/**
 * Expected version for optimistic concurrency control.
 *
 * - A number: the stream must be at exactly this version before append
 * - "no_stream": the stream must not exist yet
 * - "any": no check
 */
export type ExpectedVersion = number | "no_stream" | "any";

export interface AppendOptions {
  readonly expectedVersion?: ExpectedVersion;
}

export interface AppendResult {
  readonly streamId: string;
  readonly fromVersion: number;
  readonly toVersion: number;
  readonly count: number;
}

export interface ReadOptions {
  /** First version to return (inclusive, 1-based). Default: 1 */
  readonly fromVersion?: number;
  readonly maxCount?: number;
}

export interface ReadAllOptions {
  /** First global position to return (inclusive). Default: 1 */
  readonly fromPosition?: number;
  readonly maxCount?: number;
}

// =============================================================================
// Subscription
// =============================================================================

/**
 * Called synchronously for each appended event, in order.
 */
export type EventHandler = (event: StoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  /** Global position of the last event that verified cleanly */
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event store.
 *
 * Invariants:
 * - Stream versions are contiguous (1, 2, 3, ...)
 * - Global positions are contiguous across all streams
 * - Subscribers see events in append order
 */
export interface EventStore {
  /**
   * Append events to a stream as one batch.
   *
   * @throws EventStoreError on an empty batch, a blank stream id or a
   *   failed expected-version check
   */
  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult;

  /** Events of one stream in version order (empty if the stream is unknown) */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  /** Events of all streams in global order */
  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  subscribe(streamId: string, handler: EventHandler): Subscription;

  subscribeAll(handler: EventHandler): Subscription;

  /** Version of the last event in a stream, or 0 */
  streamVersion(streamId: string): number;

  /** Position of the last event in the store, or 0 */
  globalPosition(): number;

  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION"
  | "SNAPSHOT_CORRUPT";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
