/**
 * @concord/event-store — In-memory EventStore implementation.
 *
 * Suitable for tests, development and hosts that forward events to an
 * external indexer through a subscription. All events are lost on exit.
 *
 * Subscribers are dispatched synchronously inside append(), after the
 * batch has been stored.
 */

import type { DomainEvent } from "@concord/types";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ExpectedVersion,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _globalLog: StoredEvent[] = [];
  private readonly _streamSubscribers = new Map<string, Set<EventHandler>>();
  private readonly _globalSubscribers = new Set<EventHandler>();
  private _lastHash: string = GENESIS_HASH;

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const currentVersion = this.streamVersion(streamId);
    this._checkExpectedVersion(streamId, currentVersion, options?.expectedVersion);

    const stream = this._streams.get(streamId) ?? [];
    this._streams.set(streamId, stream);

    const appendedAt = new Date().toISOString();
    const stored: StoredEvent[] = events.map((event, i) => {
      const base = {
        event,
        streamId,
        version: currentVersion + i + 1,
        globalPosition: this._globalLog.length + i + 1,
        appendedAt,
      };
      const previousHash = this._lastHash;
      const hash = computeEventHash(base, previousHash);
      this._lastHash = hash;
      return { ...base, hash, previousHash };
    });

    stream.push(...stored);
    this._globalLog.push(...stored);
    this._dispatch(streamId, stored);

    return {
      streamId,
      fromVersion: currentVersion + 1,
      toVersion: currentVersion + events.length,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const stream = this._streams.get(streamId) ?? [];
    return limit(
      stream.filter((e) => e.version >= fromVersion),
      options?.maxCount,
    );
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;
    return limit(
      this._globalLog.filter((e) => e.globalPosition >= fromPosition),
      options?.maxCount,
    );
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    this._validateStreamId(streamId);

    const subscribers = this._streamSubscribers.get(streamId) ?? new Set<EventHandler>();
    this._streamSubscribers.set(streamId, subscribers);
    subscribers.add(handler);

    return {
      unsubscribe: () => {
        subscribers.delete(handler);
        if (subscribers.size === 0) {
          this._streamSubscribers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._globalSubscribers.add(handler);
    return {
      unsubscribe: () => {
        this._globalSubscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.trim().length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  private _checkExpectedVersion(
    streamId: string,
    currentVersion: number,
    expected: ExpectedVersion | undefined,
  ): void {
    if (expected === undefined || expected === "any") {
      return;
    }
    if (expected === "no_stream" && currentVersion !== 0) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" already exists (version ${currentVersion}), expected no_stream`,
        streamId,
      );
    }
    if (typeof expected === "number" && expected !== currentVersion) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${currentVersion}, expected ${expected}`,
        streamId,
      );
    }
  }

  private _dispatch(streamId: string, events: readonly StoredEvent[]): void {
    const streamSubs = this._streamSubscribers.get(streamId);
    for (const event of events) {
      for (const handler of streamSubs ?? []) {
        handler(event);
      }
      for (const handler of this._globalSubscribers) {
        handler(event);
      }
    }
  }
}

function limit(events: StoredEvent[], maxCount: number | undefined): StoredEvent[] {
  return maxCount !== undefined && maxCount >= 0 ? events.slice(0, maxCount) : events;
}
