/**
 * @concord/event-store — Snapshot Store.
 *
 * The get/set substrate a host uses to persist aggregate state between
 * calls. Each snapshot records the stream version it was taken at and a
 * SHA-256 hash of its canonical state, checked on load.
 */

import {
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  renameSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { isRecord } from "@concord/types";
import { EventStoreError } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export interface StoredSnapshot<TState = unknown> {
  readonly streamId: string;

  /** Stream version the snapshot was taken at */
  readonly version: number;

  readonly state: TState;

  readonly createdAt: string;

  /** SHA-256 of the RFC 8785 canonical state */
  readonly stateHash: string;
}

export interface SaveSnapshotOptions {
  readonly streamId: string;
  readonly version: number;
  readonly state: unknown;
}

export interface SnapshotStore {
  /** Save a snapshot, replacing any snapshot at the same version. */
  save(options: SaveSnapshotOptions): StoredSnapshot;

  /** Latest snapshot of a stream, or undefined if none exists. */
  load(streamId: string): StoredSnapshot | undefined;

  hasSnapshot(streamId: string): boolean;

  deleteAll(streamId: string): void;
}

export function computeSnapshotHash(state: unknown): string {
  return createHash("sha256").update(canonicalize(state)).digest("hex");
}

export function verifySnapshotIntegrity(snapshot: StoredSnapshot): boolean {
  return snapshot.stateHash === computeSnapshotHash(snapshot.state);
}

function buildSnapshot(options: SaveSnapshotOptions): StoredSnapshot {
  return {
    streamId: options.streamId,
    version: options.version,
    state: options.state,
    createdAt: new Date().toISOString(),
    stateHash: computeSnapshotHash(options.state),
  };
}

// =============================================================================
// In-Memory Implementation
// =============================================================================

export class InMemorySnapshotStore implements SnapshotStore {
  /** streamId → snapshots sorted by version */
  private readonly _snapshots = new Map<string, StoredSnapshot[]>();

  save(options: SaveSnapshotOptions): StoredSnapshot {
    const snapshot = buildSnapshot(options);
    const kept = (this._snapshots.get(options.streamId) ?? []).filter(
      (s) => s.version !== options.version,
    );
    kept.push(snapshot);
    kept.sort((a, b) => a.version - b.version);
    this._snapshots.set(options.streamId, kept);
    return snapshot;
  }

  load(streamId: string): StoredSnapshot | undefined {
    const snapshots = this._snapshots.get(streamId) ?? [];
    return snapshots[snapshots.length - 1];
  }

  hasSnapshot(streamId: string): boolean {
    return (this._snapshots.get(streamId)?.length ?? 0) > 0;
  }

  deleteAll(streamId: string): void {
    this._snapshots.delete(streamId);
  }
}

// =============================================================================
// File-Based Implementation
// =============================================================================

/**
 * Stores each snapshot as `<baseDir>/<streamId>/<version>.json`.
 *
 * Writes go to a temporary file first and are renamed into place, so a
 * crash mid-write never leaves a truncated snapshot behind.
 */
export class FileSnapshotStore implements SnapshotStore {
  private readonly _baseDir: string;

  constructor(baseDir: string) {
    this._baseDir = baseDir;
    mkdirSync(this._baseDir, { recursive: true });
  }

  get baseDir(): string {
    return this._baseDir;
  }

  save(options: SaveSnapshotOptions): StoredSnapshot {
    const snapshot = buildSnapshot(options);
    mkdirSync(this._streamDir(options.streamId), { recursive: true });

    const target = this._snapshotPath(options.streamId, options.version);
    const temp = `${target}.tmp`;
    writeFileSync(temp, JSON.stringify(snapshot, null, 2), "utf-8");
    renameSync(temp, target);
    return snapshot;
  }

  /**
   * @throws EventStoreError SNAPSHOT_CORRUPT if the latest file cannot be
   *   parsed or its state hash does not match
   */
  load(streamId: string): StoredSnapshot | undefined {
    const versions = this._listVersions(streamId);
    const latest = versions[versions.length - 1];
    if (latest === undefined) {
      return undefined;
    }

    const path = this._snapshotPath(streamId, latest);
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(path, "utf-8"));
    } catch (err) {
      throw new EventStoreError(
        "SNAPSHOT_CORRUPT",
        `Snapshot ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
        streamId,
      );
    }

    const snapshot = toStoredSnapshot(parsed);
    if (snapshot === undefined || !verifySnapshotIntegrity(snapshot)) {
      throw new EventStoreError(
        "SNAPSHOT_CORRUPT",
        `Snapshot ${path} failed integrity verification`,
        streamId,
      );
    }
    return snapshot;
  }

  hasSnapshot(streamId: string): boolean {
    return this._listVersions(streamId).length > 0;
  }

  deleteAll(streamId: string): void {
    rmSync(this._streamDir(streamId), { recursive: true, force: true });
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _streamDir(streamId: string): string {
    return join(this._baseDir, streamId.replace(/[^a-zA-Z0-9_.-]/g, "_"));
  }

  private _snapshotPath(streamId: string, version: number): string {
    return join(this._streamDir(streamId), `${version}.json`);
  }

  private _listVersions(streamId: string): number[] {
    const dir = this._streamDir(streamId);
    if (!existsSync(dir)) {
      return [];
    }

    return readdirSync(dir)
      .map((file) => /^(\d+)\.json$/.exec(file))
      .filter((match): match is RegExpExecArray => match !== null)
      .map((match) => Number(match[1]))
      .sort((a, b) => a - b);
  }
}

function toStoredSnapshot(value: unknown): StoredSnapshot | undefined {
  if (
    !isRecord(value) ||
    typeof value.streamId !== "string" ||
    typeof value.version !== "number" ||
    typeof value.createdAt !== "string" ||
    typeof value.stateHash !== "string" ||
    !("state" in value)
  ) {
    return undefined;
  }
  return {
    streamId: value.streamId,
    version: value.version,
    state: value.state,
    createdAt: value.createdAt,
    stateHash: value.stateHash,
  };
}
