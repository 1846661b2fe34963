/**
 * @concord/event-store — Hash chain for tamper-evident event logs.
 *
 *   event[1].hash = sha256(canonicalize(event[1]) + "genesis")
 *   event[n].hash = sha256(canonicalize(event[n]) + event[n-1].hash)
 *
 * Canonicalization is RFC 8785 (JCS), so key order never affects a hash.
 * Editing any event breaks every link from that point forward.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  IntegrityError,
  StoredEvent,
} from "./types.js";

export const GENESIS_HASH = "genesis";

/**
 * The parts of a stored event covered by its hash.
 */
export type HashableEvent = Omit<StoredEvent, "hash" | "previousHash">;

export function computeEventHash(event: HashableEvent, previousHash: string): string {
  const content = canonicalize({
    event: event.event,
    streamId: event.streamId,
    version: event.version,
    globalPosition: event.globalPosition,
    appendedAt: event.appendedAt,
  });
  return createHash("sha256").update(content + previousHash).digest("hex");
}

/**
 * Verify the hash chain of events given in global position order.
 */
export function verifyHashChain(
  events: readonly StoredEvent[],
): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let expectedPrevious = GENESIS_HASH;
  let lastVerifiedPosition = 0;

  for (const stored of events) {
    let ok = true;

    if (stored.previousHash !== expectedPrevious) {
      ok = false;
      errors.push({
        position: stored.globalPosition,
        reason: `previousHash mismatch at position ${stored.globalPosition}: expected "${expectedPrevious}", got "${stored.previousHash}"`,
      });
    }

    const recomputed = computeEventHash(stored, stored.previousHash);
    if (stored.hash !== recomputed) {
      ok = false;
      errors.push({
        position: stored.globalPosition,
        reason: `Hash mismatch at position ${stored.globalPosition}`,
      });
    }

    if (ok && errors.length === 0) {
      lastVerifiedPosition = stored.globalPosition;
    }
    expectedPrevious = stored.hash;
  }

  return { valid: errors.length === 0, lastVerifiedPosition, errors };
}
