/**
 * Runtime Type Guards
 *
 * Narrowing functions for values crossing a system boundary
 * (request bodies, restored snapshots, events read back from disk).
 */

import type { Asset, Money } from "./financial.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// =============================================================================
// Financial guards
// =============================================================================

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

export function isAsset(value: unknown): value is Asset {
  if (!isRecord(value)) return false;
  return (
    typeof value.currency === "string" &&
    value.currency.trim() !== "" &&
    typeof value.decimals === "number" &&
    Number.isInteger(value.decimals) &&
    value.decimals >= 0
  );
}

export function isMoney(value: unknown): value is Money {
  return (
    isRecord(value) &&
    isAsset(value) &&
    typeof value.amount === "string" &&
    DECIMAL_PATTERN.test(value.amount)
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["multisig", "deposit-gateway", "node"]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.actor === "string" &&
    typeof value.correlationId === "string" &&
    (value.causationId === undefined || typeof value.causationId === "string") &&
    isEventSource(value.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (!isRecord(value)) return false;
  return (
    typeof value.type === "string" &&
    isEventMetadata(value.metadata) &&
    isRecord(value.payload)
  );
}
