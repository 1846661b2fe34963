/**
 * @concord/types — Shared domain types for the Concord stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Financial types
export type { Asset, Currency, Money } from "./financial.js";

// Event types
export type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// Runtime type guards
export {
  isRecord,
  isAsset,
  isMoney,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
