/**
 * Event Types
 *
 * Every state transition in a wallet is published as a DomainEvent.
 * Indexers rebuild history from these; the wallet itself keeps only
 * current state plus its immutable proposal list.
 */

/**
 * Subsystems allowed to emit events.
 */
export type EventSource = "multisig" | "deposit-gateway" | "node";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Identity that caused this event */
  readonly actor: string;

  /** Event that caused this one, for cascades such as approval sweeps */
  readonly causationId?: string;

  /** Groups every event touching the same proposal or deposit */
  readonly correlationId: string;

  readonly source: EventSource;
}

/**
 * A domain event, discriminated by `type`.
 */
export interface DomainEvent {
  /** e.g. "multisig.proposal.created" */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload, typed by consumers */
  readonly payload: Readonly<Record<string, unknown>>;
}
