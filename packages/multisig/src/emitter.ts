import type { EventSource } from "@concord/types";
import type { MultisigEventType } from "./events.js";

export interface EmitContext {
  readonly actor: string;
  readonly correlationId: string;
  readonly causationId?: string;
  readonly source?: EventSource;
}

/**
 * Buffers one notification and returns its event id.
 */
export type Emit = (
  type: MultisigEventType,
  payload: Readonly<Record<string, unknown>>,
  context: EmitContext,
) => string;

export function proposalCorrelationId(walletId: string, proposalId: number): string {
  return `${walletId}:proposal:${proposalId}`;
}
