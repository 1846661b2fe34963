/**
 * Value Transfer port — moves custodied value out to a destination.
 *
 * The wallet finalizes all of its bookkeeping before calling send(), so an
 * implementation that calls back into the wallet sees the post-execution
 * state.
 */

import type { Money } from "@concord/types";
import type { ParticipantId } from "./types.js";

export type TransferOutcome =
  | { readonly ok: true; readonly reference?: string }
  | { readonly ok: false; readonly reason: string };

export interface ValueTransfer {
  /**
   * Deliver `amount` to `destination`. Reporting `{ ok: false }` or
   * throwing both fail the execution that called it.
   */
  send(destination: ParticipantId, amount: Money): TransferOutcome;
}

export interface Payout {
  readonly reference: string;
  readonly destination: ParticipantId;
  readonly amount: Money;
  readonly sentAt: string;
}

/**
 * Records payouts in memory instead of moving value anywhere.
 * Used by hosts without an external rail and by tests.
 */
export class RecordingValueTransfer implements ValueTransfer {
  private readonly _payouts: Payout[] = [];

  send(destination: ParticipantId, amount: Money): TransferOutcome {
    const reference = `payout-${this._payouts.length + 1}`;
    this._payouts.push({ reference, destination, amount, sentAt: new Date().toISOString() });
    return { ok: true, reference };
  }

  get payouts(): readonly Payout[] {
    return [...this._payouts];
  }
}
