/**
 * Deposit Gateway — inbound value. Anyone may deposit; no authorization.
 */

import { randomUUID } from "node:crypto";
import { isNegative } from "@concord/ledger";
import type { Money } from "@concord/types";
import type { CustodyAccount } from "./custody.js";
import { toWalletAmount } from "./custody.js";
import type { Emit } from "./emitter.js";
import { MultisigError } from "./errors.js";
import type { DepositReceivedPayload } from "./events.js";
import { MULTISIG_EVENTS } from "./events.js";
import { assertIdentity } from "./membership.js";
import type { DepositReceipt, ParticipantId } from "./types.js";

export class DepositGateway {
  constructor(
    private readonly custody: CustodyAccount,
    private readonly emit: Emit,
  ) {}

  /**
   * Credit the balance. Zero amounts are accepted.
   *
   * @throws MultisigError INVALID_IDENTITY for a null sender, INVALID_AMOUNT
   *   for a malformed, negative or foreign amount
   */
  deposit(from: ParticipantId, amount: Money): DepositReceipt {
    assertIdentity(from, "Sender");
    const normalized = toWalletAmount(amount, this.custody.asset);
    if (isNegative(normalized)) {
      throw new MultisigError("INVALID_AMOUNT", `Deposit amount must not be negative, got ${normalized.amount}`);
    }

    const balance = this.custody.credit(normalized);
    const payload: DepositReceivedPayload = { from, amount: normalized, balance };
    this.emit(MULTISIG_EVENTS.DEPOSIT_RECEIVED, payload, {
      actor: from,
      correlationId: `deposit:${randomUUID()}`,
      source: "deposit-gateway",
    });

    return { from, amount: normalized, balance };
  }
}
