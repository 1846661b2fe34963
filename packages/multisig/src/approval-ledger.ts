/**
 * Approval Ledger — which participants currently approve which proposal.
 *
 * A proposal's approval count is the size of its approver set. The
 * ledger does not know about proposal state; callers check that first.
 */

import { MultisigError } from "./errors.js";
import type { ApprovalEntry, ParticipantId } from "./types.js";

export interface SweptApproval {
  readonly proposalId: number;
  readonly approvalCount: number;
}

export class ApprovalLedger {
  private _approvals = new Map<number, Set<ParticipantId>>();

  /**
   * Record an approval and return the new count.
   *
   * @throws MultisigError ALREADY_APPROVED
   */
  grant(proposalId: number, participant: ParticipantId): number {
    const approvers = this._approvals.get(proposalId) ?? new Set<ParticipantId>();
    if (approvers.has(participant)) {
      throw new MultisigError(
        "ALREADY_APPROVED",
        `'${participant}' has already approved proposal ${proposalId}`,
      );
    }
    approvers.add(participant);
    this._approvals.set(proposalId, approvers);
    return approvers.size;
  }

  /**
   * Withdraw an approval and return the new count.
   *
   * @throws MultisigError NOT_APPROVED
   */
  withdraw(proposalId: number, participant: ParticipantId): number {
    const approvers = this._approvals.get(proposalId);
    if (!approvers?.has(participant)) {
      throw new MultisigError(
        "NOT_APPROVED",
        `'${participant}' has not approved proposal ${proposalId}`,
      );
    }
    approvers.delete(participant);
    return approvers.size;
  }

  hasApproved(proposalId: number, participant: ParticipantId): boolean {
    return this._approvals.get(proposalId)?.has(participant) ?? false;
  }

  approvers(proposalId: number): readonly ParticipantId[] {
    return [...(this._approvals.get(proposalId) ?? [])];
  }

  count(proposalId: number): number {
    return this._approvals.get(proposalId)?.size ?? 0;
  }

  /**
   * Clear a participant's approval on each of the given proposals.
   * Returns the proposals that changed, with their new counts.
   */
  sweep(participant: ParticipantId, proposalIds: readonly number[]): SweptApproval[] {
    const swept: SweptApproval[] = [];
    for (const proposalId of proposalIds) {
      const approvers = this._approvals.get(proposalId);
      if (approvers?.delete(participant)) {
        swept.push({ proposalId, approvalCount: approvers.size });
      }
    }
    return swept;
  }

  // ─── Checkpoint ─────────────────────────────────────────────────────

  entries(): ApprovalEntry[] {
    return [...this._approvals]
      .filter(([, approvers]) => approvers.size > 0)
      .map(([proposalId, approvers]) => ({ proposalId, approvers: [...approvers] }))
      .sort((a, b) => a.proposalId - b.proposalId);
  }

  restore(entries: readonly ApprovalEntry[]): void {
    this._approvals = new Map(
      entries.map((e) => [e.proposalId, new Set(e.approvers)] as const),
    );
  }
}
