/**
 * Proposal Store — append-only, sequentially indexed proposals.
 *
 * Proposal records are immutable values; every change replaces the
 * record at its index. An executed record is never replaced again.
 */

import { MultisigError } from "./errors.js";
import type {
  ParticipantId,
  Proposal,
  ProposalAction,
  ProposalFilter,
} from "./types.js";

export class ProposalStore {
  private _proposals: Proposal[] = [];

  /**
   * Append a pending proposal with the next id and no approvals.
   */
  create(action: ProposalAction, proposer: ParticipantId, createdAt: string): Proposal {
    const proposal: Proposal = {
      id: this._proposals.length,
      action,
      proposer,
      approvalCount: 0,
      state: "pending",
      createdAt,
    };
    this._proposals.push(proposal);
    return proposal;
  }

  get(id: number): Proposal | undefined {
    return Number.isInteger(id) ? this._proposals[id] : undefined;
  }

  /**
   * @throws MultisigError PROPOSAL_NOT_FOUND
   */
  require(id: number): Proposal {
    const proposal = this.get(id);
    if (!proposal) {
      throw new MultisigError("PROPOSAL_NOT_FOUND", `Proposal ${id} not found`);
    }
    return proposal;
  }

  /**
   * @throws MultisigError PROPOSAL_NOT_FOUND or PROPOSAL_NOT_PENDING
   */
  requirePending(id: number): Proposal {
    const proposal = this.require(id);
    if (proposal.state !== "pending") {
      throw new MultisigError(
        "PROPOSAL_NOT_PENDING",
        `Proposal ${id} is ${proposal.state}`,
      );
    }
    return proposal;
  }

  setApprovalCount(id: number, approvalCount: number): Proposal {
    const updated: Proposal = { ...this.requirePending(id), approvalCount };
    this._proposals[id] = updated;
    return updated;
  }

  markExecuted(id: number, executedAt: string): Proposal {
    const updated: Proposal = { ...this.requirePending(id), state: "executed", executedAt };
    this._proposals[id] = updated;
    return updated;
  }

  list(filter?: ProposalFilter): readonly Proposal[] {
    return this._proposals.filter(
      (p) =>
        (filter?.state === undefined || p.state === filter.state) &&
        (filter?.kind === undefined || p.action.kind === filter.kind),
    );
  }

  pendingIds(): number[] {
    return this._proposals.filter((p) => p.state === "pending").map((p) => p.id);
  }

  get count(): number {
    return this._proposals.length;
  }

  // ─── Checkpoint ─────────────────────────────────────────────────────

  checkpoint(): readonly Proposal[] {
    return [...this._proposals];
  }

  restore(proposals: readonly Proposal[]): void {
    this._proposals = [...proposals];
  }
}
