/**
 * Execution Engine. Turns an approved proposal into its effect.
 *
 * Executions never nest: a rail that calls back into `execute` is
 * refused, since its payout could not be undone by the outer rollback.
 *
 * Order of work for every execution:
 * 1. caller, state and threshold checks
 * 2. the proposal is marked executed
 * 3. the action is dispatched; a transfer calls the external rail last
 *
 * Any failure after step 2 is rolled back by the wallet's atomic scope,
 * which wraps every call into the engine.
 */

import type { ApprovalLedger } from "./approval-ledger.js";
import type { CustodyAccount } from "./custody.js";
import type { Emit } from "./emitter.js";
import { proposalCorrelationId } from "./emitter.js";
import { MultisigError } from "./errors.js";
import type {
  ApprovalRevokedPayload,
  MembershipChangedPayload,
  ProposalExecutedPayload,
  ThresholdChangedPayload,
} from "./events.js";
import { MULTISIG_EVENTS } from "./events.js";
import type { MembershipRegistry } from "./membership.js";
import type { ProposalStore } from "./proposal-store.js";
import type {
  AddParticipantAction,
  ChangeThresholdAction,
  ExecutionEffect,
  ExecutionResult,
  ParticipantAddedEffect,
  ParticipantId,
  ParticipantRemovedEffect,
  ProposalAction,
  RemoveParticipantAction,
  ThresholdChangedEffect,
  TransferAction,
  TransferEffect,
} from "./types.js";
import type { TransferOutcome, ValueTransfer } from "./value-transfer.js";

export interface ExecutionParts {
  readonly walletId: string;
  readonly membership: MembershipRegistry;
  readonly proposals: ProposalStore;
  readonly approvals: ApprovalLedger;
  readonly custody: CustodyAccount;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled proposal action: ${JSON.stringify(value)}`);
}

export class ExecutionEngine {
  private executing: number | undefined;

  constructor(
    private readonly parts: ExecutionParts,
    private readonly transfer: ValueTransfer,
    private readonly emit: Emit,
    private readonly now: () => string,
  ) {}

  /**
   * @throws MultisigError EXECUTION_IN_PROGRESS, NOT_PARTICIPANT,
   *   PROPOSAL_NOT_FOUND, PROPOSAL_NOT_PENDING, THRESHOLD_NOT_MET, or any
   *   dispatch failure
   */
  execute(caller: ParticipantId, proposalId: number): ExecutionResult {
    if (this.executing !== undefined) {
      throw new MultisigError(
        "EXECUTION_IN_PROGRESS",
        `Cannot execute proposal ${proposalId} while proposal ${this.executing} is executing`,
      );
    }
    this.executing = proposalId;
    try {
      return this.run(caller, proposalId);
    } finally {
      this.executing = undefined;
    }
  }

  private run(caller: ParticipantId, proposalId: number): ExecutionResult {
    const { membership, proposals } = this.parts;

    membership.requireParticipant(caller);
    const pending = proposals.requirePending(proposalId);
    if (pending.approvalCount < membership.threshold) {
      throw new MultisigError(
        "THRESHOLD_NOT_MET",
        `Proposal ${proposalId} has ${pending.approvalCount} of ${membership.threshold} required approvals`,
      );
    }

    const executed = proposals.markExecuted(proposalId, this.now());
    const effect = this.dispatch(executed.action, caller, proposalId);

    const payload: ProposalExecutedPayload = { proposalId, executedBy: caller, effect };
    this.emit(MULTISIG_EVENTS.PROPOSAL_EXECUTED, payload, {
      actor: caller,
      correlationId: this.correlate(proposalId),
    });

    return { proposal: executed, effect };
  }

  private dispatch(
    action: ProposalAction,
    caller: ParticipantId,
    proposalId: number,
  ): ExecutionEffect {
    switch (action.kind) {
      case "transfer":
        return this.executeTransfer(action);
      case "add_participant":
        return this.executeAddParticipant(action, caller, proposalId);
      case "remove_participant":
        return this.executeRemoveParticipant(action, caller, proposalId);
      case "change_threshold":
        return this.executeChangeThreshold(action, caller, proposalId);
      default:
        return assertNever(action);
    }
  }

  // ─── Transfer ───────────────────────────────────────────────────────

  private executeTransfer(action: TransferAction): TransferEffect {
    const balance = this.parts.custody.debit(action.amount);
    const target = `${action.amount.amount} ${action.amount.currency} to '${action.destination}'`;

    let outcome: TransferOutcome;
    try {
      outcome = this.transfer.send(action.destination, action.amount);
    } catch (err) {
      throw new MultisigError(
        "TRANSFER_FAILED",
        `Transfer of ${target} failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }
    if (!outcome.ok) {
      throw new MultisigError("TRANSFER_FAILED", `Transfer of ${target} failed: ${outcome.reason}`);
    }

    return {
      kind: "transfer",
      destination: action.destination,
      amount: action.amount,
      balance,
      ...(outcome.reference !== undefined ? { reference: outcome.reference } : {}),
    };
  }

  // ─── Governance ─────────────────────────────────────────────────────

  private executeAddParticipant(
    action: AddParticipantAction,
    caller: ParticipantId,
    proposalId: number,
  ): ParticipantAddedEffect {
    const { membership } = this.parts;
    membership.add(action.participant);

    const payload: MembershipChangedPayload = {
      participant: action.participant,
      participantCount: membership.size,
    };
    this.emit(MULTISIG_EVENTS.PARTICIPANT_ADDED, payload, {
      actor: caller,
      correlationId: this.correlate(proposalId),
    });

    return { kind: "add_participant", ...payload };
  }

  private executeRemoveParticipant(
    action: RemoveParticipantAction,
    caller: ParticipantId,
    proposalId: number,
  ): ParticipantRemovedEffect {
    const { membership, proposals, approvals } = this.parts;
    membership.remove(action.participant);

    const payload: MembershipChangedPayload = {
      participant: action.participant,
      participantCount: membership.size,
    };
    const removedEventId = this.emit(MULTISIG_EVENTS.PARTICIPANT_REMOVED, payload, {
      actor: caller,
      correlationId: this.correlate(proposalId),
    });

    // Every pending proposal, whatever its kind, loses the removed vote.
    const swept = approvals.sweep(action.participant, proposals.pendingIds());
    for (const { proposalId: sweptId, approvalCount } of swept) {
      proposals.setApprovalCount(sweptId, approvalCount);
      const revoked: ApprovalRevokedPayload = {
        proposalId: sweptId,
        participant: action.participant,
        approvalCount,
        cause: "participant_removed",
      };
      this.emit(MULTISIG_EVENTS.APPROVAL_REVOKED, revoked, {
        actor: caller,
        correlationId: this.correlate(sweptId),
        causationId: removedEventId,
      });
    }

    return {
      kind: "remove_participant",
      ...payload,
      sweptProposals: swept.map((s) => s.proposalId),
    };
  }

  private executeChangeThreshold(
    action: ChangeThresholdAction,
    caller: ParticipantId,
    proposalId: number,
  ): ThresholdChangedEffect {
    const previousThreshold = this.parts.membership.changeThreshold(action.threshold);

    const payload: ThresholdChangedPayload = { previousThreshold, threshold: action.threshold };
    this.emit(MULTISIG_EVENTS.THRESHOLD_CHANGED, payload, {
      actor: caller,
      correlationId: this.correlate(proposalId),
    });

    return { kind: "change_threshold", ...payload };
  }

  private correlate(proposalId: number): string {
    return proposalCorrelationId(this.parts.walletId, proposalId);
  }
}
