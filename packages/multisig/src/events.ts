/**
 * Notifications published for every wallet state transition.
 *
 * All events of one wallet go to the stream `multisig:<walletId>`.
 */

import type { Money } from "@concord/types";
import type { ExecutionEffect, ParticipantId, ProposalAction } from "./types.js";

export const MULTISIG_EVENTS = {
  PROPOSAL_CREATED: "multisig.proposal.created",
  APPROVAL_GRANTED: "multisig.approval.granted",
  APPROVAL_REVOKED: "multisig.approval.revoked",
  PROPOSAL_EXECUTED: "multisig.proposal.executed",
  PARTICIPANT_ADDED: "multisig.participant.added",
  PARTICIPANT_REMOVED: "multisig.participant.removed",
  THRESHOLD_CHANGED: "multisig.threshold.changed",
  DEPOSIT_RECEIVED: "multisig.deposit.received",
} as const;

export type MultisigEventType = (typeof MULTISIG_EVENTS)[keyof typeof MULTISIG_EVENTS];

export function walletStreamId(walletId: string): string {
  return `multisig:${walletId}`;
}

// ─── Payloads ────────────────────────────────────────────────────────────

export type ProposalCreatedPayload = {
  readonly proposalId: number;
  readonly proposer: ParticipantId;
  readonly action: ProposalAction;
};

export type ApprovalGrantedPayload = {
  readonly proposalId: number;
  readonly participant: ParticipantId;
  readonly approvalCount: number;
};

export type ApprovalRevokedPayload = {
  readonly proposalId: number;
  readonly participant: ParticipantId;
  readonly approvalCount: number;
  readonly cause: "revoked" | "participant_removed";
};

export type ProposalExecutedPayload = {
  readonly proposalId: number;
  readonly executedBy: ParticipantId;
  readonly effect: ExecutionEffect;
};

export type MembershipChangedPayload = {
  readonly participant: ParticipantId;
  readonly participantCount: number;
};

export type ThresholdChangedPayload = {
  readonly previousThreshold: number;
  readonly threshold: number;
};

export type DepositReceivedPayload = {
  readonly from: ParticipantId;
  readonly amount: Money;
  readonly balance: Money;
};
