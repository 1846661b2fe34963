/**
 * @concord/multisig — Domain types.
 *
 * A wallet is a participant set, an approval threshold, a balance in one
 * native asset and an append-only list of proposals. Proposals are never
 * deleted and their ids are never reused.
 */

import type { Asset, Money } from "@concord/types";

/**
 * Opaque participant identity. The empty or whitespace-only string is the
 * null identity and is never admitted.
 */
export type ParticipantId = string;

// =============================================================================
// Proposal Actions
// =============================================================================

export interface TransferAction {
  readonly kind: "transfer";
  readonly destination: ParticipantId;
  readonly amount: Money;
}

export interface AddParticipantAction {
  readonly kind: "add_participant";
  readonly participant: ParticipantId;
}

export interface RemoveParticipantAction {
  readonly kind: "remove_participant";
  readonly participant: ParticipantId;
}

export interface ChangeThresholdAction {
  readonly kind: "change_threshold";
  readonly threshold: number;
}

export type ProposalAction =
  | TransferAction
  | AddParticipantAction
  | RemoveParticipantAction
  | ChangeThresholdAction;

export type ProposalKind = ProposalAction["kind"];

export const PROPOSAL_KINDS: readonly ProposalKind[] = [
  "transfer",
  "add_participant",
  "remove_participant",
  "change_threshold",
];

// =============================================================================
// Proposal
// =============================================================================

export type ProposalState = "pending" | "executed";

export interface Proposal {
  /** Sequential, starting at 0 */
  readonly id: number;
  readonly action: ProposalAction;
  readonly proposer: ParticipantId;
  /** Number of participants whose approval currently counts */
  readonly approvalCount: number;
  readonly state: ProposalState;
  readonly createdAt: string;
  readonly executedAt?: string;
}

export interface ProposalFilter {
  readonly state?: ProposalState;
  readonly kind?: ProposalKind;
}

// =============================================================================
// Execution
// =============================================================================

export interface TransferEffect {
  readonly kind: "transfer";
  readonly destination: ParticipantId;
  readonly amount: Money;
  /** Balance after the debit */
  readonly balance: Money;
  /** Reference reported by the transfer rail, if any */
  readonly reference?: string;
}

export interface ParticipantAddedEffect {
  readonly kind: "add_participant";
  readonly participant: ParticipantId;
  readonly participantCount: number;
}

export interface ParticipantRemovedEffect {
  readonly kind: "remove_participant";
  readonly participant: ParticipantId;
  readonly participantCount: number;
  /** Pending proposals that lost the removed participant's approval */
  readonly sweptProposals: readonly number[];
}

export interface ThresholdChangedEffect {
  readonly kind: "change_threshold";
  readonly previousThreshold: number;
  readonly threshold: number;
}

export type ExecutionEffect =
  | TransferEffect
  | ParticipantAddedEffect
  | ParticipantRemovedEffect
  | ThresholdChangedEffect;

export interface ExecutionResult {
  readonly proposal: Proposal;
  readonly effect: ExecutionEffect;
}

export interface DepositReceipt {
  readonly from: ParticipantId;
  readonly amount: Money;
  readonly balance: Money;
}

// =============================================================================
// Configuration & Snapshot
// =============================================================================

export interface WalletConfig {
  readonly walletId: string;
  readonly participants: readonly ParticipantId[];
  readonly threshold: number;
  readonly asset: Asset;
}

export interface ApprovalEntry {
  readonly proposalId: number;
  readonly approvers: readonly ParticipantId[];
}

/**
 * JSON-serializable wallet state.
 */
export interface WalletSnapshot {
  readonly version: 1;
  readonly walletId: string;
  readonly asset: Asset;
  readonly participants: readonly ParticipantId[];
  readonly threshold: number;
  readonly balance: Money;
  readonly proposals: readonly Proposal[];
  readonly approvals: readonly ApprovalEntry[];
  readonly asOf: string;
}
