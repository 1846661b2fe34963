/**
 * @concord/multisig — Threshold-governed custodial wallet.
 *
 * A dynamic participant set jointly controls a balance and its own
 * governance parameters through proposals that execute once enough
 * participants approve.
 *
 * @packageDocumentation
 */

// Wallet
export { MultisigWallet } from "./wallet.js";
export type { WalletDeps } from "./wallet.js";

// Components
export { MembershipRegistry, assertIdentity, isNullIdentity } from "./membership.js";
export type { MembershipCheckpoint } from "./membership.js";
export { ProposalStore } from "./proposal-store.js";
export { ApprovalLedger } from "./approval-ledger.js";
export type { SweptApproval } from "./approval-ledger.js";
export { ExecutionEngine } from "./execution-engine.js";
export type { ExecutionParts } from "./execution-engine.js";
export { DepositGateway } from "./deposit-gateway.js";
export { CustodyAccount, toWalletAmount } from "./custody.js";
export type { Emit, EmitContext } from "./emitter.js";
export { proposalCorrelationId } from "./emitter.js";

// Value transfer
export { RecordingValueTransfer } from "./value-transfer.js";
export type { ValueTransfer, TransferOutcome, Payout } from "./value-transfer.js";

// Snapshots & invariants
export { checkInvariants } from "./invariants.js";
export { parseWalletSnapshot } from "./snapshot.js";

// Events
export { MULTISIG_EVENTS, walletStreamId } from "./events.js";
export type {
  MultisigEventType,
  ProposalCreatedPayload,
  ApprovalGrantedPayload,
  ApprovalRevokedPayload,
  ProposalExecutedPayload,
  MembershipChangedPayload,
  ThresholdChangedPayload,
  DepositReceivedPayload,
} from "./events.js";

// Errors
export { MultisigError, ERROR_CATEGORIES } from "./errors.js";
export type { MultisigErrorCode, MultisigErrorCategory } from "./errors.js";

// Types
export { PROPOSAL_KINDS } from "./types.js";
export type {
  ParticipantId,
  TransferAction,
  AddParticipantAction,
  RemoveParticipantAction,
  ChangeThresholdAction,
  ProposalAction,
  ProposalKind,
  ProposalState,
  Proposal,
  ProposalFilter,
  TransferEffect,
  ParticipantAddedEffect,
  ParticipantRemovedEffect,
  ThresholdChangedEffect,
  ExecutionEffect,
  ExecutionResult,
  DepositReceipt,
  WalletConfig,
  ApprovalEntry,
  WalletSnapshot,
} from "./types.js";
