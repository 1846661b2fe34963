/**
 * Reading a WalletSnapshot back from untyped JSON.
 */

import { isAsset, isMoney, isRecord } from "@concord/types";
import { MultisigError } from "./errors.js";
import type {
  ApprovalEntry,
  Proposal,
  ProposalAction,
  WalletSnapshot,
} from "./types.js";

function invalid(reason: string): MultisigError {
  return new MultisigError("INVALID_SNAPSHOT", `Invalid wallet snapshot: ${reason}`);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function parseAction(value: unknown, index: number): ProposalAction {
  if (!isRecord(value)) {
    throw invalid(`proposal ${index} has no action`);
  }
  switch (value.kind) {
    case "transfer":
      if (typeof value.destination === "string" && isMoney(value.amount)) {
        return { kind: "transfer", destination: value.destination, amount: value.amount };
      }
      break;
    case "add_participant":
      if (typeof value.participant === "string") {
        return { kind: "add_participant", participant: value.participant };
      }
      break;
    case "remove_participant":
      if (typeof value.participant === "string") {
        return { kind: "remove_participant", participant: value.participant };
      }
      break;
    case "change_threshold":
      if (typeof value.threshold === "number") {
        return { kind: "change_threshold", threshold: value.threshold };
      }
      break;
  }
  throw invalid(`proposal ${index} has a malformed action`);
}

function parseProposal(value: unknown, index: number): Proposal {
  if (
    !isRecord(value) ||
    typeof value.id !== "number" ||
    typeof value.proposer !== "string" ||
    typeof value.approvalCount !== "number" ||
    (value.state !== "pending" && value.state !== "executed") ||
    typeof value.createdAt !== "string" ||
    (value.executedAt !== undefined && typeof value.executedAt !== "string")
  ) {
    throw invalid(`proposal at index ${index} is malformed`);
  }
  return {
    id: value.id,
    action: parseAction(value.action, index),
    proposer: value.proposer,
    approvalCount: value.approvalCount,
    state: value.state,
    createdAt: value.createdAt,
    ...(typeof value.executedAt === "string" ? { executedAt: value.executedAt } : {}),
  };
}

function parseApproval(value: unknown, index: number): ApprovalEntry {
  if (!isRecord(value) || typeof value.proposalId !== "number" || !isStringArray(value.approvers)) {
    throw invalid(`approval entry ${index} is malformed`);
  }
  return { proposalId: value.proposalId, approvers: value.approvers };
}

/**
 * Validate the shape of a snapshot. Invariants are checked separately by
 * `checkInvariants`.
 *
 * @throws MultisigError INVALID_SNAPSHOT
 */
export function parseWalletSnapshot(value: unknown): WalletSnapshot {
  if (!isRecord(value)) {
    throw invalid("not an object");
  }
  if (value.version !== 1) {
    throw invalid(`unsupported version ${String(value.version)}`);
  }
  if (
    typeof value.walletId !== "string" ||
    !isAsset(value.asset) ||
    !isStringArray(value.participants) ||
    typeof value.threshold !== "number" ||
    !isMoney(value.balance) ||
    !Array.isArray(value.proposals) ||
    !Array.isArray(value.approvals) ||
    typeof value.asOf !== "string"
  ) {
    throw invalid("missing or malformed fields");
  }

  return {
    version: 1,
    walletId: value.walletId,
    asset: { currency: value.asset.currency, decimals: value.asset.decimals },
    participants: value.participants,
    threshold: value.threshold,
    balance: value.balance,
    proposals: value.proposals.map(parseProposal),
    approvals: value.approvals.map(parseApproval),
    asOf: value.asOf,
  };
}
