/**
 * @concord/multisig — Errors.
 *
 * Every failure aborts the whole call. The category groups codes the way
 * a host maps them onto its own error surface (HTTP statuses, RPC codes).
 */

export type MultisigErrorCategory =
  | "authorization"
  | "not-found"
  | "state"
  | "validation"
  | "insufficient-authorization"
  | "resource"
  | "external-effect";

export type MultisigErrorCode =
  | "NOT_PARTICIPANT"
  | "PROPOSAL_NOT_FOUND"
  | "PROPOSAL_NOT_PENDING"
  | "ALREADY_APPROVED"
  | "NOT_APPROVED"
  | "EXECUTION_IN_PROGRESS"
  | "INVALID_IDENTITY"
  | "DUPLICATE_PARTICIPANT"
  | "UNKNOWN_PARTICIPANT"
  | "INVALID_THRESHOLD"
  | "LAST_PARTICIPANT"
  | "REMOVAL_BREACHES_THRESHOLD"
  | "INVALID_AMOUNT"
  | "INVALID_SNAPSHOT"
  | "THRESHOLD_NOT_MET"
  | "INSUFFICIENT_BALANCE"
  | "TRANSFER_FAILED";

export const ERROR_CATEGORIES: Readonly<Record<MultisigErrorCode, MultisigErrorCategory>> = {
  NOT_PARTICIPANT: "authorization",
  PROPOSAL_NOT_FOUND: "not-found",
  PROPOSAL_NOT_PENDING: "state",
  ALREADY_APPROVED: "state",
  NOT_APPROVED: "state",
  EXECUTION_IN_PROGRESS: "state",
  INVALID_IDENTITY: "validation",
  DUPLICATE_PARTICIPANT: "validation",
  UNKNOWN_PARTICIPANT: "validation",
  INVALID_THRESHOLD: "validation",
  LAST_PARTICIPANT: "validation",
  REMOVAL_BREACHES_THRESHOLD: "validation",
  INVALID_AMOUNT: "validation",
  INVALID_SNAPSHOT: "validation",
  THRESHOLD_NOT_MET: "insufficient-authorization",
  INSUFFICIENT_BALANCE: "resource",
  TRANSFER_FAILED: "external-effect",
};

export class MultisigError extends Error {
  public readonly code: MultisigErrorCode;
  public readonly category: MultisigErrorCategory;

  constructor(code: MultisigErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MultisigError";
    this.code = code;
    this.category = ERROR_CATEGORIES[code];
  }
}
