/**
 * Invariant checks over a wallet snapshot.
 *
 * Returns every violation found rather than stopping at the first, so a
 * corrupt snapshot can be diagnosed in one pass.
 */

import { isNegative, isPositive, validateMoney, assertAsset } from "@concord/ledger";
import type { Asset } from "@concord/types";
import { isNullIdentity } from "./membership.js";
import type { ProposalAction, WalletSnapshot } from "./types.js";

/**
 * What a pending action must satisfy to be executable at all. Conditions
 * that depend on the wallet state at execution time are left to the engine.
 */
function actionViolation(action: ProposalAction, asset: Asset): string | undefined {
  switch (action.kind) {
    case "transfer":
      if (isNullIdentity(action.destination)) {
        return "transfers to a null identity";
      }
      try {
        validateMoney(action.amount);
        assertAsset(action.amount, asset);
      } catch (err) {
        return `has a malformed amount: ${err instanceof Error ? err.message : String(err)}`;
      }
      return isPositive(action.amount)
        ? undefined
        : `transfers non-positive amount ${action.amount.amount}`;
    case "add_participant":
    case "remove_participant":
      return isNullIdentity(action.participant) ? "names a null participant" : undefined;
    case "change_threshold":
      return Number.isInteger(action.threshold) && action.threshold >= 1
        ? undefined
        : `proposes threshold ${action.threshold}`;
  }
}

export function checkInvariants(snapshot: WalletSnapshot): string[] {
  const violations: string[] = [];
  const participants = new Set(snapshot.participants);

  // Membership
  if (snapshot.participants.length === 0) {
    violations.push("participant set is empty");
  }
  if (participants.size !== snapshot.participants.length) {
    violations.push("participant set contains duplicates");
  }
  if (snapshot.participants.some(isNullIdentity)) {
    violations.push("participant set contains a null identity");
  }
  if (
    !Number.isInteger(snapshot.threshold) ||
    snapshot.threshold < 1 ||
    snapshot.threshold > participants.size
  ) {
    violations.push(
      `threshold ${snapshot.threshold} outside [1, ${participants.size}]`,
    );
  }

  // Balance
  try {
    validateMoney(snapshot.balance);
    assertAsset(snapshot.balance, snapshot.asset);
    if (isNegative(snapshot.balance)) {
      violations.push(`balance ${snapshot.balance.amount} is negative`);
    }
  } catch (err) {
    violations.push(`balance is malformed: ${err instanceof Error ? err.message : String(err)}`);
  }

  // Proposals
  snapshot.proposals.forEach((proposal, index) => {
    if (proposal.id !== index) {
      violations.push(`proposal at index ${index} has id ${proposal.id}`);
    }
    if (proposal.state === "executed" && proposal.executedAt === undefined) {
      violations.push(`executed proposal ${proposal.id} has no executedAt`);
    }
    if (proposal.state === "pending") {
      const problem = actionViolation(proposal.action, snapshot.asset);
      if (problem !== undefined) {
        violations.push(`pending proposal ${proposal.id} ${problem}`);
      }
    }
  });

  // Approvals
  const approvalsById = new Map<number, readonly string[]>();
  for (const entry of snapshot.approvals) {
    if (approvalsById.has(entry.proposalId)) {
      violations.push(`approvals for proposal ${entry.proposalId} listed twice`);
    }
    approvalsById.set(entry.proposalId, entry.approvers);

    const proposal = snapshot.proposals[entry.proposalId];
    if (proposal === undefined) {
      violations.push(`approvals reference unknown proposal ${entry.proposalId}`);
      continue;
    }
    if (new Set(entry.approvers).size !== entry.approvers.length) {
      violations.push(`proposal ${entry.proposalId} has duplicate approvers`);
    }
    if (proposal.state === "pending") {
      for (const approver of entry.approvers) {
        if (!participants.has(approver)) {
          violations.push(
            `pending proposal ${entry.proposalId} counts approval of non-participant '${approver}'`,
          );
        }
      }
    }
  }

  for (const proposal of snapshot.proposals) {
    if (proposal.state !== "pending") continue;
    const counted = approvalsById.get(proposal.id)?.length ?? 0;
    if (proposal.approvalCount !== counted) {
      violations.push(
        `pending proposal ${proposal.id} has approvalCount ${proposal.approvalCount} but ${counted} approvers`,
      );
    }
  }

  return violations;
}
