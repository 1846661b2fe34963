/**
 * Tests for ApprovalLedger and ProposalStore.
 */

import { describe, it, expect } from "vitest";
import { ApprovalLedger } from "../src/approval-ledger.js";
import { ProposalStore } from "../src/proposal-store.js";
import { catchError, FIXED_NOW } from "./helpers.js";

describe("ApprovalLedger", () => {
  it("counts distinct approvers", () => {
    const ledger = new ApprovalLedger();

    expect(ledger.grant(0, "alice")).toBe(1);
    expect(ledger.grant(0, "bob")).toBe(2);
    expect(ledger.count(0)).toBe(2);
    expect(ledger.approvers(0)).toEqual(["alice", "bob"]);
  });

  it("rejects a second approval by the same participant", () => {
    const ledger = new ApprovalLedger();
    ledger.grant(0, "alice");

    const err = catchError(() => ledger.grant(0, "alice"));

    expect(err.code).toBe("ALREADY_APPROVED");
    expect(err.category).toBe("state");
    expect(ledger.count(0)).toBe(1);
  });

  it("withdraws an approval", () => {
    const ledger = new ApprovalLedger();
    ledger.grant(0, "alice");
    ledger.grant(0, "bob");

    expect(ledger.withdraw(0, "alice")).toBe(1);
    expect(ledger.hasApproved(0, "alice")).toBe(false);
  });

  it("rejects withdrawing an approval that was never given", () => {
    const ledger = new ApprovalLedger();

    expect(catchError(() => ledger.withdraw(3, "alice")).code).toBe("NOT_APPROVED");
  });

  it("sweeps only the listed proposals", () => {
    const ledger = new ApprovalLedger();
    ledger.grant(0, "carol");
    ledger.grant(1, "carol");
    ledger.grant(1, "alice");
    ledger.grant(2, "alice");

    const swept = ledger.sweep("carol", [1, 2]);

    expect(swept).toEqual([{ proposalId: 1, approvalCount: 1 }]);
    expect(ledger.hasApproved(0, "carol")).toBe(true);
    expect(ledger.hasApproved(1, "carol")).toBe(false);
  });

  it("exports and restores entries", () => {
    const ledger = new ApprovalLedger();
    ledger.grant(2, "bob");
    ledger.grant(0, "alice");
    ledger.grant(1, "alice");
    ledger.withdraw(1, "alice");
    const entries = ledger.entries();

    expect(entries).toEqual([
      { proposalId: 0, approvers: ["alice"] },
      { proposalId: 2, approvers: ["bob"] },
    ]);

    const restored = new ApprovalLedger();
    restored.restore(entries);
    expect(restored.approvers(2)).toEqual(["bob"]);
  });
});

describe("ProposalStore", () => {
  it("assigns sequential ids from 0", () => {
    const store = new ProposalStore();

    const first = store.create({ kind: "change_threshold", threshold: 1 }, "alice", FIXED_NOW);
    const second = store.create({ kind: "add_participant", participant: "dave" }, "bob", FIXED_NOW);

    expect(first.id).toBe(0);
    expect(second.id).toBe(1);
    expect(second.state).toBe("pending");
    expect(second.approvalCount).toBe(0);
  });

  it("reports unknown and non-integer ids as not found", () => {
    const store = new ProposalStore();
    store.create({ kind: "change_threshold", threshold: 1 }, "alice", FIXED_NOW);

    expect(store.get(0.5)).toBeUndefined();
    expect(catchError(() => store.require(7)).code).toBe("PROPOSAL_NOT_FOUND");
  });

  it("freezes a proposal once executed", () => {
    const store = new ProposalStore();
    store.create({ kind: "change_threshold", threshold: 1 }, "alice", FIXED_NOW);

    const executed = store.markExecuted(0, FIXED_NOW);

    expect(executed.state).toBe("executed");
    expect(executed.executedAt).toBe(FIXED_NOW);
    expect(catchError(() => store.setApprovalCount(0, 5)).code).toBe("PROPOSAL_NOT_PENDING");
    expect(catchError(() => store.markExecuted(0, FIXED_NOW)).code).toBe("PROPOSAL_NOT_PENDING");
  });

  it("filters by state and kind", () => {
    const store = new ProposalStore();
    store.create({ kind: "change_threshold", threshold: 1 }, "alice", FIXED_NOW);
    store.create({ kind: "add_participant", participant: "dave" }, "alice", FIXED_NOW);
    store.create({ kind: "change_threshold", threshold: 2 }, "alice", FIXED_NOW);
    store.markExecuted(0, FIXED_NOW);

    expect(store.list({ kind: "change_threshold" }).map((p) => p.id)).toEqual([0, 2]);
    expect(store.list({ state: "pending" }).map((p) => p.id)).toEqual([1, 2]);
    expect(store.pendingIds()).toEqual([1, 2]);
  });
});
