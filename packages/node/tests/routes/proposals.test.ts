/**
 * Tests for proposal routes: creation, approvals and execution over HTTP.
 */

import { describe, it, expect } from "vitest";
import type { Hono } from "hono";
import type { AppEnv } from "../../src/types/api-contract.js";
import { FIXED_NOW, asCaller, createTestApp, jsonRequest } from "../setup.js";

interface ErrorBody {
  error: { code: string; message: string; details?: { issues: { path: string }[] } };
}

interface ProposalBody {
  data: { id: number; approvalCount: number; state: string };
}

const usdc = (amount: string) => ({ amount, currency: "USDC", decimals: 6 });

async function fund(app: Hono<AppEnv>, amount: string): Promise<void> {
  const res = await app.request(jsonRequest("/api/v1/deposits", "POST", { from: "treasury", amount }));
  expect(res.status).toBe(201);
}

function post(app: Hono<AppEnv>, path: string, caller: string, body?: unknown) {
  return app.request(jsonRequest(`/api/v1/proposals${path}`, "POST", body, asCaller(caller)));
}

describe("transfer lifecycle", () => {
  it("proposes, approves, executes and pays out", async () => {
    const { app } = createTestApp();
    await fund(app, "100");

    const created = await post(app, "/transfer", "alice", { destination: "dave", amount: "5" });
    expect(created.status).toBe(201);
    expect(await created.json()).toEqual({
      data: {
        id: 0,
        action: { kind: "transfer", destination: "dave", amount: usdc("5") },
        proposer: "alice",
        approvalCount: 1,
        state: "pending",
        createdAt: FIXED_NOW,
      },
    });

    const approved = await post(app, "/0/approve", "bob");
    expect(approved.status).toBe(200);
    const approvedBody = (await approved.json()) as ProposalBody;
    expect(approvedBody.data.approvalCount).toBe(2);
    expect(approvedBody.data.state).toBe("pending");

    const executed = await post(app, "/0/execute", "carol");
    expect(executed.status).toBe(200);
    const executedBody = (await executed.json()) as {
      data: { proposal: { state: string; executedAt: string }; effect: unknown };
    };
    expect(executedBody.data.proposal.state).toBe("executed");
    expect(executedBody.data.proposal.executedAt).toBe(FIXED_NOW);
    expect(executedBody.data.effect).toEqual({
      kind: "transfer",
      destination: "dave",
      amount: usdc("5"),
      balance: usdc("95"),
      reference: "payout-1",
    });

    const again = await post(app, "/0/execute", "carol");
    expect(again.status).toBe(409);
    expect(((await again.json()) as ErrorBody).error).toEqual({
      code: "PROPOSAL_NOT_PENDING",
      message: "Proposal 0 is executed",
    });

    const wallet = await app.request(jsonRequest("/api/v1/wallet"));
    const walletBody = (await wallet.json()) as { data: { balance: unknown; proposalCount: number } };
    expect(walletBody.data.balance).toEqual(usdc("95"));
    expect(walletBody.data.proposalCount).toBe(1);

    const payouts = await app.request(jsonRequest("/api/v1/payouts"));
    const payoutBody = (await payouts.json()) as { data: { reference: string; destination: string; amount: unknown }[] };
    expect(payoutBody.data).toHaveLength(1);
    expect(payoutBody.data[0]).toMatchObject({
      reference: "payout-1",
      destination: "dave",
      amount: usdc("5"),
    });
  });

  it("refuses execution below threshold", async () => {
    const { app } = createTestApp();
    await fund(app, "10");
    await post(app, "/transfer", "alice", { destination: "dave", amount: "5" });

    const res = await post(app, "/0/execute", "alice");

    expect(res.status).toBe(409);
    expect(((await res.json()) as ErrorBody).error).toEqual({
      code: "THRESHOLD_NOT_MET",
      message: "Proposal 0 has 1 of 2 required approvals",
    });
  });

  it("rolls back an execution the balance cannot cover", async () => {
    const { app } = createTestApp();
    await post(app, "/transfer", "alice", { destination: "dave", amount: "5" });
    await post(app, "/0/approve", "bob");

    const res = await post(app, "/0/execute", "bob");

    expect(res.status).toBe(422);
    expect(((await res.json()) as ErrorBody).error).toEqual({
      code: "INSUFFICIENT_BALANCE",
      message: "Balance 0 USDC is less than 5",
    });

    const view = await app.request(jsonRequest("/api/v1/proposals/0"));
    const viewBody = (await view.json()) as { data: { proposal: { state: string }; approvers: string[] } };
    expect(viewBody.data.proposal.state).toBe("pending");
    expect(viewBody.data.approvers).toEqual(["alice", "bob"]);

    const payouts = await app.request(jsonRequest("/api/v1/payouts"));
    expect(await payouts.json()).toEqual({ data: [] });
  });
});

describe("caller checks", () => {
  it("requires a caller for mutations", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      jsonRequest("/api/v1/proposals/transfer", "POST", { destination: "dave", amount: "5" }),
    );

    expect(res.status).toBe(401);
    expect(((await res.json()) as ErrorBody).error.code).toBe("UNAUTHORIZED");
  });

  it("rejects callers outside the participant set", async () => {
    const { app } = createTestApp();

    const res = await post(app, "/transfer", "mallory", { destination: "dave", amount: "5" });

    expect(res.status).toBe(403);
    expect(((await res.json()) as ErrorBody).error).toEqual({
      code: "NOT_PARTICIPANT",
      message: "'mallory' is not a participant",
    });
  });
});

describe("approvals", () => {
  it("rejects a second approval by the same participant", async () => {
    const { app } = createTestApp();
    await post(app, "/add-participant", "alice", { participant: "dave" });

    const res = await post(app, "/0/approve", "alice");

    expect(res.status).toBe(409);
    expect(((await res.json()) as ErrorBody).error.code).toBe("ALREADY_APPROVED");
  });

  it("revokes an approval", async () => {
    const { app } = createTestApp();
    await post(app, "/add-participant", "alice", { participant: "dave" });

    const res = await post(app, "/0/revoke", "alice");

    expect(res.status).toBe(200);
    expect(((await res.json()) as ProposalBody).data.approvalCount).toBe(0);
  });

  it("rejects revoking an approval never given", async () => {
    const { app } = createTestApp();
    await post(app, "/add-participant", "alice", { participant: "dave" });

    const res = await post(app, "/0/revoke", "bob");

    expect(res.status).toBe(409);
    expect(((await res.json()) as ErrorBody).error.code).toBe("NOT_APPROVED");
  });

  it("returns 404 for unknown proposals", async () => {
    const { app } = createTestApp();

    const res = await post(app, "/9/approve", "alice");
    expect(res.status).toBe(404);
    expect(((await res.json()) as ErrorBody).error).toEqual({
      code: "PROPOSAL_NOT_FOUND",
      message: "Proposal 9 not found",
    });

    const view = await app.request(jsonRequest("/api/v1/proposals/abc"));
    expect(view.status).toBe(404);
    expect(((await view.json()) as ErrorBody).error).toEqual({
      code: "NOT_FOUND",
      message: "Proposal abc not found",
    });
  });
});

describe("validation", () => {
  it("rejects a malformed body", async () => {
    const { app } = createTestApp();

    const res = await post(app, "/transfer", "alice", { destination: "dave", amount: 5 });

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(body.error.details?.issues.map((i) => i.path)).toEqual(["amount"]);
  });

  it("rejects invalid JSON", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      new Request("http://localhost/api/v1/proposals/transfer", {
        method: "POST",
        headers: { "Content-Type": "application/json", "X-Caller-Id": "alice" },
        body: "{",
      }),
    );

    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error).toEqual({
      code: "VALIDATION_ERROR",
      message: "Invalid JSON in request body",
    });
  });

  it("rejects a zero transfer", async () => {
    const { app } = createTestApp();

    const res = await post(app, "/transfer", "alice", { destination: "dave", amount: "0" });

    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error).toEqual({
      code: "INVALID_AMOUNT",
      message: "Transfer amount must be positive, got 0",
    });
  });

  it("rejects precision the asset does not have", async () => {
    const { app } = createTestApp();

    const res = await post(app, "/transfer", "alice", { destination: "dave", amount: "1.1234567" });

    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error).toEqual({
      code: "INVALID_AMOUNT",
      message: 'Amount "1.1234567" has 7 decimal places, asset allows 6',
    });
  });

  it("rejects an unreachable threshold at proposal time", async () => {
    const { app } = createTestApp();

    const res = await post(app, "/change-threshold", "alice", { threshold: 4 });

    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error).toEqual({
      code: "INVALID_THRESHOLD",
      message: "Threshold must be an integer between 1 and 3, got 4",
    });
  });
});

describe("governance", () => {
  it("adds a participant", async () => {
    const { app } = createTestApp();
    await post(app, "/add-participant", "alice", { participant: "dave" });
    await post(app, "/0/approve", "bob");

    const res = await post(app, "/0/execute", "alice");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: { effect: unknown } };
    expect(body.data.effect).toEqual({
      kind: "add_participant",
      participant: "dave",
      participantCount: 4,
    });

    const wallet = await app.request(jsonRequest("/api/v1/wallet"));
    const walletBody = (await wallet.json()) as { data: { participants: string[] } };
    expect(walletBody.data.participants).toEqual(["alice", "bob", "carol", "dave"]);
  });

  it("sweeps the removed participant's approvals", async () => {
    const { app } = createTestApp();
    await fund(app, "10");
    await post(app, "/transfer", "alice", { destination: "dave", amount: "5" });
    await post(app, "/0/approve", "carol");
    await post(app, "/remove-participant", "alice", { participant: "carol" });
    await post(app, "/1/approve", "bob");

    const res = await post(app, "/1/execute", "bob");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: { effect: unknown } };
    expect(body.data.effect).toEqual({
      kind: "remove_participant",
      participant: "carol",
      participantCount: 2,
      sweptProposals: [0],
    });

    const view = await app.request(jsonRequest("/api/v1/proposals/0"));
    const viewBody = (await view.json()) as { data: { proposal: { approvalCount: number }; approvers: string[] } };
    expect(viewBody.data.proposal.approvalCount).toBe(1);
    expect(viewBody.data.approvers).toEqual(["alice"]);
  });

  it("changes the threshold", async () => {
    const { app } = createTestApp();
    await post(app, "/change-threshold", "alice", { threshold: 3 });
    await post(app, "/0/approve", "carol");

    const res = await post(app, "/0/execute", "carol");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: { effect: unknown } };
    expect(body.data.effect).toEqual({ kind: "change_threshold", previousThreshold: 2, threshold: 3 });
  });
});

describe("GET /api/v1/proposals", () => {
  async function seed(app: Hono<AppEnv>): Promise<void> {
    await post(app, "/transfer", "alice", { destination: "dave", amount: "1" });
    await post(app, "/add-participant", "bob", { participant: "erin" });
    await post(app, "/transfer", "carol", { destination: "dave", amount: "2" });
  }

  it("pages by id", async () => {
    const { app } = createTestApp();
    await seed(app);

    const first = await app.request(jsonRequest("/api/v1/proposals?limit=2"));
    const firstBody = (await first.json()) as {
      data: { id: number }[];
      pagination: { cursor: string | null; hasMore: boolean };
    };
    expect(firstBody.data.map((p) => p.id)).toEqual([0, 1]);
    expect(firstBody.pagination.hasMore).toBe(true);

    const second = await app.request(
      jsonRequest(`/api/v1/proposals?limit=2&cursor=${firstBody.pagination.cursor ?? ""}`),
    );
    const secondBody = (await second.json()) as {
      data: { id: number }[];
      pagination: { cursor: string | null; hasMore: boolean };
    };
    expect(secondBody.data.map((p) => p.id)).toEqual([2]);
    expect(secondBody.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("filters by kind and state", async () => {
    const { app } = createTestApp();
    await seed(app);

    const transfers = await app.request(jsonRequest("/api/v1/proposals?kind=transfer"));
    const transferBody = (await transfers.json()) as { data: { id: number }[] };
    expect(transferBody.data.map((p) => p.id)).toEqual([0, 2]);

    const executed = await app.request(jsonRequest("/api/v1/proposals?state=executed"));
    expect(((await executed.json()) as { data: unknown[] }).data).toEqual([]);
  });

  it("rejects unknown filter values", async () => {
    const { app } = createTestApp();

    const res = await app.request(jsonRequest("/api/v1/proposals?state=bogus"));

    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error.code).toBe("VALIDATION_ERROR");
  });
});
