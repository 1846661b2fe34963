/**
 * Proposal routes.
 *
 * GET  /api/v1/proposals                     — List proposals (cursor pagination)
 * GET  /api/v1/proposals/:id                 — Proposal with its approvers
 * POST /api/v1/proposals/transfer            — Propose a payout
 * POST /api/v1/proposals/add-participant     — Propose a new participant
 * POST /api/v1/proposals/remove-participant  — Propose removing a participant
 * POST /api/v1/proposals/change-threshold    — Propose a new threshold
 * POST /api/v1/proposals/:id/approve         — Approve
 * POST /api/v1/proposals/:id/revoke          — Withdraw an approval
 * POST /api/v1/proposals/:id/execute         — Execute once approved
 */

import { Hono } from "hono";
import type { ProposalFilter } from "@concord/multisig";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import {
  ChangeThresholdSchema,
  ListProposalsQuerySchema,
  ParticipantBodySchema,
  ProposeTransferSchema,
} from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { requireCaller } from "../middleware/auth.js";
import { validateBody, formatZodErrors } from "../middleware/validate.js";

/** Non-numeric ids parse to NaN, which no proposal has. */
function parseProposalId(raw: string): number {
  return /^\d+$/.test(raw) ? Number(raw) : Number.NaN;
}

export function createProposalRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── Queries ────────────────────────────────────────────────────────

  routes.get("/", (c) => {
    const queryResult = ListProposalsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const query = queryResult.data;
    const filter: ProposalFilter = {
      ...(query.state !== undefined ? { state: query.state } : {}),
      ...(query.kind !== undefined ? { kind: query.kind } : {}),
    };
    const proposals = c.get("service").listProposals(filter);

    return c.json(
      paginate(proposals, { cursor: query.cursor, limit: query.limit }, (p) => p.id, "id"),
    );
  });

  routes.get("/:id", (c) => {
    const id = c.req.param("id");
    const view = c.get("service").getProposal(parseProposalId(id));
    if (view === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Proposal ${id} not found`), 404);
    }
    return c.json({ data: view });
  });

  // ─── Proposals ──────────────────────────────────────────────────────

  routes.post("/transfer", requireCaller(), validateBody(ProposeTransferSchema), (c) => {
    const body = c.get("validatedBody");
    const proposal = c
      .get("service")
      .proposeTransfer(c.get("participant"), body.destination, body.amount);
    return c.json({ data: proposal }, 201);
  });

  routes.post("/add-participant", requireCaller(), validateBody(ParticipantBodySchema), (c) => {
    const proposal = c
      .get("service")
      .proposeAddParticipant(c.get("participant"), c.get("validatedBody").participant);
    return c.json({ data: proposal }, 201);
  });

  routes.post(
    "/remove-participant",
    requireCaller(),
    validateBody(ParticipantBodySchema),
    (c) => {
      const proposal = c
        .get("service")
        .proposeRemoveParticipant(c.get("participant"), c.get("validatedBody").participant);
      return c.json({ data: proposal }, 201);
    },
  );

  routes.post("/change-threshold", requireCaller(), validateBody(ChangeThresholdSchema), (c) => {
    const proposal = c
      .get("service")
      .proposeChangeThreshold(c.get("participant"), c.get("validatedBody").threshold);
    return c.json({ data: proposal }, 201);
  });

  // ─── Approvals & execution ──────────────────────────────────────────

  routes.post("/:id/approve", requireCaller(), (c) => {
    const id = parseProposalId(c.req.param("id"));
    return c.json({ data: c.get("service").approve(c.get("participant"), id) });
  });

  routes.post("/:id/revoke", requireCaller(), (c) => {
    const id = parseProposalId(c.req.param("id"));
    return c.json({ data: c.get("service").revoke(c.get("participant"), id) });
  });

  routes.post("/:id/execute", requireCaller(), (c) => {
    const id = parseProposalId(c.req.param("id"));
    return c.json({ data: c.get("service").execute(c.get("participant"), id) });
  });

  return routes;
}
