/**
 * Request DTOs with Zod validation schemas.
 *
 * Bodies are checked for shape here; the wallet enforces every domain
 * rule (membership, thresholds, positive amounts) itself.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const IdentitySchema = z.string().trim().min(1).max(256);

export const AmountSchema = z
  .string()
  .regex(/^\d+(\.\d+)?$/, "Amount must be a non-negative decimal string");

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Proposal DTOs
// =============================================================================

export const ProposeTransferSchema = z.object({
  destination: IdentitySchema,
  amount: AmountSchema,
});

export type ProposeTransferDto = z.infer<typeof ProposeTransferSchema>;

export const ParticipantBodySchema = z.object({
  participant: IdentitySchema,
});

export type ParticipantBodyDto = z.infer<typeof ParticipantBodySchema>;

export const ChangeThresholdSchema = z.object({
  threshold: z.number().int(),
});

export type ChangeThresholdDto = z.infer<typeof ChangeThresholdSchema>;

export const ListProposalsQuerySchema = PaginationQuerySchema.extend({
  state: z.enum(["pending", "executed"]).optional(),
  kind: z
    .enum(["transfer", "add_participant", "remove_participant", "change_threshold"])
    .optional(),
});

export type ListProposalsQuery = z.infer<typeof ListProposalsQuerySchema>;

// =============================================================================
// Deposit DTOs
// =============================================================================

export const DepositSchema = z.object({
  from: IdentitySchema,
  amount: AmountSchema,
});

export type DepositDto = z.infer<typeof DepositSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;
