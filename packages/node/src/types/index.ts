/**
 * Type barrel — re-exports all public types from @concord/node.
 */

// DTOs
export {
  IdentitySchema,
  AmountSchema,
  PaginationQuerySchema,
  ProposeTransferSchema,
  ParticipantBodySchema,
  ChangeThresholdSchema,
  ListProposalsQuerySchema,
  DepositSchema,
  ListEventsQuerySchema,
} from "./dto.js";
export type {
  ProposeTransferDto,
  ParticipantBodyDto,
  ChangeThresholdDto,
  ListProposalsQuery,
  DepositDto,
  ListEventsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type { PaginationQuery, PaginationMeta, PaginatedResponse } from "./pagination.js";

// Auth
export type { CallerSource, CallerContext, ApiKeyRecord, JwtClaims } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
