/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code: string, message: string, details?: Record<string, unknown> } }
 */

import type { MultisigErrorCode } from "@concord/multisig";

/**
 * Codes produced by the HTTP layer itself. Domain failures carry their
 * MultisigError code unchanged.
 */
export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "INTERNAL_ERROR";

export interface ErrorDetail {
  readonly code: ApiErrorCode | MultisigErrorCode | string;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: ErrorDetail["code"],
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  return details !== undefined
    ? { error: { code, message, details } }
    : { error: { code, message } };
}
