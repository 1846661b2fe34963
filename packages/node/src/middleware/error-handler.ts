/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * MultisigError maps by category; LedgerError and EventStoreError by code.
 */

import type { Context } from "hono";
import { ZodError } from "zod";
import { MultisigError } from "@concord/multisig";
import type { MultisigErrorCategory } from "@concord/multisig";
import { LedgerError } from "@concord/ledger";
import type { LedgerErrorCode } from "@concord/ledger";
import { EventStoreError } from "@concord/event-store";
import type { EventStoreErrorCode } from "@concord/event-store";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors } from "./validate.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 403 | 404 | 409 | 422 | 500 | 502;

const CATEGORY_STATUS: Record<MultisigErrorCategory, ErrorStatus> = {
  authorization: 403,
  "not-found": 404,
  state: 409,
  validation: 400,
  "insufficient-authorization": 409,
  resource: 422,
  "external-effect": 502,
};

const LEDGER_STATUS: Record<LedgerErrorCode, ErrorStatus> = {
  INVALID_AMOUNT: 400,
  INVALID_MONEY: 400,
  CURRENCY_MISMATCH: 400,
};

const EVENT_STORE_STATUS: Record<EventStoreErrorCode, ErrorStatus> = {
  CONCURRENCY_CONFLICT: 409,
  INVALID_STREAM_ID: 400,
  EMPTY_APPEND: 400,
  INVALID_VERSION: 400,
  SNAPSHOT_CORRUPT: 500,
};

interface MappedError {
  readonly status: ErrorStatus;
  readonly code: string;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

function mapError(err: unknown): MappedError | undefined {
  if (err instanceof MultisigError) {
    return { status: CATEGORY_STATUS[err.category], code: err.code, message: err.message };
  }
  if (err instanceof LedgerError) {
    return { status: LEDGER_STATUS[err.code], code: err.code, message: err.message };
  }
  if (err instanceof EventStoreError) {
    const status = EVENT_STORE_STATUS[err.code];
    return status === 500 ? undefined : { status, code: err.code, message: err.message };
  }
  if (err instanceof ZodError) {
    return {
      status: 400,
      code: "VALIDATION_ERROR",
      message: "Validation failed",
      details: { issues: formatZodErrors(err) },
    };
  }
  return undefined;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Build an onError handler. `onUnexpected` sees every error that maps to
 * a 500; its message never reaches the client.
 */
export function createErrorHandler(
  onUnexpected?: (err: unknown, c: Context<AppEnv>) => void,
): (err: unknown, c: Context<AppEnv>) => Response {
  return (err, c) => {
    const mapped = mapError(err);
    if (mapped === undefined) {
      onUnexpected?.(err, c);
      return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
    }
    return c.json(createErrorEnvelope(mapped.code, mapped.message, mapped.details), mapped.status);
  };
}

export const handleError = createErrorHandler();
