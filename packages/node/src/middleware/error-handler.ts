/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain errors (VaultError, TransferError, EventStoreError,
 * CatalogError) to HTTP status codes by their `code`.
 */

import type { ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export type ErrorStatus = 400 | 403 | 404 | 409 | 422 | 500;

export const STATUS_MAP: Readonly<Record<string, ErrorStatus>> = {
  // Vault errors
  NOT_ADMIN: 403,
  ALREADY_INITIALIZED: 409,
  NOT_INITIALIZED: 409,
  NOTE_NOT_FOUND: 404,
  NOT_NOTE_OWNER: 403,
  NOTE_ALREADY_SPENT: 409,
  INSUFFICIENT_LOCKED: 500,
  INVALID_AMOUNT: 400,
  INVALID_COMMITMENT: 400,
  INVALID_PRINCIPAL: 400,
  LOCKED_OVERFLOW: 422,
  CORRUPT_SNAPSHOT: 400,
  ROLLBACK_FAILED: 500,

  // Transfer errors
  INSUFFICIENT_BALANCE: 422,
  INVALID_TRANSFER_AMOUNT: 400,

  // Event store errors
  INVALID_STREAM_ID: 400,
  EMPTY_APPEND: 400,
  INVALID_VERSION: 400,
  INVALID_EVENT: 500,
};

function getErrorCode(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

export function getStatusCode(code: string | undefined): ErrorStatus {
  return (code !== undefined ? STATUS_MAP[code] : undefined) ?? 500;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Create the handler registered with Hono's onError.
 *
 * 500s keep their code but hide the message, and are logged.
 */
export function createErrorHandler(logger?: Logger): ErrorHandler<AppEnv> {
  return (err, c) => {
    if (err instanceof HTTPException) {
      return c.json(
        createErrorEnvelope(err.status === 400 ? "VALIDATION_ERROR" : "HTTP_ERROR", err.message),
        err.status,
      );
    }

    const code = getErrorCode(err) ?? "INTERNAL_ERROR";
    const status = getStatusCode(code);

    if (status === 500) {
      logger?.error({ err, code, requestId: c.get("requestId") }, "request failed");
    }

    // Don't leak internal details
    const message = status === 500 ? "Internal server error" : err.message;

    return c.json(createErrorEnvelope(code, message), status);
  };
}
