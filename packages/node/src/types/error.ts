/**
 * Error envelope for API responses:
 * { error: { code, message, details? } }
 *
 * Domain errors carry their own code (NOTE_NOT_FOUND, INSUFFICIENT_BALANCE,
 * ...); the codes below are the ones the HTTP layer produces itself.
 */

import type { ZodError } from "zod";

export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "HTTP_ERROR"
  | "INTERNAL_ERROR";

export interface ErrorEnvelope {
  readonly error: {
    readonly code: string;
    readonly message: string;
    readonly details?: Readonly<Record<string, unknown>>;
  };
}

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export function createErrorEnvelope(
  code: ApiErrorCode | (string & {}),
  message: string,
  details?: Readonly<Record<string, unknown>>,
): ErrorEnvelope {
  return details === undefined
    ? { error: { code, message } }
    : { error: { code, message, details } };
}

/**
 * VALIDATION_ERROR envelope listing every failed field as a dotted path.
 */
export function validationError(message: string, cause: ZodError): ErrorEnvelope {
  const issues: ValidationIssue[] = cause.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
  return createErrorEnvelope("VALIDATION_ERROR", message, { issues });
}
