/**
 * Authentication middleware.
 *
 * API key via X-Api-Key header → looked up in the configured key
 * registry. The key's principal becomes the ledger caller.
 *
 * On success, sets `c.set("auth", authContext)`.
 * On failure, returns 401 or 403.
 */

import type { MiddlewareHandler } from "hono";
import type { Principal } from "@notevault/types";
import { isPrincipal } from "@notevault/types";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, Permission } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const PRINCIPAL_HEADER = "X-Principal";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

/**
 * Require a known API key. Returns 401 if it is missing or unknown.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Authentication required"),
        401,
      );
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
    }

    c.set("auth", { type: "api-key", principal: record.principal, role: record.role });
    return next();
  };
}

/**
 * Unsecured mode (tests, development): the caller names itself with
 * X-Principal and gets the admin role.
 */
export function principalHeaderMiddleware(
  defaultPrincipal: Principal,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const header = c.req.header(PRINCIPAL_HEADER);
    const principal = header !== undefined && isPrincipal(header) ? header.trim() : defaultPrincipal;

    c.set("auth", { type: "header", principal, role: "admin" });
    return next();
  };
}

// =============================================================================
// Permission Guard
// =============================================================================

/**
 * Create a permission guard middleware.
 *
 * Must run AFTER an auth middleware. Returns 403 if the authenticated
 * role lacks the required permission.
 */
export function requirePermission(
  permission: Permission,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (!hasPermission(auth.role, permission)) {
      return c.json(
        createErrorEnvelope(
          "FORBIDDEN",
          `Role '${auth.role}' lacks '${permission}' permission`,
        ),
        403,
      );
    }
    return next();
  };
}
