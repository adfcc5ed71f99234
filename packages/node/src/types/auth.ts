/**
 * Authentication and authorization types.
 *
 * Callers authenticate with an API key (X-Api-Key). Each key names a
 * role and the principal the ledger sees as the caller.
 *
 * Role hierarchy: admin > operator > viewer
 */

import type { Principal } from "@notevault/types";

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = "admin" | "operator" | "viewer";

/** Permission levels for role-based access control */
export type Permission = "read" | "write";

/** Which permissions each role grants */
export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  viewer: ["read"],
  operator: ["read", "write"],
  admin: ["read", "write"],
};

export function isRole(value: string): value is Role {
  return value === "admin" || value === "operator" || value === "viewer";
}

/**
 * Check whether a role has a specific permission.
 */
export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved caller identity, set by the auth middleware.
 * `header` means unsecured mode: the principal came from X-Principal.
 */
export interface AuthContext {
  readonly type: "api-key" | "header";
  readonly principal: Principal;
  readonly role: Role;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly principal: Principal;
}
