/**
 * @notevault/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { isPrincipal, isU64String } from "@notevault/types";
import type { Principal } from "@notevault/types";
import { isRole } from "./types/auth.js";
import type { Role } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    HOST: z.string().default("0.0.0.0"),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),

    // Auth
    API_KEYS: z.string().default(""),

    // Vault
    VAULT_ADMIN: z.string().trim().min(1).default("admin"),
    VAULT_CUSTODIAN: z.string().trim().min(1).default("vault-custody"),

    // Audit trail: JSONL file, in-memory when unset
    EVENT_LOG_PATH: z.string().min(1).optional(),

    // Vault snapshots; beside the event log when unset
    VAULT_SNAPSHOT_DIR: z.string().min(1).optional(),

    // Development balance book seed
    GENESIS_BALANCES: z.string().default(""),
  })
  .refine((c) => c.VAULT_SNAPSHOT_DIR === undefined || c.EVENT_LOG_PATH !== undefined, {
    message: "VAULT_SNAPSHOT_DIR requires EVENT_LOG_PATH",
    path: ["VAULT_SNAPSHOT_DIR"],
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly role: Role;
  readonly principal: Principal;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1:principal1,key2:role2:principal2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    if (parts.length !== 3) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:principal`,
      );
    }

    const [key = "", role = "", principal = ""] = parts;

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isRole(role)) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be: admin, operator, or viewer`,
      );
    }
    if (!isPrincipal(principal)) {
      throw new Error("Principal cannot be empty in API_KEYS");
    }

    keys.push({ key, role, principal });
  }

  return keys;
}

// =============================================================================
// Genesis Balances
// =============================================================================

/**
 * Parse the GENESIS_BALANCES env var.
 *
 * Format: "principal1:amount1,principal2:amount2", amounts as u64 decimals.
 */
export function parseBalances(raw: string): readonly (readonly [Principal, bigint])[] {
  if (raw.trim() === "") {
    return [];
  }

  return raw.split(",").map((entry) => {
    const parts = entry.trim().split(":");
    const [principal = "", amount = ""] = parts;

    if (parts.length !== 2 || !isPrincipal(principal)) {
      throw new Error(
        `Invalid GENESIS_BALANCES entry: "${entry.trim()}". Expected format: principal:amount`,
      );
    }
    if (!isU64String(amount)) {
      throw new Error(`Invalid amount "${amount}" for "${principal}" in GENESIS_BALANCES`);
    }

    return [principal, BigInt(amount)] as const;
  });
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
