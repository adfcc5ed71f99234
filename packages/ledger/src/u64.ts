/**
 * @notevault/ledger — u64 and commitment encoding helpers.
 *
 * Amounts and ids are bigint inside the ledger and decimal strings
 * outside it. Commitments are bytes inside and lowercase hex outside.
 */

import { isPrincipal, isU64, isU64String } from "@notevault/types";
import type { Principal } from "@notevault/types";
import { VaultError } from "./types.js";

const HEX = /^(?:[0-9a-fA-F]{2})*$/;

/** Commitment used when the depositor supplies none. */
export const EMPTY_COMMITMENT: Uint8Array = new Uint8Array(0);

/**
 * Assert an amount is within u64. Throws INVALID_AMOUNT otherwise.
 */
export function assertAmount(amount: bigint): void {
  if (!isU64(amount)) {
    throw new VaultError(
      "INVALID_AMOUNT",
      `Amount must be an unsigned 64-bit integer, got ${amount}`,
    );
  }
}

/**
 * Parse a canonical decimal string into a u64 amount.
 */
export function parseAmount(value: string): bigint {
  if (!isU64String(value)) {
    throw new VaultError(
      "INVALID_AMOUNT",
      `Amount must be a decimal unsigned 64-bit integer, got "${value}"`,
    );
  }
  return BigInt(value);
}

/**
 * Assert a principal is a non-blank string. Throws INVALID_PRINCIPAL.
 */
export function assertPrincipal(value: Principal, role: string): void {
  if (!isPrincipal(value)) {
    throw new VaultError("INVALID_PRINCIPAL", `${role} must be a non-empty principal`);
  }
}

/**
 * Decode a hex commitment (even length, optional 0x prefix).
 */
export function commitmentFromHex(hex: string): Uint8Array {
  const digits = hex.startsWith("0x") ? hex.slice(2) : hex;
  if (!HEX.test(digits)) {
    throw new VaultError(
      "INVALID_COMMITMENT",
      "Commitment must be an even-length hex string",
    );
  }
  return new Uint8Array(Buffer.from(digits, "hex"));
}

export function commitmentToHex(commitment: Uint8Array): string {
  return Buffer.from(commitment).toString("hex");
}

/** UTF-8 bytes of a string, for commitments chosen as text. */
export function commitmentFromText(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}
