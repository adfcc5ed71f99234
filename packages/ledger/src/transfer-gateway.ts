/**
 * @notevault/ledger — Asset transfer capability.
 *
 * The ledger never moves value itself. It asks a TransferGateway, which
 * must apply each transfer atomically: either both balances change or
 * neither does, and a failure is reported by throwing.
 */

import type { Principal } from "@notevault/types";

export interface TransferGateway {
  /**
   * Move `amount` from `from` to `to`.
   *
   * @throws TransferError (or any Error) when the transfer cannot happen;
   *   no balance may have changed in that case
   */
  transfer(from: Principal, to: Principal, amount: bigint): void;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type TransferErrorCode = "INSUFFICIENT_BALANCE" | "INVALID_TRANSFER_AMOUNT";

export class TransferError extends Error {
  constructor(
    public readonly code: TransferErrorCode,
    message: string,
    public readonly from?: Principal,
  ) {
    super(message);
    this.name = "TransferError";
  }
}

// ─── In-memory balance book ──────────────────────────────────────────────

export interface TransferRecord {
  readonly from: Principal;
  readonly to: Principal;
  readonly amount: bigint;
}

/**
 * In-process balance book implementing TransferGateway.
 *
 * Used by tests, the demo and the development host. Unknown principals
 * hold a zero balance. Every successful transfer is recorded in order.
 */
export class InMemoryTransferGateway implements TransferGateway {
  private readonly _balances = new Map<Principal, bigint>();
  private readonly _log: TransferRecord[] = [];

  constructor(initial?: Iterable<readonly [Principal, bigint]>) {
    if (initial !== undefined) {
      for (const [principal, amount] of initial) {
        this.credit(principal, amount);
      }
    }
  }

  /**
   * Add value to a principal's balance out of thin air (funding for
   * tests and development). Not part of the TransferGateway contract.
   */
  credit(principal: Principal, amount: bigint): void {
    assertTransferAmount(amount);
    this._balances.set(principal, this.balanceOf(principal) + amount);
  }

  balanceOf(principal: Principal): bigint {
    return this._balances.get(principal) ?? 0n;
  }

  transfer(from: Principal, to: Principal, amount: bigint): void {
    assertTransferAmount(amount);

    const available = this.balanceOf(from);
    if (available < amount) {
      throw new TransferError(
        "INSUFFICIENT_BALANCE",
        `Insufficient balance for "${from}": has ${available.toString()}, needs ${amount.toString()}`,
        from,
      );
    }

    if (from !== to) {
      this._balances.set(from, available - amount);
      this._balances.set(to, this.balanceOf(to) + amount);
    }
    this._log.push({ from, to, amount });
  }

  /** Snapshot of all non-default balances. */
  balances(): ReadonlyMap<Principal, bigint> {
    return new Map(this._balances);
  }

  /**
   * Replace the whole book, as when a saved book is loaded back.
   * The transfer log is cleared.
   */
  replaceBalances(entries: Iterable<readonly [Principal, bigint]>): void {
    const next = new Map<Principal, bigint>();
    for (const [principal, amount] of entries) {
      assertTransferAmount(amount);
      next.set(principal, (next.get(principal) ?? 0n) + amount);
    }
    this._balances.clear();
    for (const [principal, amount] of next) {
      this._balances.set(principal, amount);
    }
    this._log.length = 0;
  }

  /** Sum of all balances. Transfers never change it. */
  get supply(): bigint {
    let total = 0n;
    for (const balance of this._balances.values()) {
      total += balance;
    }
    return total;
  }

  /** Successful transfers, oldest first. */
  transfers(): readonly TransferRecord[] {
    return [...this._log];
  }
}

function assertTransferAmount(amount: bigint): void {
  if (amount < 0n) {
    throw new TransferError(
      "INVALID_TRANSFER_AMOUNT",
      `Transfer amount must not be negative, got ${amount.toString()}`,
    );
  }
}
