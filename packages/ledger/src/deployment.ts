/**
 * @notevault/ledger — Vault deployment.
 *
 * Owns the single vault record of a deployment, keyed by the admin
 * principal. The record is created once by the admin and never deleted.
 */

import type { Principal } from "@notevault/types";
import type { VaultContext, VaultSnapshot } from "./types.js";
import { VaultError } from "./types.js";
import { VaultStore } from "./vault-store.js";

export interface VaultDeploymentOptions {
  /**
   * Called with the new record before initialize() installs it. A
   * throw aborts initialize() and the deployment stays uninitialized.
   */
  readonly onInitialize?: ((vault: VaultStore) => void) | undefined;
}

export class VaultDeployment {
  private readonly _context: VaultContext;
  private readonly _onInitialize: ((vault: VaultStore) => void) | undefined;
  private readonly _records: Map<Principal, VaultStore> = new Map();

  constructor(context: VaultContext, options: VaultDeploymentOptions = {}) {
    this._context = context;
    this._onInitialize = options.onInitialize;
  }

  get admin(): Principal {
    return this._context.admin;
  }

  get custodian(): Principal {
    return this._context.custodian;
  }

  /**
   * Create the vault record.
   *
   * @throws VaultError NOT_ADMIN if `caller` is not the admin,
   *   ALREADY_INITIALIZED if the record exists
   */
  initialize(caller: Principal): VaultStore {
    if (caller !== this._context.admin) {
      throw new VaultError("NOT_ADMIN", `"${caller}" is not the vault admin`);
    }
    if (this._records.has(caller)) {
      throw new VaultError("ALREADY_INITIALIZED", "The vault has already been initialized");
    }

    const vault = VaultStore.create(this._context);
    this._onInitialize?.(vault);
    this._records.set(caller, vault);
    return vault;
  }

  isInitialized(): boolean {
    return this._records.has(this._context.admin);
  }

  /**
   * The vault record. Throws NOT_INITIALIZED before initialize().
   */
  vault(): VaultStore {
    const vault = this._records.get(this._context.admin);
    if (vault === undefined) {
      throw new VaultError("NOT_INITIALIZED", "The vault has not been initialized");
    }
    return vault;
  }

  /**
   * Install a record from a snapshot, in place of initialize().
   *
   * @throws VaultError ALREADY_INITIALIZED, CORRUPT_SNAPSHOT
   */
  restore(snapshot: VaultSnapshot): VaultStore {
    if (this.isInitialized()) {
      throw new VaultError("ALREADY_INITIALIZED", "The vault has already been initialized");
    }

    const vault = VaultStore.fromSnapshot(snapshot, this._context);
    this._records.set(this._context.admin, vault);
    return vault;
  }
}
