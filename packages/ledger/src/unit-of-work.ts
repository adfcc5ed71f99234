/**
 * @notevault/ledger — All-or-nothing execution.
 *
 * A UnitOfWork is an undo log. Each mutation made inside `atomically()`
 * registers the step that reverses it; if the work throws, the steps run
 * newest-first and the original error is rethrown. Operations are
 * synchronous and nothing interleaves with them, so a reversing step
 * sees exactly the state its forward step produced.
 */

import { VaultError } from "./types.js";

export type UndoStep = () => void;

export class UnitOfWork {
  private readonly _steps: UndoStep[] = [];
  private _closed = false;

  /** Register the reversal of a mutation that has just been applied. */
  onRollback(step: UndoStep): void {
    if (this._closed) {
      throw new Error("Unit of work is already closed");
    }
    this._steps.push(step);
  }

  /** Number of registered undo steps. */
  get size(): number {
    return this._steps.length;
  }

  commit(): void {
    this._closed = true;
    this._steps.length = 0;
  }

  /**
   * Run every undo step, newest first. All steps run even if one throws;
   * any failure is reported as ROLLBACK_FAILED carrying `cause`.
   */
  rollback(cause: unknown): void {
    this._closed = true;
    const failures: unknown[] = [];

    while (this._steps.length > 0) {
      const step = this._steps.pop();
      if (step === undefined) break;
      try {
        step();
      } catch (err) {
        failures.push(err);
      }
    }

    if (failures.length > 0) {
      const reason = cause instanceof Error ? cause.message : String(cause);
      throw new VaultError(
        "ROLLBACK_FAILED",
        `${failures.length} undo step(s) failed while aborting: ${reason}`,
        { cause: new AggregateError([cause, ...failures]) },
      );
    }
  }
}

/**
 * Run `work` with a fresh unit of work. Commits on return, rolls back
 * and rethrows on throw.
 */
export function atomically<T>(work: (uow: UnitOfWork) => T): T {
  const uow = new UnitOfWork();
  let result: T;
  try {
    result = work(uow);
  } catch (err) {
    uow.rollback(err);
    throw err;
  }
  uow.commit();
  return result;
}
