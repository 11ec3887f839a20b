/**
 * @flashvault/ledger — Write journal.
 *
 * Gives the ledger stores all-or-nothing semantics. Every store write
 * registers an undo action; an atomic unit opens a checkpoint and either
 * commits (undo actions are kept for the enclosing unit, or dropped when
 * the outermost unit commits) or reverts every write made after it.
 *
 * Checkpoints nest and must be closed in LIFO order.
 *
 * Writes made while no checkpoint is open are not recorded: there is
 * nothing to roll them back to.
 */

import { LedgerError } from "./types.js";

/** Opaque position in the journal returned by checkpoint(). */
export type Checkpoint = number;

export class Journal {
  private readonly _undo: (() => void)[] = [];
  private readonly _marks: Checkpoint[] = [];

  /**
   * Register the inverse of a write that is about to happen.
   */
  record(undo: () => void): void {
    if (this._marks.length > 0) {
      this._undo.push(undo);
    }
  }

  /**
   * Open a nested atomic unit.
   */
  checkpoint(): Checkpoint {
    const mark = this._undo.length;
    this._marks.push(mark);
    return mark;
  }

  /**
   * Close the innermost unit, keeping its writes.
   */
  commit(checkpoint: Checkpoint): void {
    this._close(checkpoint);
    if (this._marks.length === 0) {
      this._undo.length = 0;
    }
  }

  /**
   * Close the innermost unit, undoing every write made since it opened.
   */
  revertTo(checkpoint: Checkpoint): void {
    this._close(checkpoint);
    while (this._undo.length > checkpoint) {
      const undo = this._undo.pop();
      if (undo === undefined) break;
      undo();
    }
  }

  /**
   * Run fn as one atomic unit: commit on return, revert and rethrow on throw.
   */
  atomically<T>(fn: () => T): T {
    const checkpoint = this.checkpoint();
    let result: T;
    try {
      result = fn();
    } catch (err) {
      this.revertTo(checkpoint);
      throw err;
    }
    this.commit(checkpoint);
    return result;
  }

  /** Number of atomic units currently open. */
  get depth(): number {
    return this._marks.length;
  }

  /** Number of undo actions currently held. */
  get pending(): number {
    return this._undo.length;
  }

  private _close(checkpoint: Checkpoint): void {
    const top = this._marks[this._marks.length - 1];
    if (top !== checkpoint) {
      throw new LedgerError(
        "CHECKPOINT_MISMATCH",
        `Checkpoint ${String(checkpoint)} is not the innermost open unit (${top === undefined ? "none open" : String(top)})`,
      );
    }
    this._marks.pop();
  }
}
