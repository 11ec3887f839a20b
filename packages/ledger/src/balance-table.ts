/**
 * @flashvault/ledger — Journaled (owner, currency) → bigint table.
 *
 * Backing store for the settlement and app-reserve ledgers. Cells are
 * created lazily with value 0n and never deleted while they hold a value;
 * every write goes through the journal so it can be reverted.
 */

import type { Address, Currency } from "@flashvault/types";
import type { Journal } from "./journal.js";
import type { BalanceRow } from "./types.js";

export class BalanceTable {
  private readonly _journal: Journal;
  private readonly _rows: Map<Address, Map<Currency, bigint>> = new Map();

  constructor(journal: Journal) {
    this._journal = journal;
  }

  get(owner: Address, currency: Currency): bigint {
    return this._rows.get(owner)?.get(currency) ?? 0n;
  }

  set(owner: Address, currency: Currency, value: bigint): void {
    let row = this._rows.get(owner);
    if (row === undefined) {
      row = new Map();
      this._rows.set(owner, row);
    }

    const cells = row;
    const existed = cells.has(currency);
    const prior = cells.get(currency) ?? 0n;

    this._journal.record(() => {
      if (existed) {
        cells.set(currency, prior);
      } else {
        cells.delete(currency);
      }
    });

    cells.set(currency, value);
  }

  /**
   * All cells ever written, including those that returned to zero.
   */
  rows(): readonly BalanceRow[] {
    const result: BalanceRow[] = [];
    for (const [owner, cells] of this._rows) {
      for (const [currency, value] of cells) {
        result.push({ owner, currency, value });
      }
    }
    return result;
  }

  /**
   * Cells with a non-zero value.
   */
  nonZeroRows(): readonly BalanceRow[] {
    return this.rows().filter((r) => r.value !== 0n);
  }

  get isEmpty(): boolean {
    for (const cells of this._rows.values()) {
      if (cells.size > 0) return false;
    }
    return true;
  }
}
