/**
 * @flashvault/ledger — Reserve Store.
 *
 * Last-observed on-hand balance of the vault per currency. Only a
 * reference point: settlement pays out the difference between two
 * observations, never a caller-supplied figure.
 */

import type { Currency } from "@flashvault/types";
import { assertUint256, subUint256 } from "./int-math.js";
import { Journal } from "./journal.js";
import type { ReserveRow } from "./types.js";
import { LedgerError } from "./types.js";

export class ReserveStore {
  private readonly _journal: Journal;
  private readonly _snapshots: Map<Currency, bigint> = new Map();

  constructor(journal: Journal = new Journal()) {
    this._journal = journal;
  }

  reserveOf(currency: Currency): bigint {
    return this._snapshots.get(currency) ?? 0n;
  }

  /**
   * Replace the snapshot for a currency.
   */
  record(currency: Currency, balance: bigint): void {
    assertUint256(balance, "reserve");

    const existed = this._snapshots.has(currency);
    const prior = this.reserveOf(currency);
    this._journal.record(() => {
      if (existed) {
        this._snapshots.set(currency, prior);
      } else {
        this._snapshots.delete(currency);
      }
    });

    this._snapshots.set(currency, balance);
  }

  /**
   * Lower the snapshot by an amount that left custody, so a later settle
   * counts the returned funds as paid. Fails on underflow.
   */
  decrease(currency: Currency, amount: bigint): void {
    assertUint256(amount);
    this.record(currency, subUint256(this.reserveOf(currency), amount));
  }

  rows(): readonly ReserveRow[] {
    return [...this._snapshots].map(([currency, balance]) => ({ currency, balance }));
  }

  restore(rows: readonly ReserveRow[]): void {
    if (this._snapshots.size > 0) {
      throw new LedgerError("RESTORE_CONFLICT", "Reserve store is not empty");
    }
    for (const row of rows) {
      this.record(row.currency, row.balance);
    }
  }
}
