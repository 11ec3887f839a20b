/**
 * @flashvault/ledger — App Reserve Ledger.
 *
 * Per-(app, currency) unsigned balance: what an app may claim from the
 * vault. It never goes below zero; a write that would is rejected and
 * leaves the reserve untouched.
 *
 * Sign convention is the INVERSE of SettlementLedger.accountDelta():
 *
 * - delta > 0: the app pays the trader out of its claim → reserve -= delta
 * - delta < 0: the trader pays into the app's claim   → reserve += -delta
 *
 * The same delta is recorded as-is on the settler's settlement cell.
 */

import type { Address, Currency } from "@flashvault/types";
import { BalanceTable } from "./balance-table.js";
import { addUint256, assertInt128, assertUint256, subUint256 } from "./int-math.js";
import { Journal } from "./journal.js";
import type { BalanceRow } from "./types.js";
import { LedgerError } from "./types.js";

export class AppReserveLedger {
  private readonly _reserves: BalanceTable;

  constructor(journal: Journal = new Journal()) {
    this._reserves = new BalanceTable(journal);
  }

  /**
   * Apply an app-reported signed delta (see sign convention above).
   *
   * Throws ARITHMETIC_UNDERFLOW if the app reports paying out more than
   * it holds, ARITHMETIC_OVERFLOW past uint256.
   */
  adjustAppReserve(app: Address, currency: Currency, delta: bigint): void {
    assertInt128(delta);
    if (delta === 0n) return;

    const current = this._reserves.get(app, currency);
    const next = delta > 0n
      ? subUint256(current, delta)
      : addUint256(current, -delta);

    this._reserves.set(app, currency, next);
  }

  /**
   * Remove an unsigned amount from an app's reserve (fee collection).
   */
  withdraw(app: Address, currency: Currency, amount: bigint): void {
    assertUint256(amount);
    if (amount === 0n) return;

    const current = this._reserves.get(app, currency);
    this._reserves.set(app, currency, subUint256(current, amount));
  }

  reserveOf(app: Address, currency: Currency): bigint {
    return this._reserves.get(app, currency);
  }

  rows(): readonly BalanceRow[] {
    return this._reserves.rows();
  }

  /**
   * Load persisted reserves into an empty ledger.
   */
  restore(rows: readonly BalanceRow[]): void {
    if (!this._reserves.isEmpty) {
      throw new LedgerError("RESTORE_CONFLICT", "App reserve ledger is not empty");
    }
    for (const row of rows) {
      this._reserves.set(row.owner, row.currency, assertUint256(row.value, "reserve"));
    }
  }
}
