/**
 * @flashvault/ledger — Settlement Ledger.
 *
 * Holds the single global session slot and the per-(settler, currency)
 * signed deltas accumulated during a session.
 *
 * Sign convention: a positive delta means the vault owes the settler
 * (the settler supplied value); a negative delta means the settler owes
 * the vault (the settler withdrew value).
 *
 * The outstanding counter changes only when a cell crosses zero:
 * 0 → non-zero increments it, non-zero → 0 decrements it. "Is everything
 * settled?" is therefore a single comparison, whatever the number of
 * cells a session touched.
 *
 * API surface:
 * - acquireSession() / releaseSession()
 * - currentHolder() / outstandingCount()
 * - accountDelta() — the only delta write
 * - deltaOf() / touchedPairs()
 */

import type { Address, Currency } from "@flashvault/types";
import { BalanceTable } from "./balance-table.js";
import { addInt128, assertInt128 } from "./int-math.js";
import { Journal } from "./journal.js";
import type { BalanceRow, SessionState } from "./types.js";
import { LedgerError } from "./types.js";

export class SettlementLedger {
  private readonly _journal: Journal;
  private readonly _deltas: BalanceTable;
  private _holder: Address | null = null;
  private _outstanding = 0;

  constructor(journal: Journal = new Journal()) {
    this._journal = journal;
    this._deltas = new BalanceTable(journal);
  }

  // ─── Session ─────────────────────────────────────────────────────────

  /**
   * Claim the session slot. There is exactly one slot; it does not nest.
   */
  acquireSession(holder: Address): void {
    if (this._holder !== null) {
      throw new LedgerError(
        "ALREADY_LOCKED",
        `Session already held by "${this._holder}"`,
      );
    }
    this._setHolder(holder);
  }

  /**
   * Clear the session slot. Every delta must have returned to zero.
   */
  releaseSession(): void {
    if (this._outstanding !== 0) {
      const pairs = this.touchedPairs()
        .map((r) => `${r.owner}/${r.currency}=${r.value.toString()}`)
        .join(", ");
      throw new LedgerError(
        "UNSETTLED_BALANCE",
        `Cannot release session with ${String(this._outstanding)} unsettled delta(s): ${pairs}`,
      );
    }
    this._setHolder(null);
  }

  currentHolder(): Address | null {
    return this._holder;
  }

  outstandingCount(): number {
    return this._outstanding;
  }

  session(): SessionState {
    return { holder: this._holder, outstandingCount: this._outstanding };
  }

  // ─── Deltas ──────────────────────────────────────────────────────────

  /**
   * Add a signed delta to (account, currency).
   *
   * Throws ARITHMETIC_OVERFLOW if the delta or the new value is outside
   * int128; nothing is written in that case.
   */
  accountDelta(account: Address, currency: Currency, delta: bigint): void {
    assertInt128(delta);
    if (delta === 0n) return;

    const prior = this._deltas.get(account, currency);
    const next = addInt128(prior, delta);

    if (prior === 0n) {
      this._setOutstanding(this._outstanding + 1);
    } else if (next === 0n) {
      this._setOutstanding(this._outstanding - 1);
    }

    this._deltas.set(account, currency, next);
  }

  deltaOf(account: Address, currency: Currency): bigint {
    return this._deltas.get(account, currency);
  }

  /**
   * Cells currently holding a non-zero delta.
   * Diagnostic only: settlement is decided by outstandingCount().
   */
  touchedPairs(): readonly BalanceRow[] {
    return this._deltas.nonZeroRows();
  }

  get journal(): Journal {
    return this._journal;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _setHolder(holder: Address | null): void {
    const prior = this._holder;
    this._journal.record(() => {
      this._holder = prior;
    });
    this._holder = holder;
  }

  private _setOutstanding(count: number): void {
    const prior = this._outstanding;
    this._journal.record(() => {
      this._outstanding = prior;
    });
    this._outstanding = count;
  }
}
