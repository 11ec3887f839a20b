/**
 * @flashvault/ledger — Internal types for the ledger stores.
 *
 * Rules:
 * - All exposed rows are readonly
 * - Fail-closed: invalid writes throw, never silently succeed
 * - Amounts are bigint; rows serialize amounts as decimal strings
 */

import type { Address, Currency } from "@flashvault/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "ALREADY_LOCKED"
  | "UNSETTLED_BALANCE"
  | "ARITHMETIC_OVERFLOW"
  | "ARITHMETIC_UNDERFLOW"
  | "INVALID_AMOUNT"
  | "CHECKPOINT_MISMATCH"
  | "RESTORE_CONFLICT";

/**
 * Structured error from the ledger stores.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Row Types ───────────────────────────────────────────────────────────

/**
 * One (owner, currency) cell of a balance table.
 * The owner is a settler for settlement rows and an app for reserve rows.
 */
export interface BalanceRow {
  readonly owner: Address;
  readonly currency: Currency;
  readonly value: bigint;
}

/**
 * One currency snapshot in the reserve store.
 */
export interface ReserveRow {
  readonly currency: Currency;
  readonly balance: bigint;
}

/**
 * Read-only view of the session slot.
 */
export interface SessionState {
  readonly holder: Address | null;
  readonly outstandingCount: number;
}
