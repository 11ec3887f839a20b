/**
 * @flashvault/ledger — Flash-accounting ledger stores.
 *
 * The bookkeeping core of the vault:
 * - SettlementLedger: the single session slot and signed settler deltas
 * - AppReserveLedger: non-negative per-app claims on vault funds
 * - ReserveStore: last-observed vault balances for diff-based settlement
 * - Journal: shared write journal giving all-or-nothing rollback
 *
 * Design rules:
 * - All arithmetic is checked bigint (int128 deltas, uint256 balances)
 * - Fail-closed: invalid writes throw and leave state untouched
 * - No ambient state: every store instance is independent
 * - No third-party runtime dependencies
 */

// Stores
export { SettlementLedger } from "./settlement-ledger.js";
export { AppReserveLedger } from "./app-reserve-ledger.js";
export { ReserveStore } from "./reserve-store.js";
export { BalanceTable } from "./balance-table.js";

// Journal
export { Journal } from "./journal.js";
export type { Checkpoint } from "./journal.js";

// Integer arithmetic
export {
  INT128_MAX,
  INT128_MIN,
  UINT256_MAX,
  isInt128,
  isUint256,
  assertInt128,
  assertUint256,
  addInt128,
  addUint256,
  subUint256,
  toInt128,
  parseAmount,
  formatAmount,
} from "./int-math.js";

// Types
export type {
  LedgerErrorCode,
  BalanceRow,
  ReserveRow,
  SessionState,
} from "./types.js";

export { LedgerError } from "./types.js";
