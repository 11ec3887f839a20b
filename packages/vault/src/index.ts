/**
 * @flashvault/vault — Flash-accounting vault.
 *
 * Lets many registered apps share one pool of custodied assets while
 * deferring asset movement until a session nets every delta to zero.
 *
 * Design rules:
 * - One session at a time; every operation inside it is reentrant
 * - A failed session rolls back as a unit, including its acquisition
 * - Payments in are measured from observed balances, never trusted
 * - Collaborators (currencies, share tokens, event sink) are injected
 */

// Top-level vault
export { Vault } from "./vault.js";
export type { VaultOptions, SettleOptions } from "./vault.js";

// Collaborators
export { CurrencyRegistry } from "./currency-registry.js";
export { InMemoryCustody, CustodyError } from "./in-memory-custody.js";
export type { CustodyErrorCode } from "./in-memory-custody.js";
export { InMemoryShareTokenLedger, ShareTokenError } from "./share-token-ledger.js";
export type { ShareTokenErrorCode } from "./share-token-ledger.js";

// Types
export type {
  Locker,
  CurrencyHandle,
  ShareTokenLedger,
  EventSink,
  VaultConfig,
  VaultSnapshot,
  AppReserveEntry,
  VaultReserveEntry,
  VaultErrorCode,
} from "./types.js";
export { VaultError } from "./types.js";
export { isVaultSnapshot } from "./guards.js";
