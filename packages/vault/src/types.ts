/**
 * Vault Types
 *
 * Domain types for the flash-accounting vault and the contracts of the
 * collaborators it drives.
 *
 * Rules:
 * - All types are readonly (immutability by default)
 * - Amounts are bigint in memory and decimal strings on the wire
 * - Every caller identity is passed explicitly as `sender`
 */

import type { Address, Currency, DomainEvent } from "@flashvault/types";

// =============================================================================
// Collaborators
// =============================================================================

/**
 * A caller that opens a session. The vault invokes onLockAcquired while the
 * session is held; the callback performs its accounting by calling back
 * into the vault with its own address as sender.
 */
export interface Locker<TData = unknown, TResult = unknown> {
  readonly address: Address;
  onLockAcquired(data: TData): TResult;
}

/**
 * The vault's handle on one asset: moves value out of custody and reports
 * what custody currently holds.
 */
export interface CurrencyHandle {
  readonly id: Currency;
  isNative(): boolean;
  /** On-hand balance held by the vault. */
  balanceOfSelf(): bigint;
  /** Move `amount` out of the vault to `to`. */
  transfer(to: Address, amount: bigint): void;
}

/**
 * Multi-asset share (receipt) token bookkeeping used by mint and burn.
 */
export interface ShareTokenLedger {
  issue(to: Address, currency: Currency, amount: bigint): void;
  /**
   * Destroy `amount` shares held by `from`. `spender` is the vault caller;
   * when it differs from `from` the ledger decides whether it may spend.
   */
  redeem(from: Address, currency: Currency, amount: bigint, spender: Address): void;
}

/**
 * Destination for vault domain events. Events are appended before the
 * operation that raised them commits; a throwing append fails the
 * operation. A sink that records its appends with the vault's journal has
 * them taken back when the operation reverts.
 */
export interface EventSink {
  append(streamId: string, events: readonly DomainEvent[]): unknown;
}

// =============================================================================
// Configuration
// =============================================================================

export interface VaultConfig {
  /** Identity allowed to register apps. */
  readonly owner: Address;
}

// =============================================================================
// Snapshot — Serialization
// =============================================================================

export interface AppReserveEntry {
  readonly app: Address;
  readonly currency: Currency;
  readonly amount: string;
}

export interface VaultReserveEntry {
  readonly currency: Currency;
  readonly balance: string;
}

/**
 * Complete vault state between sessions. Settlement deltas are always zero
 * outside a session, so they are not part of it.
 */
export interface VaultSnapshot {
  readonly version: 1;
  readonly config: VaultConfig;
  readonly apps: readonly Address[];
  readonly appReserves: readonly AppReserveEntry[];
  readonly reserves: readonly VaultReserveEntry[];
  readonly savedAt: string;
}

// =============================================================================
// Errors
// =============================================================================

export type VaultErrorCode =
  | "NOT_OWNER"
  | "APP_UNREGISTERED"
  | "NO_LOCKER"
  | "UNKNOWN_CURRENCY"
  | "CURRENCY_EXISTS"
  | "SETTLE_NON_NATIVE_CURRENCY_WITH_VALUE"
  | "SESSION_ACTIVE"
  | "ASYNC_LOCK_CALLBACK"
  | "INVALID_SNAPSHOT";

export class VaultError extends Error {
  public readonly code: VaultErrorCode;
  constructor(code: VaultErrorCode, message: string) {
    super(message);
    this.name = "VaultError";
    this.code = code;
  }
}
