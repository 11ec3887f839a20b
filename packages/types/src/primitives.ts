/**
 * Vault Primitives
 *
 * Identity and amount types shared by every flashvault package.
 *
 * Rules:
 * - Identities are opaque strings (addresses, service ids)
 * - All amounts are bigint (no floating point, no implicit scaling)
 * - Serialized amounts are decimal integer strings
 */

/**
 * Identity of a caller, app, settler or transfer recipient.
 */
export type Address = string;

/**
 * Identifier of a custodied asset (native asset or fungible token).
 * Whether it is native is decided by the currency handle, not the id.
 */
export type Currency = string;

/**
 * Identifies a two-currency pool managed by an app.
 *
 * The vault only reads `currency0` and `currency1`; the remaining fields
 * identify the pool to the app that owns it.
 */
export interface PoolKey {
  readonly currency0: Currency;
  readonly currency1: Currency;

  /** App that manages the pool */
  readonly poolManager: Address;

  /** Pool fee in hundredths of a basis point */
  readonly fee: number;
}

/**
 * Signed change in two currencies, one component per pool currency.
 *
 * Each component is a signed 128-bit value.
 */
export interface BalanceDelta {
  readonly amount0: bigint;
  readonly amount1: bigint;
}
