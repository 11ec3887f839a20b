/**
 * @flashvault/ledger — Checked fixed-width integer arithmetic.
 *
 * bigint has no width, so every ledger write goes through these helpers to
 * keep values inside the ranges the ledger promises:
 *
 * - Settlement deltas: signed 128-bit
 * - App reserves, vault reserves, transfer amounts: unsigned 256-bit
 *
 * Rules:
 * - Out-of-range results throw ARITHMETIC_OVERFLOW / ARITHMETIC_UNDERFLOW
 * - Negative unsigned inputs throw INVALID_AMOUNT
 * - No clamping, no wrapping
 */

import { LedgerError } from "./types.js";

// ─── Bounds ──────────────────────────────────────────────────────────────

export const INT128_MAX = (1n << 127n) - 1n;
export const INT128_MIN = -(1n << 127n);
export const UINT256_MAX = (1n << 256n) - 1n;

export function isInt128(value: bigint): boolean {
  return value >= INT128_MIN && value <= INT128_MAX;
}

export function isUint256(value: bigint): boolean {
  return value >= 0n && value <= UINT256_MAX;
}

// ─── Assertions ──────────────────────────────────────────────────────────

/**
 * Assert a caller-supplied amount is a valid unsigned 256-bit value.
 */
export function assertUint256(value: bigint, label = "amount"): bigint {
  if (value < 0n) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `${label} must be non-negative, got ${value.toString()}`,
    );
  }
  if (value > UINT256_MAX) {
    throw new LedgerError(
      "ARITHMETIC_OVERFLOW",
      `${label} exceeds uint256: ${value.toString()}`,
    );
  }
  return value;
}

/**
 * Assert a signed delta fits in 128 bits.
 */
export function assertInt128(value: bigint, label = "delta"): bigint {
  if (!isInt128(value)) {
    throw new LedgerError(
      "ARITHMETIC_OVERFLOW",
      `${label} is outside int128: ${value.toString()}`,
    );
  }
  return value;
}

// ─── Checked Operations ──────────────────────────────────────────────────

/**
 * Add two int128 values. Throws if the sum leaves the int128 range.
 */
export function addInt128(a: bigint, b: bigint): bigint {
  const sum = a + b;
  if (!isInt128(sum)) {
    throw new LedgerError(
      "ARITHMETIC_OVERFLOW",
      `int128 overflow: ${a.toString()} + ${b.toString()}`,
    );
  }
  return sum;
}

/**
 * Add two uint256 values. Throws if the sum exceeds 2^256 - 1.
 */
export function addUint256(a: bigint, b: bigint): bigint {
  const sum = a + b;
  if (sum > UINT256_MAX) {
    throw new LedgerError(
      "ARITHMETIC_OVERFLOW",
      `uint256 overflow: ${a.toString()} + ${b.toString()}`,
    );
  }
  return sum;
}

/**
 * Subtract b from a as uint256. Throws if b > a.
 */
export function subUint256(a: bigint, b: bigint): bigint {
  if (b > a) {
    throw new LedgerError(
      "ARITHMETIC_UNDERFLOW",
      `uint256 underflow: ${a.toString()} - ${b.toString()}`,
    );
  }
  return a - b;
}

/**
 * Narrow an unsigned amount to a signed 128-bit delta.
 *
 * 100n → 100n
 * 2n ** 127n → throws ARITHMETIC_OVERFLOW
 */
export function toInt128(amount: bigint): bigint {
  assertUint256(amount);
  if (amount > INT128_MAX) {
    throw new LedgerError(
      "ARITHMETIC_OVERFLOW",
      `Amount does not fit in int128: ${amount.toString()}`,
    );
  }
  return amount;
}

// ─── String Conversion ───────────────────────────────────────────────────

/**
 * Parse a decimal integer string into a bigint.
 *
 * "100" → 100n
 * "-42" → -42n
 * "1.5" → throws INVALID_AMOUNT
 */
export function parseAmount(amount: string): bigint {
  const trimmed = amount.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid integer amount: "${amount}"`);
  }
  return BigInt(trimmed);
}

/**
 * Format a bigint as a decimal integer string.
 */
export function formatAmount(value: bigint): string {
  return value.toString();
}
