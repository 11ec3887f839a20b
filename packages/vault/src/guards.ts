/**
 * Runtime guard for persisted vault snapshots.
 *
 * Checks shape only; amount strings are parsed (and rejected) on restore.
 */

import { isAddress, isCurrency } from "@flashvault/types";
import type { AppReserveEntry, VaultReserveEntry, VaultSnapshot } from "./types.js";

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isAppReserveEntry(value: unknown): value is AppReserveEntry {
  if (!isRecord(value)) return false;
  return isAddress(value.app) && isCurrency(value.currency) && typeof value.amount === "string";
}

function isVaultReserveEntry(value: unknown): value is VaultReserveEntry {
  if (!isRecord(value)) return false;
  return isCurrency(value.currency) && typeof value.balance === "string";
}

export function isVaultSnapshot(value: unknown): value is VaultSnapshot {
  if (!isRecord(value)) return false;
  return (
    value.version === 1 &&
    isRecord(value.config) &&
    isAddress(value.config.owner) &&
    Array.isArray(value.apps) &&
    value.apps.every(isAddress) &&
    Array.isArray(value.appReserves) &&
    value.appReserves.every(isAppReserveEntry) &&
    Array.isArray(value.reserves) &&
    value.reserves.every(isVaultReserveEntry) &&
    typeof value.savedAt === "string"
  );
}
