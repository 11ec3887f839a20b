/**
 * Runtime Type Guards
 *
 * Narrowing functions for vault domain types.
 * Used at system boundaries (HTTP input, snapshots, collaborator results).
 */

import type { Address, BalanceDelta, Currency, PoolKey } from "./primitives.js";
import type { DomainEvent, EventMetadata } from "./event.js";

// =============================================================================
// Primitive guards
// =============================================================================

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && value.trim().length > 0;
}

export function isCurrency(value: unknown): value is Currency {
  return typeof value === "string" && value.trim().length > 0;
}

export function isPoolKey(value: unknown): value is PoolKey {
  if (value === null || typeof value !== "object") return false;
  const v: Readonly<Record<string, unknown>> = { ...value };
  return (
    isCurrency(v.currency0) &&
    isCurrency(v.currency1) &&
    isAddress(v.poolManager) &&
    typeof v.fee === "number" &&
    Number.isInteger(v.fee) &&
    v.fee >= 0
  );
}

export function isBalanceDelta(value: unknown): value is BalanceDelta {
  if (value === null || typeof value !== "object") return false;
  const v: Readonly<Record<string, unknown>> = { ...value };
  return typeof v.amount0 === "bigint" && typeof v.amount1 === "bigint";
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["vault", "node"]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v: Readonly<Record<string, unknown>> = { ...value };
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    typeof v.source === "string" &&
    EVENT_SOURCES.has(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v: Readonly<Record<string, unknown>> = { ...value };
  return (
    typeof v.type === "string" &&
    v.type.length > 0 &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
