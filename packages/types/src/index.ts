/**
 * @flashvault/types — Shared domain types for the vault stack.
 *
 * - Identity and amount primitives (Address, Currency, PoolKey, BalanceDelta)
 * - Event architecture (DomainEvent, EventMetadata)
 * - Runtime guards for boundary validation
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Primitives
export type {
  Address,
  Currency,
  PoolKey,
  BalanceDelta,
} from "./primitives.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
} from "./event.js";

// Runtime type guards
export {
  isAddress,
  isCurrency,
  isPoolKey,
  isBalanceDelta,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
