/**
 * Event Types
 *
 * Append-only event architecture.
 * Observable vault state changes are published as DomainEvents.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, why)
 * - Payloads are JSON-safe: amounts travel as decimal strings
 */

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Who or what caused this event */
  readonly actor: string;

  /** ID for grouping events emitted by one atomic unit (e.g. one lock) */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: "vault" | "node";
}

/**
 * A domain event, discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "vault.app.registered") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the store, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
