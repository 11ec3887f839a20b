/**
 * @flashvault/event-store — Vault domain event definitions.
 *
 * Naming convention: `vault.<entity>.<action>`
 *
 * Amounts are carried as decimal strings so payloads stay JSON-safe
 * and hash deterministically.
 */

// =============================================================================
// Event Types
// =============================================================================

export const VAULT_EVENTS = {
  APP_REGISTERED: "vault.app.registered",
  SESSION_SETTLED: "vault.session.settled",
  FEE_COLLECTED: "vault.fee.collected",
} as const;

export type VaultEventType = (typeof VAULT_EVENTS)[keyof typeof VAULT_EVENTS];

const VAULT_EVENT_TYPES: ReadonlySet<string> = new Set(Object.values(VAULT_EVENTS));

export function isVaultEventType(type: string): type is VaultEventType {
  return VAULT_EVENT_TYPES.has(type);
}

// =============================================================================
// Payloads
// =============================================================================

export type AppRegisteredPayload = {
  readonly app: string;
};

export type SessionSettledPayload = {
  readonly locker: string;
};

export type FeeCollectedPayload = {
  readonly app: string;
  readonly currency: string;
  readonly amount: string;
  readonly recipient: string;
};

// =============================================================================
// Streams
// =============================================================================

export const SESSION_STREAM = "session";

/** Stream holding every event about a single app. */
export function appStreamId(app: string): string {
  return `app:${app}`;
}
