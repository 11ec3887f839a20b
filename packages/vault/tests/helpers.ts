/**
 * Shared fixtures for vault tests.
 */

import { InMemoryEventStore } from "@flashvault/event-store";
import { Journal } from "@flashvault/ledger";
import { CurrencyRegistry } from "../src/currency-registry.js";
import { InMemoryCustody } from "../src/in-memory-custody.js";
import { InMemoryShareTokenLedger } from "../src/share-token-ledger.js";
import { Vault } from "../src/vault.js";
import type { Locker } from "../src/types.js";

export const OWNER = "0xowner";
export const APP = "0xcl-pool-manager";
export const OTHER_APP = "0xbin-pool-manager";
export const TRADER = "0xtrader";

export interface Fixture {
  readonly vault: Vault;
  readonly custody: InMemoryCustody;
  readonly shares: InMemoryShareTokenLedger;
  readonly store: InMemoryEventStore;
  readonly currencies: CurrencyRegistry;
  readonly journal: Journal;
}

/**
 * Vault over ETH (native) and USDC (token) in in-memory custody. Custody,
 * shares and the event store share the vault's journal.
 */
export function createFixture(): Fixture {
  const journal = new Journal();
  const custody = new InMemoryCustody("vault", journal);
  const currencies = new CurrencyRegistry([
    custody.nativeCurrency("ETH"),
    custody.tokenCurrency("USDC"),
  ]);
  const shares = new InMemoryShareTokenLedger(journal);
  const store = new InMemoryEventStore({ journal });
  const vault = new Vault({ config: { owner: OWNER }, currencies, shares, events: store, journal });
  return { vault, custody, shares, store, currencies, journal };
}

export function locker<T>(address: string, fn: () => T): Locker<undefined, T> {
  return { address, onLockAcquired: () => fn() };
}

/** Run fn and return the `code` of the error it throws. */
export function codeOf(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (err instanceof Error && "code" in err && typeof err.code === "string") {
      return err.code;
    }
    throw err;
  }
  throw new Error("expected an error with a code");
}
