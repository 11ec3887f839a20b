/**
 * VaultService — Composition root for the domain packages.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. Wires the vault to in-memory custody, a share token
 * ledger and the hash-chained event store, all on the vault's journal.
 */

import {
  CurrencyRegistry,
  InMemoryCustody,
  InMemoryShareTokenLedger,
  Vault,
} from "@flashvault/vault";
import { InMemoryEventStore } from "@flashvault/event-store";
import { Journal } from "@flashvault/ledger";
import type {
  EventStoreIntegrityResult,
  StoredEvent,
  Subscription,
} from "@flashvault/event-store";
import type { CurrencySpec } from "../config.js";

// =============================================================================
// Configuration
// =============================================================================

export interface VaultServiceConfig {
  readonly owner: string;
  readonly currencies: readonly CurrencySpec[];
  /** Called for every event the vault commits. */
  readonly onEvent?: ((event: StoredEvent) => void) | undefined;
}

export interface SessionView {
  readonly locker: string | null;
  readonly unsettledDeltas: number;
}

export interface EventPage {
  readonly data: readonly StoredEvent[];
  readonly pagination: {
    readonly lastPosition: number | null;
    readonly hasMore: boolean;
  };
}

// =============================================================================
// Service
// =============================================================================

export class VaultService {
  readonly vault: Vault;
  readonly custody: InMemoryCustody;
  readonly shares: InMemoryShareTokenLedger;
  readonly currencies: CurrencyRegistry;
  readonly eventStore: InMemoryEventStore;

  private readonly _subscription: Subscription | undefined;

  constructor(config: VaultServiceConfig) {
    const journal = new Journal();
    this.custody = new InMemoryCustody("vault", journal);
    this.currencies = new CurrencyRegistry(
      config.currencies.map((spec) =>
        spec.native
          ? this.custody.nativeCurrency(spec.id)
          : this.custody.tokenCurrency(spec.id),
      ),
    );
    this.shares = new InMemoryShareTokenLedger(journal);
    this.eventStore = new InMemoryEventStore({ journal });

    if (config.onEvent !== undefined) {
      this._subscription = this.eventStore.subscribeAll(config.onEvent);
    }

    this.vault = new Vault({
      config: { owner: config.owner },
      currencies: this.currencies,
      shares: this.shares,
      events: this.eventStore,
      journal,
    });
  }

  // ─── Session ───────────────────────────────────────────────────────

  session(): SessionView {
    return {
      locker: this.vault.getLocker(),
      unsettledDeltas: this.vault.getUnsettledDeltasCount(),
    };
  }

  currencyDelta(settler: string, currency: string): bigint {
    this._requireCurrency(currency);
    return this.vault.currencyDelta(settler, currency);
  }

  // ─── Reserves ──────────────────────────────────────────────────────

  vaultReserve(currency: string): bigint {
    this._requireCurrency(currency);
    return this.vault.reservesOfVault(currency);
  }

  syncReserve(currency: string): bigint {
    return this.vault.sync(currency);
  }

  appReserve(app: string, currency: string): bigint {
    this._requireCurrency(currency);
    return this.vault.reservesOfApp(app, currency);
  }

  // ─── Apps ──────────────────────────────────────────────────────────

  /** Register an app as the vault owner. */
  registerApp(app: string): void {
    this.vault.registerApp(this.vault.owner, app);
  }

  isAppRegistered(app: string): boolean {
    return this.vault.isAppRegistered(app);
  }

  // ─── Events ────────────────────────────────────────────────────────

  readEvents(afterPosition: number, limit: number): EventPage {
    const page = this.eventStore.readAll({ fromPosition: afterPosition + 1, maxCount: limit + 1 });
    const data = page.slice(0, limit);
    const last = data[data.length - 1];
    return {
      data,
      pagination: {
        lastPosition: last?.globalPosition ?? null,
        hasMore: page.length > limit,
      },
    };
  }

  checkIntegrity(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }

  /** Stop forwarding events to the configured callback. */
  close(): void {
    this._subscription?.unsubscribe();
  }

  /** Throws UNKNOWN_CURRENCY for currencies the vault has no handle for. */
  private _requireCurrency(currency: string): void {
    this.currencies.get(currency);
  }
}
