/**
 * Vault — flash-accounting coordinator.
 *
 * Composes:
 * - SettlementLedger (session slot + per-settler signed deltas)
 * - AppReserveLedger (per-app claims on custodied funds)
 * - ReserveStore (last-synced on-hand balances)
 * - CurrencyRegistry / ShareTokenLedger (external asset movement)
 *
 * All stores share one write journal, and so do the collaborators built
 * on the same journal (custody, share ledger, event store). Every public
 * mutation runs as an atomic unit: it either completes, or every write it
 * made is undone and its events are dropped. A session (lock) is the
 * outermost such unit, so a failure anywhere in the callback rolls back
 * the whole session, including the acquisition.
 *
 * Events are appended to the sink inside the outermost unit, just before
 * it commits.
 */

import { randomUUID } from "node:crypto";
import type {
  Address,
  BalanceDelta,
  Currency,
  DomainEvent,
  PoolKey,
} from "@flashvault/types";
import { isBalanceDelta, isCurrency, isPoolKey } from "@flashvault/types";
import {
  AppReserveLedger,
  Journal,
  ReserveStore,
  SettlementLedger,
  assertUint256,
  parseAmount,
  subUint256,
  toInt128,
} from "@flashvault/ledger";
import { SESSION_STREAM, VAULT_EVENTS, appStreamId } from "@flashvault/event-store";
import type {
  AppRegisteredPayload,
  FeeCollectedPayload,
  SessionSettledPayload,
} from "@flashvault/event-store";
import type { CurrencyRegistry } from "./currency-registry.js";
import type {
  CurrencyHandle,
  EventSink,
  Locker,
  ShareTokenLedger,
  VaultConfig,
  VaultSnapshot,
} from "./types.js";
import { VaultError } from "./types.js";
import { isVaultSnapshot } from "./guards.js";

// =============================================================================
// Options
// =============================================================================

export interface VaultOptions {
  readonly config: VaultConfig;
  readonly currencies: CurrencyRegistry;
  readonly shares: ShareTokenLedger;
  /** Receives the events of each outermost unit before it commits. */
  readonly events?: EventSink | undefined;
  /**
   * Write journal shared with collaborators whose effects must roll back
   * with the vault. Default: a private journal.
   */
  readonly journal?: Journal | undefined;
  readonly now?: (() => Date) | undefined;
}

export interface SettleOptions {
  /** Native value attached to the call. */
  readonly value?: bigint | undefined;
}

interface PendingEvent {
  readonly streamId: string;
  readonly event: DomainEvent;
}

// =============================================================================
// Vault
// =============================================================================

export class Vault {
  readonly config: VaultConfig;
  private readonly currencies: CurrencyRegistry;
  private readonly shares: ShareTokenLedger;
  private readonly events: EventSink | undefined;
  private readonly now: () => Date;

  private readonly journal: Journal;
  private readonly settlement: SettlementLedger;
  private readonly appReserves: AppReserveLedger;
  private readonly reserves: ReserveStore;
  private readonly apps = new Set<Address>();

  private readonly pending: PendingEvent[] = [];
  private correlationId = "";

  constructor(options: VaultOptions) {
    this.config = options.config;
    this.currencies = options.currencies;
    this.shares = options.shares;
    this.events = options.events;
    this.now = options.now ?? (() => new Date());
    this.journal = options.journal ?? new Journal();

    this.settlement = new SettlementLedger(this.journal);
    this.appReserves = new AppReserveLedger(this.journal);
    this.reserves = new ReserveStore(this.journal);
  }

  get owner(): Address {
    return this.config.owner;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Administration
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Grant `app` permission to account balance deltas. Owner only;
   * registering twice is harmless and emits again.
   */
  registerApp(sender: Address, app: Address): void {
    this.atomically(() => {
      if (sender !== this.config.owner) {
        throw new VaultError("NOT_OWNER", `Only the owner may register apps, not "${sender}"`);
      }
      if (!this.apps.has(app)) {
        this.apps.add(app);
        this.journal.record(() => this.apps.delete(app));
      }
      this.emit<AppRegisteredPayload>(appStreamId(app), VAULT_EVENTS.APP_REGISTERED, sender, {
        app,
      });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Session
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Open a session for `locker`, run its callback, and close the session
   * once every settlement delta is back to zero. Returns the callback's
   * result unchanged.
   *
   * The callback must finish synchronously: a returned promise is
   * rejected with ASYNC_LOCK_CALLBACK and the session is rolled back.
   */
  lock<TData, TResult>(locker: Locker<TData, TResult>, data: TData): TResult {
    return this.atomically(() => {
      this.settlement.acquireSession(locker.address);
      const result = locker.onLockAcquired(data);
      if (isThenable(result)) {
        throw new VaultError(
          "ASYNC_LOCK_CALLBACK",
          `Lock callback of "${locker.address}" returned a promise`,
        );
      }
      this.settlement.releaseSession();
      this.emit<SessionSettledPayload>(SESSION_STREAM, VAULT_EVENTS.SESSION_SETTLED, locker.address, {
        locker: locker.address,
      });
      return result;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // App accounting
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Record a two-currency delta for the calling app on behalf of `settler`.
   *
   * Sign convention: a positive component means the app pays out, so its
   * reserve shrinks while the settler's delta grows by the same amount.
   */
  accountAppBalanceDelta(
    sender: Address,
    key: PoolKey,
    delta: BalanceDelta,
    settler: Address,
  ): void;
  /**
   * Single-currency form.
   */
  accountAppBalanceDelta(
    sender: Address,
    currency: Currency,
    delta: bigint,
    settler: Address,
  ): void;
  accountAppBalanceDelta(
    sender: Address,
    target: PoolKey | Currency,
    delta: BalanceDelta | bigint,
    settler: Address,
  ): void {
    const legs = legsOf(target, delta);
    this.atomically(() => {
      this.requireLocked();
      this.requireApp(sender);
      for (const [currency, amount] of legs) {
        this.appReserves.adjustAppReserve(sender, currency, amount);
      }
      for (const [currency, amount] of legs) {
        this.settlement.accountDelta(settler, currency, amount);
      }
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Session-holder operations
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Withdraw `amount` of `currency` to `to`, leaving the caller owing it
   * until settled. A non-native snapshot drops by the same amount, so the
   * funds count as paid once they come back.
   */
  take(sender: Address, currency: Currency, to: Address, amount: bigint): void {
    this.atomically(() => {
      this.requireLocked();
      const handle = this.currencies.get(currency);
      this.settlement.accountDelta(sender, currency, -toInt128(amount));
      this.payOut(handle, to, amount);
    });
  }

  /**
   * Like take, but issues share tokens instead of moving the asset.
   */
  mint(sender: Address, to: Address, currency: Currency, amount: bigint): void {
    this.atomically(() => {
      this.requireLocked();
      this.settlement.accountDelta(sender, currency, -toInt128(amount));
      this.shares.issue(to, currency, amount);
    });
  }

  /**
   * Redeem share tokens held by `from`, crediting the caller.
   */
  burn(sender: Address, from: Address, currency: Currency, amount: bigint): void {
    this.atomically(() => {
      this.requireLocked();
      this.settlement.accountDelta(sender, currency, toInt128(amount));
      this.shares.redeem(from, currency, amount, sender);
    });
  }

  /**
   * Credit the caller with what it paid in. For the native currency that
   * is the attached value; otherwise it is the growth of the vault's
   * on-hand balance since the last sync.
   */
  settle(sender: Address, currency: Currency, options: SettleOptions = {}): bigint {
    return this.atomically(() => {
      this.requireLocked();
      const handle = this.currencies.get(currency);
      const value = assertUint256(options.value ?? 0n, "value");

      let paid: bigint;
      if (handle.isNative()) {
        paid = value;
      } else {
        if (value > 0n) {
          throw new VaultError(
            "SETTLE_NON_NATIVE_CURRENCY_WITH_VALUE",
            `Cannot attach native value ${value.toString()} to settlement of "${currency}"`,
          );
        }
        const prior = this.reserves.reserveOf(currency);
        paid = subUint256(this.record(handle), prior);
      }

      this.settlement.accountDelta(sender, currency, toInt128(paid));
      return paid;
    });
  }

  /**
   * Snapshot the vault's on-hand balance of `currency`. Open to anyone.
   */
  sync(currency: Currency): bigint {
    return this.atomically(() => this.record(this.currencies.get(currency)));
  }

  /**
   * Pay out fees accrued in the calling app's reserve. Works outside a
   * session.
   */
  collectFee(sender: Address, currency: Currency, amount: bigint, recipient: Address): void {
    this.atomically(() => {
      this.requireApp(sender);
      const handle = this.currencies.get(currency);
      this.appReserves.withdraw(sender, currency, amount);
      this.payOut(handle, recipient, amount);
      this.emit<FeeCollectedPayload>(appStreamId(sender), VAULT_EVENTS.FEE_COLLECTED, sender, {
        app: sender,
        currency,
        amount: amount.toString(),
        recipient,
      });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Reads
  // ───────────────────────────────────────────────────────────────────────

  getLocker(): Address | null {
    return this.settlement.currentHolder();
  }

  getUnsettledDeltasCount(): number {
    return this.settlement.outstandingCount();
  }

  currencyDelta(settler: Address, currency: Currency): bigint {
    return this.settlement.deltaOf(settler, currency);
  }

  reservesOfVault(currency: Currency): bigint {
    return this.reserves.reserveOf(currency);
  }

  reservesOfApp(app: Address, currency: Currency): bigint {
    return this.appReserves.reserveOf(app, currency);
  }

  isAppRegistered(app: Address): boolean {
    return this.apps.has(app);
  }

  listApps(): readonly Address[] {
    return [...this.apps];
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot (persistence)
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Capture the vault's persistent state. Not allowed mid-session.
   */
  snapshot(): VaultSnapshot {
    const holder = this.settlement.currentHolder();
    if (holder !== null) {
      throw new VaultError("SESSION_ACTIVE", `Cannot snapshot while "${holder}" holds the session`);
    }
    return {
      version: 1,
      config: this.config,
      apps: this.listApps(),
      appReserves: this.appReserves.rows().map((row) => ({
        app: row.owner,
        currency: row.currency,
        amount: row.value.toString(),
      })),
      reserves: this.reserves.rows().map((row) => ({
        currency: row.currency,
        balance: row.balance.toString(),
      })),
      savedAt: this.now().toISOString(),
    };
  }

  /**
   * Rebuild a vault from a snapshot (typically parsed JSON), wired to
   * fresh collaborators.
   */
  static fromSnapshot(snapshot: unknown, options: Omit<VaultOptions, "config">): Vault {
    if (!isVaultSnapshot(snapshot)) {
      const version =
        snapshot !== null && typeof snapshot === "object" && "version" in snapshot
          ? snapshot.version
          : undefined;
      throw new VaultError(
        "INVALID_SNAPSHOT",
        version !== 1
          ? `Unsupported snapshot version: ${String(version)}`
          : "Snapshot does not match the expected shape",
      );
    }

    const vault = new Vault({ ...options, config: snapshot.config });
    for (const app of snapshot.apps) {
      vault.apps.add(app);
    }
    vault.appReserves.restore(
      snapshot.appReserves.map((entry) => ({
        owner: entry.app,
        currency: entry.currency,
        value: parseAmount(entry.amount),
      })),
    );
    vault.reserves.restore(
      snapshot.reserves.map((entry) => ({
        currency: entry.currency,
        balance: parseAmount(entry.balance),
      })),
    );
    return vault;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private requireLocked(): void {
    if (this.settlement.currentHolder() === null) {
      throw new VaultError("NO_LOCKER", "No session is active");
    }
  }

  private requireApp(sender: Address): void {
    if (!this.apps.has(sender)) {
      throw new VaultError("APP_UNREGISTERED", `App "${sender}" is not registered`);
    }
  }

  private payOut(handle: CurrencyHandle, to: Address, amount: bigint): void {
    handle.transfer(to, amount);
    if (!handle.isNative()) {
      this.reserves.decrease(handle.id, amount);
    }
  }

  private record(handle: CurrencyHandle): bigint {
    const balance = handle.balanceOfSelf();
    this.reserves.record(handle.id, balance);
    return balance;
  }

  private emit<TPayload extends Readonly<Record<string, unknown>>>(
    streamId: string,
    type: string,
    actor: Address,
    payload: TPayload,
  ): void {
    this.pending.push({
      streamId,
      event: {
        type,
        metadata: {
          eventId: randomUUID(),
          timestamp: this.now().toISOString(),
          actor,
          correlationId: this.correlationId,
          source: "vault",
        },
        payload,
      },
    });
    this.journal.record(() => {
      this.pending.pop();
    });
  }

  /**
   * Run fn as an atomic unit. The outermost unit delivers its queued
   * events as its last step, so a failing sink reverts it.
   */
  private atomically<T>(fn: () => T): T {
    if (this.journal.depth > 0) {
      return this.journal.atomically(fn);
    }
    this.correlationId = randomUUID();
    return this.journal.atomically(() => {
      const result = fn();
      this.flush();
      return result;
    });
  }

  private flush(): void {
    if (this.events !== undefined) {
      for (const { streamId, event } of this.pending) {
        this.events.append(streamId, [event]);
      }
    }
    this.pending.length = 0;
  }
}

// =============================================================================
// Helpers
// =============================================================================

function legsOf(
  target: PoolKey | Currency,
  delta: BalanceDelta | bigint,
): readonly (readonly [Currency, bigint])[] {
  if (typeof target === "string") {
    if (!isCurrency(target)) {
      throw new TypeError("A currency must be a non-empty string");
    }
    if (typeof delta !== "bigint") {
      throw new TypeError("A single-currency delta must be a bigint");
    }
    return [[target, delta]];
  }
  if (!isPoolKey(target)) {
    throw new TypeError(
      "A pool key needs two currencies, a pool manager and a non-negative integer fee",
    );
  }
  if (!isBalanceDelta(delta)) {
    throw new TypeError("A pool delta must be a BalanceDelta");
  }
  return [
    [target.currency0, delta.amount0],
    [target.currency1, delta.amount1],
  ];
}

function isThenable(value: unknown): boolean {
  return (
    typeof value === "object" &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}
