/**
 * In-memory custody.
 *
 * Simulates the assets behind the vault: what the vault holds on hand and
 * what external holders own. Handles produced here are what the vault's
 * CurrencyRegistry resolves to in tests and in the HTTP service.
 *
 * Balance writes go through the journal it shares with the vault, so a
 * reverted vault operation also reverts the transfers it made.
 */

import type { Address, Currency } from "@flashvault/types";
import { Journal, addUint256, assertUint256, subUint256 } from "@flashvault/ledger";
import type { CurrencyHandle } from "./types.js";

export type CustodyErrorCode =
  | "UNKNOWN_CURRENCY"
  | "CURRENCY_EXISTS"
  | "INSUFFICIENT_CUSTODY"
  | "INSUFFICIENT_FUNDS";

export class CustodyError extends Error {
  public readonly code: CustodyErrorCode;
  constructor(code: CustodyErrorCode, message: string) {
    super(message);
    this.name = "CustodyError";
    this.code = code;
  }
}

export class InMemoryCustody {
  /** Identity under which the vault's own holdings are kept. */
  readonly address: Address;
  private readonly balances = new Map<Currency, Map<Address, bigint>>();
  private readonly native = new Set<Currency>();
  private readonly journal: Journal;

  constructor(address: Address = "vault", journal: Journal = new Journal()) {
    this.address = address;
    this.journal = journal;
  }

  nativeCurrency(id: Currency): CurrencyHandle {
    this.addCurrency(id);
    this.native.add(id);
    return this.handle(id);
  }

  tokenCurrency(id: Currency): CurrencyHandle {
    this.addCurrency(id);
    return this.handle(id);
  }

  /**
   * Credit an external holder out of thin air (a faucet for tests and demos).
   */
  fund(holder: Address, currency: Currency, amount: bigint): void {
    assertUint256(amount);
    this.credit(holder, currency, amount);
  }

  /**
   * Move value into the vault. With `from`, the holder must own it;
   * without, the vault balance simply grows (e.g. a native value attached
   * to a call).
   */
  deposit(currency: Currency, amount: bigint, from?: Address): void {
    assertUint256(amount);
    if (from !== undefined) {
      this.debit(from, currency, amount, "INSUFFICIENT_FUNDS");
    }
    this.credit(this.address, currency, amount);
  }

  balanceOf(holder: Address, currency: Currency): bigint {
    return this.book(currency).get(holder) ?? 0n;
  }

  vaultBalance(currency: Currency): bigint {
    return this.balanceOf(this.address, currency);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private handle(id: Currency): CurrencyHandle {
    return {
      id,
      isNative: () => this.native.has(id),
      balanceOfSelf: () => this.vaultBalance(id),
      transfer: (to, amount) => {
        this.debit(this.address, id, amount, "INSUFFICIENT_CUSTODY");
        this.credit(to, id, amount);
      },
    };
  }

  private debit(
    holder: Address,
    currency: Currency,
    amount: bigint,
    code: "INSUFFICIENT_CUSTODY" | "INSUFFICIENT_FUNDS",
  ): void {
    assertUint256(amount);
    const book = this.book(currency);
    const held = book.get(holder) ?? 0n;
    if (held < amount) {
      throw new CustodyError(
        code,
        `${holder} holds ${held.toString()} ${currency}, cannot move ${amount.toString()}`,
      );
    }
    this.write(book, holder, subUint256(held, amount));
  }

  private credit(holder: Address, currency: Currency, amount: bigint): void {
    const book = this.book(currency);
    this.write(book, holder, addUint256(book.get(holder) ?? 0n, amount));
  }

  private write(book: Map<Address, bigint>, holder: Address, value: bigint): void {
    const existed = book.has(holder);
    const prior = book.get(holder) ?? 0n;
    this.journal.record(() => {
      if (existed) {
        book.set(holder, prior);
      } else {
        book.delete(holder);
      }
    });
    book.set(holder, value);
  }

  private addCurrency(id: Currency): void {
    if (this.balances.has(id)) {
      throw new CustodyError("CURRENCY_EXISTS", `Currency '${id}' already exists`);
    }
    this.balances.set(id, new Map());
  }

  private book(currency: Currency): Map<Address, bigint> {
    const book = this.balances.get(currency);
    if (!book) {
      throw new CustodyError("UNKNOWN_CURRENCY", `Unknown currency '${currency}'`);
    }
    return book;
  }
}
