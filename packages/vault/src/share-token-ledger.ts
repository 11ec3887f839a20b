/**
 * In-memory share token ledger.
 *
 * Multi-asset receipt balances (one id per currency) with per-currency
 * allowances and blanket operator approvals. An allowance of UINT256_MAX
 * is never consumed.
 *
 * Every write is recorded with the journal shared with the vault, so a
 * reverted mint or burn takes its issuance or redemption back too.
 */

import type { Address, Currency } from "@flashvault/types";
import { Journal, UINT256_MAX, addUint256, assertUint256, subUint256 } from "@flashvault/ledger";
import type { ShareTokenLedger } from "./types.js";

export type ShareTokenErrorCode = "INSUFFICIENT_BALANCE" | "INSUFFICIENT_ALLOWANCE";

export class ShareTokenError extends Error {
  public readonly code: ShareTokenErrorCode;
  constructor(code: ShareTokenErrorCode, message: string) {
    super(message);
    this.name = "ShareTokenError";
    this.code = code;
  }
}

function pairKey(a: string, b: string): string {
  return `${a}\u0000${b}`;
}

export class InMemoryShareTokenLedger implements ShareTokenLedger {
  private readonly balances = new Map<string, bigint>();
  private readonly supplies = new Map<Currency, bigint>();
  private readonly allowances = new Map<string, bigint>();
  private readonly operators = new Set<string>();
  private readonly journal: Journal;

  constructor(journal: Journal = new Journal()) {
    this.journal = journal;
  }

  issue(to: Address, currency: Currency, amount: bigint): void {
    assertUint256(amount);
    const key = pairKey(to, currency);
    const supply = addUint256(this.totalSupply(currency), amount);
    this.write(this.balances, key, addUint256(this.balanceOf(to, currency), amount));
    this.write(this.supplies, currency, supply);
  }

  redeem(from: Address, currency: Currency, amount: bigint, spender: Address): void {
    assertUint256(amount);

    const held = this.balanceOf(from, currency);
    if (held < amount) {
      throw new ShareTokenError(
        "INSUFFICIENT_BALANCE",
        `${from} holds ${held.toString()} shares of ${currency}, cannot redeem ${amount.toString()}`,
      );
    }

    if (spender !== from && !this.isOperator(from, spender)) {
      const allowed = this.allowance(from, spender, currency);
      if (allowed < amount) {
        throw new ShareTokenError(
          "INSUFFICIENT_ALLOWANCE",
          `${spender} may spend ${allowed.toString()} shares of ${currency} for ${from}, needs ${amount.toString()}`,
        );
      }
      if (allowed !== UINT256_MAX) {
        this.write(this.allowances, pairKey(pairKey(from, spender), currency), allowed - amount);
      }
    }

    this.write(this.balances, pairKey(from, currency), held - amount);
    this.write(this.supplies, currency, subUint256(this.totalSupply(currency), amount));
  }

  approve(owner: Address, spender: Address, currency: Currency, amount: bigint): void {
    assertUint256(amount);
    this.write(this.allowances, pairKey(pairKey(owner, spender), currency), amount);
  }

  setOperator(owner: Address, operator: Address, approved: boolean): void {
    const key = pairKey(owner, operator);
    const was = this.operators.has(key);
    this.journal.record(() => {
      if (was) {
        this.operators.add(key);
      } else {
        this.operators.delete(key);
      }
    });
    if (approved) {
      this.operators.add(key);
    } else {
      this.operators.delete(key);
    }
  }

  balanceOf(owner: Address, currency: Currency): bigint {
    return this.balances.get(pairKey(owner, currency)) ?? 0n;
  }

  allowance(owner: Address, spender: Address, currency: Currency): bigint {
    return this.allowances.get(pairKey(pairKey(owner, spender), currency)) ?? 0n;
  }

  isOperator(owner: Address, operator: Address): boolean {
    return this.operators.has(pairKey(owner, operator));
  }

  totalSupply(currency: Currency): bigint {
    return this.supplies.get(currency) ?? 0n;
  }

  private write<K>(map: Map<K, bigint>, key: K, value: bigint): void {
    const existed = map.has(key);
    const prior = map.get(key) ?? 0n;
    this.journal.record(() => {
      if (existed) {
        map.set(key, prior);
      } else {
        map.delete(key);
      }
    });
    map.set(key, value);
  }
}
