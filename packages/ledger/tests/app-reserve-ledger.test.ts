/**
 * Tests for the App Reserve Ledger.
 *
 * Covers:
 * - Inverted sign convention
 * - Underflow guard (an app cannot pay out more than it holds)
 * - Fee withdrawal
 * - Restore
 */

import { describe, it, expect, beforeEach } from "vitest";
import { AppReserveLedger } from "../src/app-reserve-ledger.js";
import { Journal } from "../src/journal.js";
import { UINT256_MAX, INT128_MIN } from "../src/int-math.js";
import { LedgerError } from "../src/types.js";

const APP = "0xcl-pool-manager";
const OTHER_APP = "0xbin-pool-manager";
const X = "X";
const Y = "Y";

describe("AppReserveLedger", () => {
  let reserves: AppReserveLedger;

  beforeEach(() => {
    reserves = new AppReserveLedger();
  });

  describe("adjustAppReserve", () => {
    it("adds to the reserve for a negative delta", () => {
      reserves.adjustAppReserve(APP, X, -100n);
      expect(reserves.reserveOf(APP, X)).toBe(100n);
    });

    it("subtracts from the reserve for a positive delta", () => {
      reserves.adjustAppReserve(APP, X, -100n);
      reserves.adjustAppReserve(APP, X, 40n);
      expect(reserves.reserveOf(APP, X)).toBe(60n);
    });

    it("allows draining the reserve to exactly zero", () => {
      reserves.adjustAppReserve(APP, X, -20n);
      reserves.adjustAppReserve(APP, X, 20n);
      expect(reserves.reserveOf(APP, X)).toBe(0n);
    });

    it("is a no-op for a zero delta", () => {
      reserves.adjustAppReserve(APP, X, 0n);
      expect(reserves.rows()).toEqual([]);
    });

    it("rejects removing 50 from a reserve of 20 and leaves it unchanged", () => {
      reserves.adjustAppReserve(APP, X, -20n);

      let caught: unknown;
      try {
        reserves.adjustAppReserve(APP, X, 50n);
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(LedgerError);
      expect((caught as LedgerError).code).toBe("ARITHMETIC_UNDERFLOW");
      expect(reserves.reserveOf(APP, X)).toBe(20n);
    });

    it("rejects any positive delta against an empty reserve", () => {
      expect(() => reserves.adjustAppReserve(APP, X, 1n)).toThrow(LedgerError);
    });

    it("keeps apps isolated from each other", () => {
      reserves.adjustAppReserve(APP, X, -100n);
      expect(() => reserves.adjustAppReserve(OTHER_APP, X, 1n)).toThrow(
        "uint256 underflow: 0 - 1",
      );
      expect(reserves.reserveOf(APP, X)).toBe(100n);
    });

    it("keeps currencies isolated from each other", () => {
      reserves.adjustAppReserve(APP, X, -100n);
      expect(reserves.reserveOf(APP, Y)).toBe(0n);
    });

    it("accepts the most negative int128 delta", () => {
      reserves.adjustAppReserve(APP, X, INT128_MIN);
      expect(reserves.reserveOf(APP, X)).toBe(2n ** 127n);
    });

    it("rejects overflow past uint256", () => {
      reserves.restore([{ owner: APP, currency: X, value: UINT256_MAX }]);
      expect(() => reserves.adjustAppReserve(APP, X, -1n)).toThrow(
        /uint256 overflow/,
      );
    });
  });

  describe("withdraw", () => {
    it("removes an unsigned amount", () => {
      reserves.adjustAppReserve(APP, X, -30n);
      reserves.withdraw(APP, X, 12n);
      expect(reserves.reserveOf(APP, X)).toBe(18n);
    });

    it("rejects withdrawing more than the reserve", () => {
      reserves.adjustAppReserve(APP, X, -30n);
      expect(() => reserves.withdraw(APP, X, 31n)).toThrow(LedgerError);
      expect(reserves.reserveOf(APP, X)).toBe(30n);
    });

    it("rejects negative amounts", () => {
      expect(() => reserves.withdraw(APP, X, -1n)).toThrow(
        "amount must be non-negative, got -1",
      );
    });
  });

  describe("restore", () => {
    it("loads rows into an empty ledger", () => {
      reserves.restore([
        { owner: APP, currency: X, value: 7n },
        { owner: OTHER_APP, currency: Y, value: 9n },
      ]);
      expect(reserves.reserveOf(APP, X)).toBe(7n);
      expect(reserves.reserveOf(OTHER_APP, Y)).toBe(9n);
    });

    it("refuses to overwrite existing reserves", () => {
      reserves.adjustAppReserve(APP, X, -1n);
      expect(() => reserves.restore([])).toThrow("App reserve ledger is not empty");
    });
  });

  it("reverts through a shared journal", () => {
    const journal = new Journal();
    const shared = new AppReserveLedger(journal);
    shared.adjustAppReserve(APP, X, -10n);

    expect(() =>
      journal.atomically(() => {
        shared.adjustAppReserve(APP, X, -5n);
        shared.adjustAppReserve(APP, X, 20n);
      }),
    ).toThrow(LedgerError);

    expect(shared.reserveOf(APP, X)).toBe(10n);
  });
});
