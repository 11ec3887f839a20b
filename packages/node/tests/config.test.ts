/**
 * Tests for config.ts — parseApiKeys, parseCurrencies and loadConfig.
 */

import { describe, it, expect } from "vitest";
import { loadConfig, parseApiKeys, parseCurrencies } from "../src/config.js";

// =============================================================================
// parseApiKeys
// =============================================================================

describe("parseApiKeys", () => {
  it("returns empty array for empty string", () => {
    expect(parseApiKeys("")).toEqual([]);
    expect(parseApiKeys("   ")).toEqual([]);
  });

  it("parses comma-separated entries", () => {
    expect(parseApiKeys("k1:admin, k2:viewer ")).toEqual([
      { key: "k1", role: "admin" },
      { key: "k2", role: "viewer" },
    ]);
  });

  it("throws on wrong number of parts", () => {
    expect(() => parseApiKeys("badentry")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys("a:admin:extra")).toThrow("Invalid API_KEYS entry");
  });

  it("throws on empty key", () => {
    expect(() => parseApiKeys(":admin")).toThrow("API key cannot be empty");
  });

  it("throws on invalid role", () => {
    expect(() => parseApiKeys("k1:superuser")).toThrow('Invalid role "superuser"');
  });
});

// =============================================================================
// parseCurrencies
// =============================================================================

describe("parseCurrencies", () => {
  it("parses native and token entries", () => {
    expect(parseCurrencies("ETH:native, USDC:token")).toEqual([
      { id: "ETH", native: true },
      { id: "USDC", native: false },
    ]);
  });

  it("allows a vault without a native currency", () => {
    expect(parseCurrencies("USDC:token")).toEqual([{ id: "USDC", native: false }]);
  });

  it("throws on malformed entries", () => {
    expect(() => parseCurrencies("ETH")).toThrow("Invalid CURRENCIES entry");
    expect(() => parseCurrencies("ETH:coin")).toThrow("Invalid CURRENCIES entry");
    expect(() => parseCurrencies(":token")).toThrow("Invalid CURRENCIES entry");
  });

  it("throws on a second native currency", () => {
    expect(() => parseCurrencies("ETH:native,MATIC:native")).toThrow(
      "CURRENCIES may declare at most one native currency",
    );
  });

  it("throws on duplicates", () => {
    expect(() => parseCurrencies("USDC:token,USDC:token")).toThrow(
      "CURRENCIES contains a duplicate currency",
    );
  });
});

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("returns defaults when env is empty", () => {
    const config = loadConfig({});
    expect(config.PORT).toBe(3000);
    expect(config.HOST).toBe("0.0.0.0");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.API_KEYS).toBe("");
    expect(config.VAULT_OWNER).toBe("owner");
    expect(config.CURRENCIES).toBe("ETH:native,USDC:token");
  });

  it("parses overridden values", () => {
    const config = loadConfig({
      PORT: "8080",
      HOST: "127.0.0.1",
      LOG_LEVEL: "debug",
      NODE_ENV: "production",
      VAULT_OWNER: "0xowner",
    });
    expect(config.PORT).toBe(8080);
    expect(config.HOST).toBe("127.0.0.1");
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.NODE_ENV).toBe("production");
    expect(config.VAULT_OWNER).toBe("0xowner");
  });

  it("throws on invalid values", () => {
    expect(() => loadConfig({ PORT: "0" })).toThrow();
    expect(() => loadConfig({ PORT: "99999" })).toThrow();
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow();
    expect(() => loadConfig({ VAULT_OWNER: "  " })).toThrow();
  });
});
