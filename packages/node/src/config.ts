/**
 * @flashvault/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { Role } from "./types/auth.js";
import { isRole } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),

  // Vault
  VAULT_OWNER: z.string().trim().min(1).default("owner"),
  CURRENCIES: z.string().default("ETH:native,USDC:token"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly role: Role;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1,key2:role2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  return raw.split(",").map((entry) => {
    const [key, role, ...rest] = entry.trim().split(":");
    if (key === undefined || role === undefined || rest.length > 0) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role`,
      );
    }
    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isRole(role)) {
      throw new Error(`Invalid role "${role}" in API_KEYS. Must be: admin or viewer`);
    }
    return { key, role };
  });
}

// =============================================================================
// Currency Parsing
// =============================================================================

export interface CurrencySpec {
  readonly id: string;
  readonly native: boolean;
}

/**
 * Parse the CURRENCIES env var.
 *
 * Format: "ETH:native,USDC:token". At most one currency may be native.
 */
export function parseCurrencies(raw: string): readonly CurrencySpec[] {
  const specs = raw
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry !== "")
    .map((entry) => {
      const [id, kind, ...rest] = entry.split(":");
      if (id === undefined || id === "" || rest.length > 0 || (kind !== "native" && kind !== "token")) {
        throw new Error(
          `Invalid CURRENCIES entry: "${entry}". Expected format: ID:native or ID:token`,
        );
      }
      return { id, native: kind === "native" };
    });

  if (specs.filter((s) => s.native).length > 1) {
    throw new Error("CURRENCIES may declare at most one native currency");
  }
  const ids = new Set(specs.map((s) => s.id));
  if (ids.size !== specs.length) {
    throw new Error("CURRENCIES contains a duplicate currency");
  }
  return specs;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
