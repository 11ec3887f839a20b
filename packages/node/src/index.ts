/**
 * @flashvault/node — HTTP service for the flash-accounting vault.
 *
 * @packageDocumentation
 */

export { VaultService } from "./services/vault-service.js";
export type {
  VaultServiceConfig,
  SessionView,
  EventPage,
} from "./services/vault-service.js";
export { loadConfig, parseApiKeys, parseCurrencies, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey, CurrencySpec } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
