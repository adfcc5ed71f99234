/**
 * @notevault/node — HTTP host for the note ledger.
 *
 * @packageDocumentation
 */

export { VaultService } from "./services/vault-service.js";
export type { VaultServiceConfig } from "./services/vault-service.js";
export { loadConfig, parseApiKeys, parseBalances, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
