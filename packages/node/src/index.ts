/**
 * @navledger/node — HTTP surface for the NAV ledger.
 */

export { NavService } from "./services/nav-service.js";
export type { NavServiceConfig } from "./services/nav-service.js";
export { loadConfig, parseApiKeys, toAuthConfig, toServiceConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
