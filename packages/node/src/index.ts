/**
 * @pledgebook/node — HTTP surface for the contribution ledger.
 *
 * Package public API. The server itself starts from main.ts.
 */

export { FundService } from "./services/fund-service.js";
export type { FundServiceConfig, FeedStatus } from "./services/fund-service.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
