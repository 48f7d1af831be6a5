/**
 * @sla-registry/node — HTTP host for the SLA registry.
 *
 * Package public API; `main.ts` is the executable entry point.
 */

export { RegistryService } from "./services/registry-service.js";
export type { RegistryServiceOptions } from "./services/registry-service.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp, ANONYMOUS_ADMIN } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
