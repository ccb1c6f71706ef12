/**
 * Library entry point. Embedders usually need only `createAuthModule` and a
 * config from `loadConfig`/`parseConfig`; the adapters are exported for
 * custom wiring.
 */
export * from "./core/index.js";
export * from "./application/dtos/index.js";
export * from "./application/services/index.js";
export {
  type AuthModule,
  type AuthModuleOptions,
  type Storage,
  createAuthModule,
  openStorage,
} from "./bootstrap.js";
export {
  type AppConfig,
  type ConfigSource,
  loadConfig,
  parseConfig,
} from "./infrastructure/config/config.js";
export {
  type LogFormat,
  type LogSink,
  createLogger,
  createSilentLogger,
} from "./infrastructure/logging/logger.js";
export * from "./infrastructure/database/index.js";
export * from "./infrastructure/security/index.js";
export * from "./infrastructure/notifications/index.js";
