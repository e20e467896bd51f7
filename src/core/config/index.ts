// src/core/config/index.ts
// Configuration system exports

export {
  type LogLevel,
  type TierConfig,
  type ReactiveConfig,
  type ConcurrencyConfig,
  type EngineConfig,
  type PartialEngineConfig,
  type ConfigValidation,
  type LoadConfigOptions,
  DEFAULT_TIER_CONFIG,
  DEFAULT_REACTIVE_CONFIG,
  DEFAULT_CONCURRENCY_CONFIG,
  DEFAULT_CONFIG,
  configFromEnv,
  configFromFile,
  configFromObject,
  partialConfigFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
  assertValidConfig,
} from "./config";
