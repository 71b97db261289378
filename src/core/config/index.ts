// src/core/config/index.ts
// Configuration system exports

export {
  type DispatchConfig,
  type ConfigValidation,
  ConfigError,
  DEFAULT_DISPATCH_CONFIG,
  partialConfigFromEnv,
  configFromEnv,
  readConfigFile,
  configFromFile,
  partialConfigFromObject,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
