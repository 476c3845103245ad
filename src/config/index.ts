// src/config/index.ts
// Configuration system exports

export {
  type ServerConfig,
  type ExportConfig,
  type ReflectKitConfig,
  type PartialConfig,
  type ConfigValidation,
  DEFAULT_SERVER_CONFIG,
  DEFAULT_EXPORT_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
