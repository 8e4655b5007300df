// src/core/config/index.ts
// Configuration system exports

export {
  type SequenceConfig,
  type ConfigValidation,
  DEFAULT_SEQUENCE_CONFIG,
  DEFAULT_CONFIG_FILES,
  createSequenceConfig,
  configFromEnv,
  configFromFile,
  configFromObject,
  partialConfigFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
