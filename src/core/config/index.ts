// src/core/config/index.ts
// Configuration system exports

export {
  type ProducerErrorPolicy,
  type RuntimeLimits,
  type FlowConfig,
  type LogConfig,
  type MarlConfig,
  type PartialMarlConfig,
  type ConfigValidation,
  DEFAULT_RUNTIME_LIMITS,
  DEFAULT_FLOW_CONFIG,
  DEFAULT_LOG_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  partialConfigFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
