// src/core/config/index.ts
// Configuration system exports

export {
  type SequenceMode,
  type FormMode,
  type BridgeOptions,
  type BridgeConfig,
  type ConfigOverrides,
  type ConfigValidation,
  RESERVED_SYMBOLS,
  SEQUENCE_MODES,
  FORM_MODES,
  DEFAULT_OPTIONS,
  makeConfig,
  deriveConfig,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
