// src/core/config/index.ts
// Configuration system exports

export {
  type ReplConfig,
  type RuntimeConfig,
  type TailschemeConfig,
  type PartialConfig,
  type ConfigValidation,
  DEFAULT_REPL_CONFIG,
  DEFAULT_RUNTIME_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  parseBool,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  parseSimpleYaml,
  validateConfig,
} from "./config";
