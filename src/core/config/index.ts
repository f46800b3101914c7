// src/core/config/index.ts
// Configuration system exports

export {
  type CompilerSettings,
  type SableConfig,
  type ConfigLayer,
  type LoadConfigOptions,
  DEFAULT_COMPILER_SETTINGS,
  DEFAULT_VM_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  parseSimpleYaml,
  validateConfig,
} from "./config";
