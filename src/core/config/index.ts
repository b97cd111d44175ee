// src/core/config/index.ts
// Configuration system exports

export {
  type CompilerConfig,
  type MachineConfig,
  type TmcConfig,
  type PartialConfig,
  type ConfigValidation,
  DEFAULT_COMPILER_CONFIG,
  DEFAULT_MACHINE_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  isBranchMode,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
