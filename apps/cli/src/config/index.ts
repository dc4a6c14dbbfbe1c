export { CONFIG_KEYS, DEFAULTS, ENV_MAP } from "./defaults";
export type { ConfigData } from "./defaults";
export {
  readConfigFile,
  writeConfigFile,
  updateConfigFile,
  getConfigDir,
  getConfigPath,
} from "./configFile";
export {
  resolveConfig,
  resolveConfigSources,
  setCliOverride,
  clearCliOverrides,
} from "./resolve";
export type { ConfigSource, ResolvedConfig, ResolvedValue } from "./resolve";
export { loadRuntimeConfig } from "./runtime";
export type { RuntimeConfig } from "./runtime";
export {
  parseDepth,
  parseColor,
  parseEvaluatorName,
  parseLogLevel,
  toPlaySettings,
  VALIDATORS,
} from "./settings";
export type { PlaySettings } from "./settings";
