export { loadConfig, validateConfig, writeDefaultConfig, normalizeDirPath } from "./loader.js";
export { resolveSetting, toSetting } from "./settings.js";
export { configSchema } from "./schema.js";
export type { RulerelayConfig, SourceDir, TargetDir, FileSpec, Setting } from "./types.js";
export { CONFIG_DEFAULTS } from "./types.js";
