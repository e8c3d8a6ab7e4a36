export { loadConfig, resolveLayout, ConfigSchema, CONFIG_FILE } from "./config.js";
export type { Config, ConfigFile, DataLayout, ResolvedConfig } from "./config.js";
