export { CONFIG_FILE_NAME, DEFAULT_CONFIG, applyEnv, loadConfig, parseConfig } from "./config.js";
export type { ConfigEnv, LoadConfigOptions, NekoMaidConfig } from "./config.js";
export { CONFIG_SCHEMA } from "./schema.js";
export type { ConfigFile } from "./schema.js";
export { loadStyleGuides } from "./style-guides.js";
export type { LoadStyleGuidesOptions } from "./style-guides.js";
