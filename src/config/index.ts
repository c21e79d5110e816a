export { emptyConfig, loadConfig, validateConfig } from "./config-loader.js";
export { DEFAULT_CONFIG_FILE } from "./types.js";
export type { RunConfig } from "./types.js";
