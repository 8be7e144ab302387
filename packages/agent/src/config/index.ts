export { DEFAULT_CONFIG_PATH, configCandidates, loadConfig, normalizeConfig, parseConfig } from "./loader.js";
export { mergeConfigs } from "./merge.js";
export { ConfigFile } from "./schema.js";
export type { AgentConfig } from "./schema.js";
