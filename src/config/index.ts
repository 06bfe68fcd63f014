export { DEFAULT_CONFIG, loadConfig, mergeConfig, validateConfig } from "./loadConfig";
export * from "./types";
