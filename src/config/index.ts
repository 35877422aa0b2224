// Barrel export for commonly used configuration types

export type { BlockArtConfig, RenderDefaults, LoggingConfig, ServerConfig } from "./types";
export { loadConfigOnce, loadConfigFile, resetConfigCache } from "./loader";
export { resolveConfigPath, CONFIG_FILE_NAME } from "./paths";
export { ConfigError } from "./validate";
