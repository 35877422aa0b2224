import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { resolveConfigPath } from "./paths";
import { expandConfig } from "./expansion";
import { ConfigError, parseConfig } from "./validate";
import type { BlockArtConfig } from "./types";
import { configureLogger } from "../utils/logging/enhanced-logger";
import { logDebug } from "../utils/logging/log-helpers";

let cachedConfig: BlockArtConfig | null = null;
let loadingPromise: Promise<BlockArtConfig> | null = null;

/**
 * Read, expand and validate a configuration file
 *
 * @throws ConfigError when the file is unreadable or not JSON, a required variable is unset, or a value is invalid
 */
export async function loadConfigFile(filePath: string): Promise<BlockArtConfig> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${filePath}`, { cause: error });
  }
  let json: unknown;
  try {
    json = JSON.parse(raw) as unknown;
  } catch (error) {
    throw new ConfigError(`Config file ${filePath} is not valid JSON`, { cause: error });
  }
  let expanded: unknown;
  try {
    expanded = expandConfig(json);
  } catch (error) {
    throw new ConfigError(`Config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }
  return parseConfig(expanded);
}

/**
 * Load the configuration once per process. A missing file is not an error:
 * the built-in defaults apply.
 */
export async function loadConfigOnce(configPath?: string): Promise<BlockArtConfig> {
  if (cachedConfig) return cachedConfig;
  if (loadingPromise) return loadingPromise;

  loadingPromise = (async () => {
    try {
      const filePath = configPath ?? resolveConfigPath();
      if (!existsSync(filePath)) {
        logDebug(`No config file at ${filePath}; using defaults`);
        cachedConfig = {};
        return cachedConfig;
      }
      const config = await loadConfigFile(filePath);
      if (config.logging) {
        configureLogger(config.logging);
      }
      logDebug(`Loaded config from ${filePath}`);
      cachedConfig = config;
      return config;
    } finally {
      loadingPromise = null;
    }
  })();

  return loadingPromise;
}

export function getConfigCache(): BlockArtConfig | null {
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
  loadingPromise = null;
}
