import { isAlignment } from "../render/types";
import { isLogLevel } from "../utils/logging/enhanced-logger";
import type { BlockArtConfig, LoggingConfig, RenderDefaults, ServerConfig } from "./types";

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export const CONFIG_SECTIONS = ["defaults", "fonts", "server", "logging"] as const;

export type ConfigSection = (typeof CONFIG_SECTIONS)[number];

export function isConfigSection(value: string): value is ConfigSection {
  return CONFIG_SECTIONS.some((s) => s === value);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === "object" && !Array.isArray(v);
}

function isCount(v: unknown): v is number {
  return typeof v === "number" && Number.isInteger(v) && v >= 0;
}

function optional<T>(
  obj: Record<string, unknown>,
  key: string,
  guard: (v: unknown) => v is T,
  expected: string,
  where: string
): T | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (!guard(value)) throw new ConfigError(`${where}.${key} must be ${expected}`);
  return value;
}

const isString = (v: unknown): v is string => typeof v === "string";
const isBoolean = (v: unknown): v is boolean => typeof v === "boolean";
const isPort = (v: unknown): v is number => typeof v === "number" && Number.isInteger(v) && v > 0 && v < 65536;

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (!isRecord(value)) throw new ConfigError(`${key} must be an object`);
  return value;
}

function parseDefaults(raw: Record<string, unknown>): RenderDefaults {
  return {
    font: optional(raw, "font", isString, "a string", "defaults"),
    alignment: optional(raw, "alignment", isAlignment, `"left", "center" or "right"`, "defaults"),
    spacing: optional(raw, "spacing", isCount, "a non-negative integer", "defaults"),
    lineSpacing: optional(raw, "lineSpacing", isCount, "a non-negative integer", "defaults"),
  };
}

function parseFonts(raw: Record<string, unknown>): Record<string, string> {
  const fonts: Record<string, string> = {};
  for (const [name, filePath] of Object.entries(raw)) {
    if (typeof filePath !== "string") throw new ConfigError(`fonts.${name} must be a path string`);
    fonts[name] = filePath;
  }
  return fonts;
}

function parseServer(raw: Record<string, unknown>): ServerConfig {
  return { port: optional(raw, "port", isPort, "a TCP port number", "server") };
}

function parseLogging(raw: Record<string, unknown>): LoggingConfig {
  return {
    enabled: optional(raw, "enabled", isBoolean, "a boolean", "logging"),
    level: optional(raw, "level", isLogLevel, `one of "debug", "info", "warn", "error", "silent"`, "logging"),
  };
}

/**
 * Check a parsed configuration file and narrow it to `BlockArtConfig`
 *
 * @throws ConfigError naming the first offending key
 */
export function parseConfig(raw: unknown): BlockArtConfig {
  if (!isRecord(raw)) throw new ConfigError("Configuration must be a JSON object");
  const config: BlockArtConfig = {};
  const defaults = section(raw, "defaults");
  if (defaults) config.defaults = parseDefaults(defaults);
  const fonts = section(raw, "fonts");
  if (fonts) config.fonts = parseFonts(fonts);
  const server = section(raw, "server");
  if (server) config.server = parseServer(server);
  const logging = section(raw, "logging");
  if (logging) config.logging = parseLogging(logging);
  return config;
}
