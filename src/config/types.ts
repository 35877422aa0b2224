import type { Alignment } from "../render/types";
import type { LogLevel } from "../utils/logging/enhanced-logger";

export type RenderDefaults = {
  font?: string; // bundled name or a key of `fonts`
  alignment?: Alignment;
  spacing?: number;
  lineSpacing?: number;
};

export type LoggingConfig = {
  enabled?: boolean;
  level?: LogLevel;
};

export type ServerConfig = {
  port?: number;
};

export type BlockArtConfig = {
  defaults?: RenderDefaults;
  // Named font documents, resolved relative to the working directory
  fonts?: Record<string, string>;
  server?: ServerConfig;
  logging?: LoggingConfig;
};
