import { getLogger, type LogContext } from "./enhanced-logger";

/**
 * Shortcuts over the shared logger instance
 */

export function logInfo(message: string, data?: unknown, context?: LogContext): void {
  getLogger().info(message, data, context);
}

export function logError(message: string, error?: unknown, context?: LogContext): void {
  getLogger().error(message, error, context);
}

export function logWarn(message: string, data?: unknown, context?: LogContext): void {
  getLogger().warn(message, data, context);
}

export function logDebug(message: string, data?: unknown, context?: LogContext): void {
  getLogger().debug(message, data, context);
}
