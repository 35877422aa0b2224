export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogContext = {
  requestId?: string;
  command?: string;
};

export type LoggerOptions = {
  enabled?: boolean;
  level?: LogLevel;
};

type LogWriter = (line: string, data?: unknown) => void;

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Console logger that writes to stderr, leaving stdout for rendered output
 */
export class Logger {
  private enabled: boolean;
  private level: LogLevel;
  private readonly write: LogWriter;

  constructor(options: LoggerOptions = {}, write: LogWriter = defaultWriter) {
    this.enabled = options.enabled ?? true;
    this.level = options.level ?? "warn";
    this.write = write;
  }

  configure(options: LoggerOptions): void {
    if (options.enabled !== undefined) this.enabled = options.enabled;
    if (options.level !== undefined) this.level = options.level;
  }

  isEnabledFor(level: Exclude<LogLevel, "silent">): boolean {
    return this.enabled && LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string, data?: unknown, context?: LogContext): void {
    this.log("debug", message, data, context);
  }

  info(message: string, data?: unknown, context?: LogContext): void {
    this.log("info", message, data, context);
  }

  warn(message: string, data?: unknown, context?: LogContext): void {
    this.log("warn", message, data, context);
  }

  error(message: string, data?: unknown, context?: LogContext): void {
    this.log("error", message, data, context);
  }

  private log(level: Exclude<LogLevel, "silent">, message: string, data?: unknown, context?: LogContext): void {
    if (!this.isEnabledFor(level)) return;
    const parts = [`[${level.toUpperCase()}]`];
    if (context?.requestId) parts.push(`[req ${context.requestId}]`);
    if (context?.command) parts.push(`[${context.command}]`);
    parts.push(message);
    this.write(parts.join(" "), data);
  }
}

function defaultWriter(line: string, data?: unknown): void {
  if (data === undefined) console.error(line);
  else console.error(line, data);
}

function levelFromEnv(): LogLevel | undefined {
  const fromEnv = process.env.BLOCKART_LOG_LEVEL;
  if (isLogLevel(fromEnv)) return fromEnv;
  if (process.env.DEBUG === "true") return "debug";
  return undefined;
}

let instance: Logger | null = null;

export function getLogger(): Logger {
  if (!instance) instance = new Logger({ level: levelFromEnv() });
  return instance;
}

// BLOCKART_LOG_LEVEL / DEBUG take precedence over the configured level
export function configureLogger(options: LoggerOptions): void {
  const envLevel = levelFromEnv();
  getLogger().configure({ ...options, level: envLevel ?? options.level });
}
