/**
 * Configurable Logger
 *
 * Console logger with level filtering and an optional custom handler.
 * Every line is tagged with a component prefix, e.g. `[poller]`.
 */

// ============================================
// Types
// ============================================

export const LOG_LEVEL_NAMES = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

export type LogHandler = (
  level: LogLevel,
  message: string,
  meta?: Record<string, unknown>
) => void;

export interface LoggerConfig {
  /** Enable/disable logging (default: true outside tests) */
  enabled?: boolean;
  /** Minimum log level to output */
  level?: LogLevel;
  /** Tag prepended to each line */
  prefix?: string;
  /** Custom log handler (default: console) */
  handler?: LogHandler;
}

// ============================================
// Constants
// ============================================

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const DEFAULT_CONFIG: Required<Omit<LoggerConfig, "handler">> = {
  enabled: process.env.NODE_ENV !== "test",
  level: "info",
  prefix: "monitor",
};

// ============================================
// Logger Class
// ============================================

/**
 * @example
 * ```typescript
 * const logger = createLogger({ level: "debug", prefix: "poller" });
 * logger.info("Tick complete", { succeeded: 3 });
 * ```
 */
export class Logger {
  private config: Required<Omit<LoggerConfig, "handler">> & { handler?: LogHandler };

  constructor(config: LoggerConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Derive a logger sharing this configuration under another prefix.
   */
  child(prefix: string): Logger {
    return new Logger({ ...this.config, prefix });
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!this.config.enabled) return;
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.level]) return;

    if (this.config.handler) {
      this.config.handler(level, `[${this.config.prefix}] ${message}`, meta);
      return;
    }

    const metaStr = meta ? ` ${JSON.stringify(meta)}` : "";
    const line = `[${this.config.prefix}] ${message}${metaStr}`;
    switch (level) {
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.log(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }
  }
}

// ============================================
// Factory & Singleton
// ============================================

let defaultLogger: Logger | null = null;

export function createLogger(config?: LoggerConfig): Logger {
  return new Logger(config);
}

/**
 * Get or create the default logger instance.
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = new Logger();
  }
  return defaultLogger;
}

/**
 * Configure the default logger.
 */
export function configureLogger(config: LoggerConfig): void {
  defaultLogger = new Logger(config);
}
