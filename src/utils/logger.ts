/**
 * Structured Logger
 *
 * Writes to stderr so the MCP stdio transport keeps stdout to itself.
 * `LOG_LEVEL` filters (debug, info, warn, error; default info) and
 * `LOG_FORMAT=json` switches to one JSON object per line.
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  [key: string]: unknown;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogContext;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(baseContext: LogContext): Logger;
  time<T>(label: string, fn: () => Promise<T>): Promise<T>;
}

// ============================================================================
// Configuration
// ============================================================================

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function getLogLevel(): LogLevel {
  const envLevel = process.env["LOG_LEVEL"]?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return "info";
}

function shouldOutputJson(): boolean {
  return process.env["LOG_FORMAT"] === "json";
}

// ============================================================================
// Core
// ============================================================================

export function log(level: LogLevel, message: string, context?: LogContext): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[getLogLevel()]) {
    return;
  }

  const timestamp = new Date().toISOString();
  const hasContext = context !== undefined && Object.keys(context).length > 0;

  if (shouldOutputJson()) {
    const entry: LogEntry = {
      level,
      message,
      timestamp,
      ...(hasContext ? { context } : {}),
    };
    console.error(JSON.stringify(entry));
    return;
  }

  const prefix = `[${timestamp}] [${level.toUpperCase()}]`;
  if (hasContext) {
    console.error(`${prefix} ${message}`, context);
  } else {
    console.error(`${prefix} ${message}`);
  }
}

function createLogger(baseContext: LogContext = {}): Logger {
  const withBase = (context?: LogContext): LogContext => ({ ...baseContext, ...context });

  return {
    debug: (message, context) => log("debug", message, withBase(context)),
    info: (message, context) => log("info", message, withBase(context)),
    warn: (message, context) => log("warn", message, withBase(context)),
    error: (message, context) => log("error", message, withBase(context)),

    child: (childContext) => createLogger(withBase(childContext)),

    /**
     * Run `fn` and log its duration at debug level, or at error level with
     * the message when it throws. The error is rethrown.
     */
    async time<T>(label: string, fn: () => Promise<T>): Promise<T> {
      const start = Date.now();
      try {
        const result = await fn();
        log("debug", `${label} completed`, withBase({ durationMs: Date.now() - start }));
        return result;
      } catch (error) {
        log(
          "error",
          `${label} failed`,
          withBase({
            durationMs: Date.now() - start,
            error: error instanceof Error ? error.message : String(error),
          })
        );
        throw error;
      }
    },
  };
}

/**
 * @example
 * ```ts
 * const requestLogger = logger.child({ requestId });
 * requestLogger.info("Staged workspace", { root });
 * ```
 */
export const logger: Logger = createLogger();
