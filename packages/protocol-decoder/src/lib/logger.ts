/**
 * Structured logger utility for consistent logging across the decoder
 * Provides namespaced logging with structured context for easier debugging
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

type LogThreshold = LogLevel | "silent";

interface LogContext {
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  namespace: string;
  message: string;
  context?: LogContext;
}

const LOG_LEVELS: Record<LogThreshold, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isThreshold(value: string): value is LogThreshold {
  return value in LOG_LEVELS;
}

// LOG_LEVEL wins over the NODE_ENV default
function resolveMinLevel(): LogThreshold {
  const override = process.env.LOG_LEVEL?.toLowerCase();
  if (override && isThreshold(override)) {
    return override;
  }
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[resolveMinLevel()];
}

function formatMessage(entry: LogEntry): string {
  return `[${entry.namespace}] ${entry.message}`;
}

function createLogEntry(
  level: LogLevel,
  namespace: string,
  message: string,
  context?: LogContext,
): LogEntry {
  return {
    timestamp: new Date().toISOString(),
    level,
    namespace,
    message,
    context,
  };
}

export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
  child: (childNamespace: string) => Logger;
}

/**
 * Creates a namespaced logger instance
 * @param namespace - The namespace for this logger (e.g., "Ingest", "Synth")
 *
 * @example
 * const logger = createLogger("Ingest");
 * logger.info("Protocol ingested", { channels: 2, epochs: 4 });
 *
 * // Create a child logger for more specific context
 * const dacLogger = logger.child("DAC0");
 * dacLogger.debug("Epoch dropped", { epochNumber: 3 });
 */
export function createLogger(namespace: string): Logger {
  const log = (
    level: LogLevel,
    message: string,
    context?: LogContext,
  ): void => {
    if (!shouldLog(level)) return;

    const entry = createLogEntry(level, namespace, message, context);
    const formattedMessage = formatMessage(entry);

    switch (level) {
      case "debug":
        if (context) {
          console.debug(formattedMessage, context);
        } else {
          console.debug(formattedMessage);
        }
        break;
      case "info":
        if (context) {
          console.info(formattedMessage, context);
        } else {
          console.info(formattedMessage);
        }
        break;
      case "warn":
        if (context) {
          console.warn(formattedMessage, context);
        } else {
          console.warn(formattedMessage);
        }
        break;
      case "error":
        if (context) {
          console.error(formattedMessage, context);
        } else {
          console.error(formattedMessage);
        }
        break;
    }
  };

  return {
    debug: (message: string, context?: LogContext) =>
      log("debug", message, context),
    info: (message: string, context?: LogContext) =>
      log("info", message, context),
    warn: (message: string, context?: LogContext) =>
      log("warn", message, context),
    error: (message: string, context?: LogContext) =>
      log("error", message, context),
    child: (childNamespace: string) =>
      createLogger(`${namespace}:${childNamespace}`),
  };
}

// Pre-configured loggers for the pipeline stages
export const loggers = {
  ingest: createLogger("Ingest"),
  resolver: createLogger("Resolver"),
  synth: createLogger("Synth"),
  triggers: createLogger("Triggers"),
} as const;

export default createLogger;
