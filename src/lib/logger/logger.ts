import type { LogFormat, LogLevel } from "./schema";

export interface LoggerConfig {
  level: LogLevel;
  format?: LogFormat;
  /** Fields merged into every entry's context. */
  bindings?: Record<string, unknown>;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

const logLevels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const shouldLog = (level: LogLevel, currentLevel: LogLevel): boolean => {
  const levelValue = logLevels[level];
  const currentLevelValue = logLevels[currentLevel];
  return levelValue >= currentLevelValue;
};

const mergeContext = (
  bindings: Record<string, unknown> | undefined,
  context: Record<string, unknown> | undefined,
): Record<string, unknown> | undefined => {
  if (!bindings) {
    return context;
  }
  return { ...bindings, ...context };
};

const createLogEntry = (
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>,
  error?: Error,
): LogEntry => {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...(context && Object.keys(context).length > 0 && { context }),
    ...(error && {
      error: {
        name: error.name,
        message: error.message,
        ...(error.stack && { stack: error.stack }),
      },
    }),
  };
  return entry;
};

export const formatLog = (entry: LogEntry, format: LogFormat): string => {
  if (format === "pretty") {
    return `${entry.timestamp} [${entry.level.toUpperCase()}] ${entry.message}${
      entry.context ? ` ${JSON.stringify(entry.context)}` : ""
    }${entry.error ? ` (${entry.error.name}: ${entry.error.message})` : ""}`;
  }
  return JSON.stringify(entry);
};

export interface Logger {
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, error?: Error, context?: Record<string, unknown>) => void;
  child: (bindings: Record<string, unknown>) => Logger;
}

export const createLogger = (loggerConfig: LoggerConfig = { level: "info" }): Logger => {
  const format = loggerConfig.format ?? "json";
  const { bindings } = loggerConfig;

  return {
    debug: (message: string, context?: Record<string, unknown>): void => {
      if (shouldLog("debug", loggerConfig.level)) {
        console.log(formatLog(createLogEntry("debug", message, mergeContext(bindings, context)), format));
      }
    },

    info: (message: string, context?: Record<string, unknown>): void => {
      if (shouldLog("info", loggerConfig.level)) {
        console.log(formatLog(createLogEntry("info", message, mergeContext(bindings, context)), format));
      }
    },

    warn: (message: string, context?: Record<string, unknown>): void => {
      if (shouldLog("warn", loggerConfig.level)) {
        console.warn(formatLog(createLogEntry("warn", message, mergeContext(bindings, context)), format));
      }
    },

    error: (message: string, error?: Error, context?: Record<string, unknown>): void => {
      if (shouldLog("error", loggerConfig.level)) {
        console.error(
          formatLog(createLogEntry("error", message, mergeContext(bindings, context), error), format),
        );
      }
    },

    child: (childBindings: Record<string, unknown>): Logger =>
      createLogger({ ...loggerConfig, bindings: { ...bindings, ...childBindings } }),
  };
};
