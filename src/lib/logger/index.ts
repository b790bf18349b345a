export { createLogger, formatLog, type Logger, type LoggerConfig } from "./logger";

export { type LogFormat, type LogLevel, logFormatSchema, logLevelSchema } from "./schema";
