/**
 * Observability — logging for the RAS toolchain.
 */

export {
	LogLevel,
	ConsoleTransport,
	JsonTransport,
	createLogger,
	configureLogging,
	resetLoggingConfig,
	isLogLevelName,
	parseLogLevel,
} from "./logger.js";
export type {
	LineWriter,
	LogEntry,
	LoggedError,
	Logger,
	LoggingConfig,
	LogTransport,
	LogLevelName,
} from "./logger.js";
