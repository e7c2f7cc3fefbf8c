/**
 * Diagnostic logging for the RAS packages.
 *
 * Module-level loggers are created at import time and read the process-wide
 * settings from {@link configureLogging} each time they emit, so the CLI can
 * pick the level and output format after everything has loaded.
 * All output goes to stderr; stdout belongs to command results.
 */

export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
	FATAL = 4,
}

/** Level names as written in `ras.config.json` and `--log-level`. */
export type LogLevelName = "debug" | "info" | "warn" | "error" | "fatal";

const LEVEL_BY_NAME: Record<LogLevelName, LogLevel> = {
	debug: LogLevel.DEBUG,
	info: LogLevel.INFO,
	warn: LogLevel.WARN,
	error: LogLevel.ERROR,
	fatal: LogLevel.FATAL,
};

export function isLogLevelName(name: string): name is LogLevelName {
	return Object.prototype.hasOwnProperty.call(LEVEL_BY_NAME, name);
}

export function parseLogLevel(name: LogLevelName): LogLevel {
	return LEVEL_BY_NAME[name];
}

function levelLabel(level: LogLevel): string {
	return LogLevel[level];
}

// ─── Entries & transports ────────────────────────────────────────────────────

export interface LoggedError {
	name: string;
	message: string;
	/** `RasError.code`, when the error carries one. */
	code?: string;
	stack?: string;
}

export interface LogEntry {
	/** ISO-8601 */
	time: string;
	level: LogLevel;
	/** Name given to {@link createLogger}, e.g. `parser:io`. */
	logger: string;
	message: string;
	fields: Record<string, unknown>;
	error?: LoggedError;
}

export interface LogTransport {
	write(entry: LogEntry): void;
}

/** Where a transport sends its finished lines. */
export type LineWriter = (text: string) => void;

const toStderr: LineWriter = (text) => {
	process.stderr.write(text);
};

/**
 * One readable line per entry:
 * `12:00:01.250 INFO  [parser:convert] Converted a.ras to JSON lists=2`.
 * An attached error follows on indented lines.
 */
export class ConsoleTransport implements LogTransport {
	constructor(private readonly out: LineWriter = toStderr) {}

	format(entry: LogEntry): string {
		const parts = [entry.time.slice(11, 23), levelLabel(entry.level).padEnd(5), `[${entry.logger}]`, entry.message];
		for (const [key, value] of Object.entries(entry.fields)) {
			parts.push(`${key}=${JSON.stringify(value)}`);
		}
		let text = parts.join(" ");

		if (entry.error) {
			const code = entry.error.code ? ` [${entry.error.code}]` : "";
			text += `\n  ${entry.error.name}${code}: ${entry.error.message}`;
			// First stack line repeats the message.
			const frames = entry.error.stack?.split("\n").slice(1) ?? [];
			for (const frame of frames) text += `\n  ${frame.trim()}`;
		}
		return text;
	}

	write(entry: LogEntry): void {
		this.out(this.format(entry) + "\n");
	}
}

/** One JSON object per line, for `--json-logs`. */
export class JsonTransport implements LogTransport {
	constructor(private readonly out: LineWriter = toStderr) {}

	format(entry: LogEntry): string {
		const line: Record<string, unknown> = {
			time: entry.time,
			level: levelLabel(entry.level).toLowerCase(),
			logger: entry.logger,
			message: entry.message,
		};
		if (Object.keys(entry.fields).length > 0) line.fields = entry.fields;
		if (entry.error) line.error = entry.error;
		return JSON.stringify(line);
	}

	write(entry: LogEntry): void {
		this.out(this.format(entry) + "\n");
	}
}

// ─── Process-wide settings ───────────────────────────────────────────────────

export interface LoggingConfig {
	/** Default: INFO. */
	level?: LogLevel;
	/** Default: a {@link ConsoleTransport} on stderr. */
	transport?: LogTransport;
}

let config: LoggingConfig = {};
let fallback: LogTransport | undefined;

export function configureLogging(next: LoggingConfig): void {
	config = { ...next };
}

/** Back to INFO on the console. Used between tests. */
export function resetLoggingConfig(): void {
	config = {};
}

function activeTransport(): LogTransport {
	if (config.transport) return config.transport;
	if (!fallback) fallback = new ConsoleTransport();
	return fallback;
}

function describeError(error: unknown): LoggedError {
	if (!(error instanceof Error)) return { name: "Error", message: String(error) };
	const described: LoggedError = { name: error.name, message: error.message };
	if ("code" in error && typeof error.code === "string") described.code = error.code;
	if (error.stack) described.stack = error.stack;
	return described;
}

// ─── Loggers ─────────────────────────────────────────────────────────────────

export interface Logger {
	debug(message: string, fields?: Record<string, unknown>): void;
	info(message: string, fields?: Record<string, unknown>): void;
	/** The run is about to end; `error` is what ended it. */
	fatal(message: string, error: unknown, fields?: Record<string, unknown>): void;
}

export function createLogger(name: string): Logger {
	const emit = (level: LogLevel, message: string, fields: Record<string, unknown> = {}, error?: unknown): void => {
		if (level < (config.level ?? LogLevel.INFO)) return;
		const entry: LogEntry = {
			time: new Date().toISOString(),
			level,
			logger: name,
			message,
			fields: { ...fields },
		};
		if (error !== undefined) entry.error = describeError(error);
		activeTransport().write(entry);
	};

	return {
		debug: (message, fields) => emit(LogLevel.DEBUG, message, fields),
		info: (message, fields) => emit(LogLevel.INFO, message, fields),
		fatal: (message, error, fields) => emit(LogLevel.FATAL, message, fields, error),
	};
}
