/**
 * @ras-format/cli — Command routing.
 *
 * `run()` owns the whole CLI lifecycle short of exiting the process:
 * argument parsing, settings resolution, logging setup, dispatch and
 * error reporting. It returns the exit code.
 */

import {
	ConsoleTransport,
	JsonTransport,
	RasError,
	configureLogging,
	createLogger,
	loadSettings,
	parseLogLevel,
	validateSettingsLayer,
} from "@ras-format/core";
import type { RasSettings } from "@ras-format/core";
import { COMMANDS, HELP_TEXT, parseArgs } from "./args.js";
import type { ParsedArgs } from "./args.js";
import type { CliIO } from "./io.js";
import * as convertCommand from "./commands/convert.js";
import * as dumpCommand from "./commands/dump.js";
import * as getCommand from "./commands/get.js";

export const VERSION = "0.1.0";

/** Exit codes returned by {@link run}. */
export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const USAGE: Record<string, string> = {
	get: "ras get <file> <list> <record> <field> [--typed]",
	convert: "ras convert <file> <format> <output> [--indent <n>]",
	dump: "ras dump <file> [--indent <n>]",
};

const ARITY: Record<string, number> = {
	get: 4,
	convert: 3,
	dump: 1,
};

const log = createLogger("cli");

class UsageError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "UsageError";
	}
}

function parseIndex(raw: string, label: string): number {
	const value = Number(raw);
	if (raw.trim() === "" || !Number.isInteger(value)) {
		throw new UsageError(`${label} index must be an integer, got "${raw}"`);
	}
	return value;
}

function flagLayer(args: ParsedArgs): Record<string, unknown> {
	const layer: Record<string, unknown> = {};
	if (args.logLevel !== undefined) layer.logLevel = args.logLevel;
	if (args.indent !== undefined) layer.json = { indent: args.indent };
	return layer;
}

function setupLogging(settings: RasSettings, args: ParsedArgs, io: CliIO): void {
	configureLogging({
		level: parseLogLevel(settings.logLevel),
		transport: io.logTransport ?? (args.jsonLogs ? new JsonTransport(io.stderr) : new ConsoleTransport(io.stderr)),
	});
}

function dispatch(command: string, positionals: string[], args: ParsedArgs, settings: RasSettings, io: CliIO): void {
	switch (command) {
		case "get": {
			const [file, listName, record, field] = positionals;
			getCommand.run(io, file, listName, parseIndex(record, "Record"), parseIndex(field, "Field"), {
				typed: args.typed,
			});
			break;
		}
		case "convert": {
			const [file, format, output] = positionals;
			convertCommand.run(file, format, output, settings);
			break;
		}
		case "dump":
			dumpCommand.run(io, positionals[0], settings);
			break;
	}
}

/**
 * Run the CLI against `argv` (without the `node` and script entries).
 *
 * @returns The process exit code.
 */
export function run(argv: string[], io: CliIO): number {
	const args = parseArgs(argv);

	if (args.help) {
		io.stdout(HELP_TEXT);
		return EXIT_OK;
	}
	if (args.version) {
		io.stdout(`${VERSION}\n`);
		return EXIT_OK;
	}

	try {
		if (args.errors.length > 0) throw new UsageError(args.errors[0]);
		if (args.unknown.length > 0) throw new UsageError(`Unknown option: ${args.unknown[0]}`);
		if (args.command === undefined) throw new UsageError("No command given");

		const command = args.command;
		if (!COMMANDS.has(command)) throw new UsageError(`Unknown command: ${command}`);
		if (args.positionals.length !== ARITY[command]) {
			throw new UsageError(`Usage: ${USAGE[command]}`);
		}

		const settings = loadSettings(io.cwd, validateSettingsLayer(flagLayer(args), "command line"));
		setupLogging(settings, args, io);
		log.debug("Running command", { command, args: args.positionals });

		dispatch(command, args.positionals, args, settings, io);
		return EXIT_OK;
	} catch (err) {
		if (err instanceof UsageError) {
			io.stderr(`ras: ${err.message}\n\nRun 'ras --help' for usage.\n`);
			return EXIT_USAGE;
		}
		if (err instanceof RasError) {
			io.stderr(`ras: ${err.message} [${err.code}]\n`);
			return EXIT_FAILURE;
		}
		throw err;
	}
}
