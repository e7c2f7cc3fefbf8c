/**
 * @ras-format/cli — Argument parser.
 *
 * Simple CLI argument parser with no external dependencies.
 * Parses flags, the command name, and positional arguments from argv.
 */

export interface ParsedArgs {
	command?: string;
	/** Positional arguments after the command. */
	positionals: string[];
	/** JSON indentation (--indent). */
	indent?: number;
	/** Log level name as given (--log-level). Validated by settings resolution. */
	logLevel?: string;
	/** Emit logs as JSON lines (--json-logs). */
	jsonLogs?: boolean;
	/** Print the value kind alongside the value (--typed, for `get`). */
	typed?: boolean;
	version?: boolean;
	help?: boolean;
	/** Unrecognized flags. */
	unknown: string[];
	/** Problems with flag values (missing or malformed). */
	errors: string[];
}

/** Commands the CLI routes. */
export const COMMANDS = new Set(["get", "convert", "dump"]);

const NEGATIVE_NUMBER = /^-\d+$/;

function isFlag(arg: string): boolean {
	return arg.startsWith("-") && !NEGATIVE_NUMBER.test(arg);
}

/**
 * Parse process.argv (or a custom argv array) into structured arguments.
 *
 * Expects argv WITHOUT the leading `node` and script path entries,
 * i.e., pass `process.argv.slice(2)`. Negative integers (`-1`) are
 * positionals, not flags.
 */
export function parseArgs(argv: string[]): ParsedArgs {
	const result: ParsedArgs = {
		positionals: [],
		unknown: [],
		errors: [],
	};

	let i = 0;

	while (i < argv.length) {
		const arg = argv[i];

		// ─── Flags with values ──────────────────────────────────────────
		if (arg === "--indent") {
			const value = argv[i + 1];
			if (value === undefined || isFlag(value)) {
				result.errors.push("--indent requires a value");
				i++;
				continue;
			}
			const parsed = Number(value);
			if (!Number.isInteger(parsed)) {
				result.errors.push(`--indent expects an integer, got "${value}"`);
			} else {
				result.indent = parsed;
			}
			i += 2;
			continue;
		}

		if (arg === "--log-level") {
			const value = argv[i + 1];
			if (value === undefined || isFlag(value)) {
				result.errors.push("--log-level requires a value");
				i++;
				continue;
			}
			result.logLevel = value.toLowerCase();
			i += 2;
			continue;
		}

		// ─── Boolean flags ──────────────────────────────────────────────
		if (arg === "--json-logs") {
			result.jsonLogs = true;
			i++;
			continue;
		}

		if (arg === "--typed") {
			result.typed = true;
			i++;
			continue;
		}

		if (arg === "-v" || arg === "--version") {
			result.version = true;
			i++;
			continue;
		}

		if (arg === "-h" || arg === "--help") {
			result.help = true;
			i++;
			continue;
		}

		// ─── Command and positionals ────────────────────────────────────
		if (!isFlag(arg)) {
			if (result.command === undefined) {
				result.command = arg;
			} else {
				result.positionals.push(arg);
			}
			i++;
			continue;
		}

		// ─── Unknown flags ──────────────────────────────────────────────
		result.unknown.push(arg);
		i++;
	}

	return result;
}

/** The CLI help text. */
export const HELP_TEXT = `RAS — parse, query and convert RAS list files

Usage:
  ras get <file> <list> <record> <field>   Print one field
  ras convert <file> <format> <output>     Convert a file (format: json)
  ras dump <file>                          Print a file as JSON

Options:
  --typed                 With get: print "<kind> <value>"
  --indent <n>            JSON indentation (default 4)
  --log-level <level>     debug|info|warn|error|fatal (default info)
  --json-logs             Write logs as JSON lines
  -v, --version           Show version
  -h, --help              Show this help

Settings are read from ras.config.json in the working directory;
command-line options override them.
`;
