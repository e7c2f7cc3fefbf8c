import { describe, it, expect } from "vitest";
import { parseArgs, COMMANDS } from "../src/args.js";

// ═══════════════════════════════════════════════════════════════════════════════
// parseArgs
// ═══════════════════════════════════════════════════════════════════════════════

describe("parseArgs", () => {
	// ─── Empty args ──────────────────────────────────────────────────────────

	it("should return empty collections for no arguments", () => {
		const args = parseArgs([]);
		expect(args.command).toBeUndefined();
		expect(args.positionals).toEqual([]);
		expect(args.unknown).toEqual([]);
		expect(args.errors).toEqual([]);
		expect(args.indent).toBeUndefined();
		expect(args.typed).toBeUndefined();
	});

	// ─── Command and positionals ─────────────────────────────────────────────

	describe("command and positionals", () => {
		it("should take the first bare argument as the command", () => {
			const args = parseArgs(["get", "data.ras", "products", "0", "2"]);
			expect(args.command).toBe("get");
			expect(args.positionals).toEqual(["data.ras", "products", "0", "2"]);
		});

		it("should treat negative integers as positionals", () => {
			const args = parseArgs(["get", "data.ras", "products", "-1", "0"]);
			expect(args.positionals).toEqual(["data.ras", "products", "-1", "0"]);
			expect(args.unknown).toEqual([]);
		});

		it("should allow flags between positionals", () => {
			const args = parseArgs(["dump", "--indent", "2", "data.ras"]);
			expect(args.command).toBe("dump");
			expect(args.indent).toBe(2);
			expect(args.positionals).toEqual(["data.ras"]);
		});
	});

	// ─── Flags ───────────────────────────────────────────────────────────────

	describe("flags", () => {
		it("should parse boolean flags", () => {
			const args = parseArgs(["--typed", "--json-logs", "-h", "-v"]);
			expect(args.typed).toBe(true);
			expect(args.jsonLogs).toBe(true);
			expect(args.help).toBe(true);
			expect(args.version).toBe(true);
		});

		it("should accept long forms of help and version", () => {
			expect(parseArgs(["--help"]).help).toBe(true);
			expect(parseArgs(["--version"]).version).toBe(true);
		});

		it("should lower-case the log level", () => {
			expect(parseArgs(["--log-level", "DEBUG"]).logLevel).toBe("debug");
		});

		it("should record a malformed indent as an error", () => {
			const args = parseArgs(["--indent", "wide"]);
			expect(args.indent).toBeUndefined();
			expect(args.errors).toEqual(['--indent expects an integer, got "wide"']);
		});

		it("should record a missing flag value as an error", () => {
			const args = parseArgs(["dump", "--log-level"]);
			expect(args.errors).toEqual(["--log-level requires a value"]);
		});

		it("should not consume a following flag as a value", () => {
			const args = parseArgs(["--indent", "--typed"]);
			expect(args.errors).toEqual(["--indent requires a value"]);
			expect(args.typed).toBe(true);
		});

		it("should collect unknown flags", () => {
			expect(parseArgs(["--verbose", "dump"]).unknown).toEqual(["--verbose"]);
		});
	});
});

describe("COMMANDS", () => {
	it("should list the routed commands", () => {
		expect([...COMMANDS]).toEqual(["get", "convert", "dump"]);
	});
});
