#!/usr/bin/env node

/**
 * @ras-format/cli — Entry point.
 *
 * The `ras` binary. Everything but the exit lives in {@link run}.
 */

import { createLogger } from "@ras-format/core";
import { processIO } from "./io.js";
import { run, EXIT_FAILURE } from "./main.js";

try {
	process.exitCode = run(process.argv.slice(2), processIO());
} catch (err) {
	createLogger("cli").fatal("Unexpected failure", err);
	process.exitCode = EXIT_FAILURE;
}
