/**
 * @ras-format/cli — Process I/O seam.
 *
 * Commands write through a {@link CliIO} instead of `process` so the whole
 * CLI can run inside a test.
 */

import type { LogTransport } from "@ras-format/core";

export interface CliIO {
	stdout(text: string): void;
	stderr(text: string): void;
	/** Directory searched for `ras.config.json`. */
	cwd: string;
	/** Overrides the console/JSON log transport chosen from flags. */
	logTransport?: LogTransport;
}

/** I/O bound to the current process. */
export function processIO(): CliIO {
	return {
		stdout: (text) => {
			process.stdout.write(text);
		},
		stderr: (text) => {
			process.stderr.write(text);
		},
		cwd: process.cwd(),
	};
}
