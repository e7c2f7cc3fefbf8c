/**
 * @ras-format/cli — `ras dump <file>`: print the JSON projection.
 */

import { load, toJson } from "@ras-format/parser";
import type { RasSettings } from "@ras-format/core";
import type { CliIO } from "../io.js";

export function run(io: CliIO, file: string, settings: RasSettings): void {
	io.stdout(toJson(load(file), settings.json.indent) + "\n");
}
