/**
 * @ras-format/cli — `ras convert <file> <format> <output>`.
 */

import { convert } from "@ras-format/parser";
import type { RasSettings } from "@ras-format/core";

export function run(file: string, format: string, output: string, settings: RasSettings): void {
	convert(file, format, output, { indent: settings.json.indent });
}
