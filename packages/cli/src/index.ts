// @ras-format/cli — programmatic entry
export { run, VERSION, EXIT_OK, EXIT_FAILURE, EXIT_USAGE } from "./main.js";
export { parseArgs, HELP_TEXT, COMMANDS } from "./args.js";
export type { ParsedArgs } from "./args.js";
export { processIO } from "./io.js";
export type { CliIO } from "./io.js";
