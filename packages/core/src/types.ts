/**
 * @ras-format/core — Shared settings types.
 */

import type { LogLevelName } from "./observability/logger.js";

// ─── Settings ────────────────────────────────────────────────────────────────

/** JSON output options used by the converter. */
export interface JsonSettings {
	/** Spaces of indentation passed to the JSON serializer. */
	indent: number;
}

/** Fully resolved RAS settings. */
export interface RasSettings {
	json: JsonSettings;
	logLevel: LogLevelName;
}

/** A partial settings layer, as found in `ras.config.json` or built from CLI flags. */
export interface RasSettingsLayer {
	json?: Partial<JsonSettings>;
	logLevel?: LogLevelName;
}

/** Name of the project-level configuration file. */
export const PROJECT_CONFIG_FILE = "ras.config.json";

/** Largest indent accepted for JSON output. */
export const MAX_JSON_INDENT = 10;

export const DEFAULT_SETTINGS: RasSettings = {
	json: { indent: 4 },
	logLevel: "info",
};
