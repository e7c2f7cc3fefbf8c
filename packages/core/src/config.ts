import fs from "fs";
import path from "path";
import { ConfigError } from "./errors.js";
import { isLogLevelName } from "./observability/logger.js";
import type { RasSettings, RasSettingsLayer } from "./types.js";
import { DEFAULT_SETTINGS, MAX_JSON_INDENT, PROJECT_CONFIG_FILE } from "./types.js";

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Load project-level configuration from `<projectPath>/ras.config.json`.
 *
 * Returns an empty object if the file does not exist.
 *
 * @param projectPath - Directory to look in.
 * @returns The parsed project config as a key-value record.
 * @throws {ConfigError} If the file exists but is not a JSON object.
 */
export function loadProjectConfig(projectPath: string): Record<string, unknown> {
	const configPath = path.join(projectPath, PROJECT_CONFIG_FILE);
	if (!fs.existsSync(configPath)) return {};

	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(configPath, "utf-8"));
	} catch (err) {
		throw new ConfigError(`Failed to parse ${configPath}`, err instanceof Error ? err : undefined);
	}
	if (!isPlainObject(parsed)) {
		throw new ConfigError(`${configPath} must contain a JSON object`);
	}
	return parsed;
}

/**
 * Check a raw config object and narrow it to a {@link RasSettingsLayer}.
 *
 * Unknown keys are ignored. `source` names the origin in error messages.
 *
 * @throws {ConfigError} On a value of the wrong type or out of range.
 */
export function validateSettingsLayer(raw: Record<string, unknown>, source = "config"): RasSettingsLayer {
	const layer: RasSettingsLayer = {};

	if (raw.logLevel !== undefined) {
		if (typeof raw.logLevel !== "string" || !isLogLevelName(raw.logLevel)) {
			throw new ConfigError(
				`${source}: logLevel must be one of debug, info, warn, error, fatal (got ${JSON.stringify(raw.logLevel)})`,
			);
		}
		layer.logLevel = raw.logLevel;
	}

	if (raw.json !== undefined) {
		if (!isPlainObject(raw.json)) {
			throw new ConfigError(`${source}: json must be an object`);
		}
		const indent = raw.json.indent;
		if (indent !== undefined) {
			if (typeof indent !== "number" || !Number.isInteger(indent) || indent < 0 || indent > MAX_JSON_INDENT) {
				throw new ConfigError(
					`${source}: json.indent must be an integer between 0 and ${MAX_JSON_INDENT} (got ${JSON.stringify(indent)})`,
				);
			}
			layer.json = { indent };
		}
	}

	return layer;
}

/**
 * Merge settings layers over {@link DEFAULT_SETTINGS}.
 *
 * Layers are applied left-to-right, so later layers override earlier ones.
 *
 * @example
 * ```ts
 * const settings = resolveSettings(projectLayer, { json: { indent: 2 } });
 * ```
 */
export function resolveSettings(...layers: RasSettingsLayer[]): RasSettings {
	const settings: RasSettings = {
		json: { ...DEFAULT_SETTINGS.json },
		logLevel: DEFAULT_SETTINGS.logLevel,
	};
	for (const layer of layers) {
		if (layer.logLevel !== undefined) settings.logLevel = layer.logLevel;
		if (layer.json?.indent !== undefined) settings.json.indent = layer.json.indent;
	}
	return settings;
}

/**
 * Load `ras.config.json` from `projectPath` and resolve it over the defaults,
 * with any extra layers (e.g. command-line flags) applied last.
 */
export function loadSettings(projectPath: string, ...overrides: RasSettingsLayer[]): RasSettings {
	const configPath = path.join(projectPath, PROJECT_CONFIG_FILE);
	const project = validateSettingsLayer(loadProjectConfig(projectPath), configPath);
	return resolveSettings(project, ...overrides);
}
