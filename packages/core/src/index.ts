// @ras-format/core — Foundation
export * from "./types.js";
export * from "./errors.js";
export {
	loadProjectConfig,
	validateSettingsLayer,
	resolveSettings,
	loadSettings,
} from "./config.js";

// Observability
export * from "./observability/index.js";
